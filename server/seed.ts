import fs from "fs/promises";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { StoredProperty } from "./storage";

const storedPropertySchema = z.object({
  id: z.number().int().positive(),
  address: z.string(),
  county: z.string(),
  latitude: z.number().min(-90).max(90).nullable(),
  longitude: z.number().min(-180).max(180).nullable(),
  sales: z.array(z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    price: z.number().nonnegative(),
  })),
});

export const SAMPLE_PROPERTIES_PATH = fileURLToPath(new URL("../data/sample-properties.json", import.meta.url));

/** Sample properties for running without a database */
export async function loadSampleProperties(filePath: string = SAMPLE_PROPERTIES_PATH): Promise<StoredProperty[]> {
  const raw = await fs.readFile(filePath, "utf8");
  return z.array(storedPropertySchema).parse(JSON.parse(raw));
}
