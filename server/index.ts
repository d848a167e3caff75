import express, { type NextFunction, type Request, type Response } from "express";
import { loadEnv } from "../config/env";
import { FLAGS } from "../config/flags";
import { logger } from "../lib/logger";
import type { MapResponse } from "../types/map";
import { LruStateStore } from "./cache";
import { createDatabase } from "./db";
import { MapService } from "./mapService";
import { registerRoutes } from "./routes";
import { loadSampleProperties } from "./seed";
import { DatabaseStorage, MemStorage, type IPropertyStore } from "./storage";

const log = logger.child("server");

function requestLog(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      log.info(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
}

async function createStore(databaseUrl: string | undefined): Promise<IPropertyStore> {
  if (databaseUrl) {
    const db = createDatabase(databaseUrl);
    log.info("Using PostgreSQL property store");
    return new DatabaseStorage(db);
  }

  const store = new MemStorage(await loadSampleProperties());
  log.warn(`DATABASE_URL not set, serving ${store.size} sample properties from memory`);
  return store;
}

async function main() {
  const env = loadEnv();
  logger.setLevel(env.LOG_LEVEL);

  const app = express();
  if (FLAGS.requestLog) app.use(requestLog);

  const store = await createStore(env.DATABASE_URL);
  const cacheTtlMs = env.CACHE_TTL_SECONDS * 1000;
  const server = await registerRoutes(app, {
    mapService: new MapService(store),
    cache: cacheTtlMs > 0 ? new LruStateStore<MapResponse>(env.CACHE_MAX_ENTRIES) : undefined,
    cacheTtlMs,
  });

  server.listen(env.PORT, () => {
    log.info(`serving on port ${env.PORT}`);
  });
}

main().catch((error) => {
  log.error("Failed to start server", error);
  process.exit(1);
});
