import { pgTable, serial, integer, text, doublePrecision, date, timestamp, index } from "drizzle-orm/pg-core";
import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { ANALYSIS_MODES, CLUSTER_MODES, PATTERN_TYPES, type BoundingBox, type ViewportFilters } from "./map-types";
import { MAP } from "../config/map";

// Only the columns the map store reads; ingestion owns the rest of the schema.
export const properties = pgTable("properties", {
  id: serial("id").primaryKey(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const addresses = pgTable("addresses", {
  id: serial("id").primaryKey(),
  propertyId: integer("property_id").notNull().references(() => properties.id),
  address: text("address").notNull(),
  county: text("county").notNull(),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
}, (table) => ({
  latLngIdx: index("idx_addresses_lat_lng").on(table.latitude, table.longitude),
  countyIdx: index("idx_addresses_county").on(table.county),
}));

export const priceHistory = pgTable("price_history", {
  id: serial("id").primaryKey(),
  propertyId: integer("property_id").notNull().references(() => properties.id),
  dateOfSale: date("date_of_sale", { mode: "string" }).notNull(),
  price: doublePrecision("price").notNull(),
}, (table) => ({
  propertyDateIdx: index("idx_price_history_property_date").on(table.propertyId, table.dateOfSale),
}));

// Query parameter schemas. Everything arrives as strings, hence z.coerce.

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD format")
  .refine(value => isValid(parseISO(value)), "Invalid calendar date");

const viewportQueryBase = z.object({
  north: z.coerce.number().min(-90).max(90),
  south: z.coerce.number().min(-90).max(90),
  east: z.coerce.number().min(-180).max(180),
  west: z.coerce.number().min(-180).max(180),
  county: z.string().trim().min(1).optional(),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  minPrice: z.coerce.number().min(0).optional(),
  maxPrice: z.coerce.number().min(0).optional(),
  minSales: z.coerce.number().int().min(1).optional(),
});

type ViewportQueryFields = z.infer<typeof viewportQueryBase>;

function checkViewport(query: ViewportQueryFields, ctx: z.RefinementCtx) {
  if (query.south > query.north) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["south"], message: "south must not exceed north" });
  }
  if (query.west > query.east) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["west"], message: "west must not exceed east (antimeridian wraparound is not supported)" });
  }
  if (query.startDate && query.endDate && query.startDate > query.endDate) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["startDate"], message: "startDate must not be after endDate" });
  }
  if (query.minPrice !== undefined && query.maxPrice !== undefined && query.minPrice > query.maxPrice) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["minPrice"], message: "minPrice must not exceed maxPrice" });
  }
}

const zoom = z.coerce.number().int().min(1).max(20).default(10);

export const pointsQuerySchema = viewportQueryBase.extend({
  maxPoints: z.coerce.number().int().min(1).max(MAP.points.max).default(MAP.points.defaultMax),
}).superRefine(checkViewport);

export const clustersQuerySchema = viewportQueryBase.extend({
  zoom,
  clusterMode: z.enum(CLUSTER_MODES).default("geographic"),
}).superRefine(checkViewport);

export const overviewQuerySchema = viewportQueryBase.extend({
  zoom,
}).superRefine(checkViewport);

export const heatmapQuerySchema = viewportQueryBase.extend({
  analysisMode: z.enum(ANALYSIS_MODES).default("sales-heatmap"),
  gridCells: z.coerce.number().int().min(1).max(MAP.heatmap.maxGridCells).default(MAP.heatmap.defaultGridCells),
  format: z.enum(["json", "geojson"]).default("json"),
}).superRefine(checkViewport);

export const analysisQuerySchema = viewportQueryBase.extend({
  analysisMode: z.enum(ANALYSIS_MODES),
  // Older clients send "Density" / "Concentration"
  patternType: z.string().trim().toLowerCase().pipe(z.enum(PATTERN_TYPES)).optional(),
  hotspotIntensity: z.coerce.number().min(0).max(1).default(MAP.analysis.defaultHotspotIntensity),
  gridCells: z.coerce.number().int().min(1).max(MAP.heatmap.maxGridCells).default(MAP.heatmap.defaultGridCells),
}).superRefine(checkViewport);

export type PointsQuery = z.infer<typeof pointsQuerySchema>;
export type ClustersQuery = z.infer<typeof clustersQuerySchema>;
export type OverviewQuery = z.infer<typeof overviewQuerySchema>;
export type HeatmapQuery = z.infer<typeof heatmapQuerySchema>;
export type AnalysisQuery = z.infer<typeof analysisQuerySchema>;

/** Split a validated query into the viewport and the store filters */
export function toViewport(query: ViewportQueryFields): { bbox: BoundingBox; filters: ViewportFilters } {
  const { north, south, east, west, county, startDate, endDate, minPrice, maxPrice, minSales } = query;
  return {
    bbox: { north, south, east, west },
    filters: { region: county, startDate, endDate, minPrice, maxPrice, minSales },
  };
}
