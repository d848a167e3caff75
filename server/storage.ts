import { and, asc, between, desc, eq, gte, inArray, isNotNull, lte, sql, type SQL } from "drizzle-orm";
import { addresses, priceHistory } from "@shared/schema";
import type { BoundingBox, DateRange, GeoRecord, ViewportFilters } from "@shared/map-types";
import { containsPoint } from "@shared/geo";
import { MAP } from "../config/map";
import type { Database } from "./db";

export interface ViewportFetch {
  bbox: BoundingBox;
  filters: ViewportFilters;
  /** Maximum rows, taken in property id order; null fetches everything */
  limit: number | null;
}

export interface LatestPrice {
  price: number;
  date: string;
}

export interface IPropertyStore {
  fetchViewport(query: ViewportFetch): Promise<GeoRecord[]>;
  getLatestPrices(propertyIds: number[], range: DateRange): Promise<Map<number, LatestPrice>>;
}

/** A record must have a sale in range when the date range or price bounds are set */
function requiresSale(filters: ViewportFilters): boolean {
  return Boolean(filters.startDate || filters.endDate) ||
    filters.minPrice !== undefined || filters.maxPrice !== undefined;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function saleDateConditions(range: DateRange): SQL[] {
  const conditions: SQL[] = [];
  if (range.startDate) conditions.push(gte(priceHistory.dateOfSale, range.startDate));
  if (range.endDate) conditions.push(lte(priceHistory.dateOfSale, range.endDate));
  return conditions;
}

export class DatabaseStorage implements IPropertyStore {
  constructor(private readonly db: Database) {}

  async fetchViewport({ bbox, filters, limit }: ViewportFetch): Promise<GeoRecord[]> {
    // Latest sale per property inside the date range
    const latest = this.db
      .selectDistinctOn([priceHistory.propertyId], {
        propertyId: priceHistory.propertyId,
        price: priceHistory.price,
        dateOfSale: priceHistory.dateOfSale,
      })
      .from(priceHistory)
      .where(and(...saleDateConditions(filters)))
      .orderBy(priceHistory.propertyId, desc(priceHistory.dateOfSale), desc(priceHistory.id))
      .as("latest");

    const conditions: SQL[] = [
      isNotNull(addresses.latitude),
      isNotNull(addresses.longitude),
      between(addresses.latitude, bbox.south, bbox.north),
      between(addresses.longitude, bbox.west, bbox.east),
    ];
    if (filters.region) conditions.push(eq(addresses.county, filters.region));
    if (requiresSale(filters)) conditions.push(isNotNull(latest.propertyId));
    if (filters.minPrice !== undefined) conditions.push(gte(latest.price, filters.minPrice));
    if (filters.maxPrice !== undefined) conditions.push(lte(latest.price, filters.maxPrice));
    if (filters.minSales !== undefined) {
      conditions.push(sql`(select count(*) from ${priceHistory} where ${priceHistory.propertyId} = ${addresses.propertyId}) >= ${filters.minSales}`);
    }

    const query = this.db
      .select({
        id: addresses.propertyId,
        latitude: addresses.latitude,
        longitude: addresses.longitude,
        address: addresses.address,
        county: addresses.county,
        price: latest.price,
        date: latest.dateOfSale,
      })
      .from(addresses)
      .leftJoin(latest, eq(latest.propertyId, addresses.propertyId))
      .where(and(...conditions))
      .orderBy(asc(addresses.propertyId));

    const rows = limit === null ? await query : await query.limit(limit);

    return rows.map(row => ({
      id: row.id,
      latitude: row.latitude,
      longitude: row.longitude,
      price: row.price === null ? null : Math.round(row.price),
      label: row.address,
      region: row.county,
      date: row.date,
    }));
  }

  async getLatestPrices(propertyIds: number[], range: DateRange): Promise<Map<number, LatestPrice>> {
    const prices = new Map<number, LatestPrice>();

    for (const ids of chunk(propertyIds, MAP.priceLookupBatchSize)) {
      const rows = await this.db
        .selectDistinctOn([priceHistory.propertyId], {
          propertyId: priceHistory.propertyId,
          price: priceHistory.price,
          dateOfSale: priceHistory.dateOfSale,
        })
        .from(priceHistory)
        .where(and(inArray(priceHistory.propertyId, ids), ...saleDateConditions(range)))
        .orderBy(priceHistory.propertyId, desc(priceHistory.dateOfSale), desc(priceHistory.id));

      for (const row of rows) {
        prices.set(row.propertyId, { price: Math.round(row.price), date: row.dateOfSale });
      }
    }

    return prices;
  }
}

export interface StoredSale {
  date: string;
  price: number;
}

export interface StoredProperty {
  id: number;
  address: string;
  county: string;
  latitude: number | null;
  longitude: number | null;
  sales: StoredSale[];
}

function inRange(date: string, range: DateRange): boolean {
  if (range.startDate && date < range.startDate) return false;
  if (range.endDate && date > range.endDate) return false;
  return true;
}

/** Latest sale in range; on equal dates the one recorded last wins */
function latestSale(sales: StoredSale[], range: DateRange): StoredSale | undefined {
  let latest: StoredSale | undefined;
  for (const sale of sales) {
    if (!inRange(sale.date, range)) continue;
    if (!latest || sale.date >= latest.date) latest = sale;
  }
  return latest;
}

/**
 * In-memory property store. Used when no DATABASE_URL is configured and by
 * the tests; applies the same filters and ordering as DatabaseStorage.
 */
export class MemStorage implements IPropertyStore {
  private properties: StoredProperty[];

  constructor(properties: StoredProperty[] = []) {
    this.properties = [...properties].sort((a, b) => a.id - b.id);
  }

  get size(): number {
    return this.properties.length;
  }

  async fetchViewport({ bbox, filters, limit }: ViewportFetch): Promise<GeoRecord[]> {
    const saleRequired = requiresSale(filters);
    const records: GeoRecord[] = [];

    for (const property of this.properties) {
      if (limit !== null && records.length >= limit) break;

      const { latitude, longitude } = property;
      if (latitude === null || longitude === null) continue;
      if (!containsPoint(bbox, latitude, longitude)) continue;
      if (filters.region && property.county !== filters.region) continue;
      if (filters.minSales !== undefined && property.sales.length < filters.minSales) continue;

      const sale = latestSale(property.sales, filters);
      if (saleRequired && !sale) continue;
      if (sale && filters.minPrice !== undefined && sale.price < filters.minPrice) continue;
      if (sale && filters.maxPrice !== undefined && sale.price > filters.maxPrice) continue;

      records.push({
        id: property.id,
        latitude,
        longitude,
        price: sale ? Math.round(sale.price) : null,
        label: property.address,
        region: property.county,
        date: sale ? sale.date : null,
      });
    }

    return records;
  }

  async getLatestPrices(propertyIds: number[], range: DateRange): Promise<Map<number, LatestPrice>> {
    const wanted = new Set(propertyIds);
    const prices = new Map<number, LatestPrice>();

    for (const property of this.properties) {
      if (!wanted.has(property.id)) continue;
      const sale = latestSale(property.sales, range);
      if (sale) prices.set(property.id, { price: Math.round(sale.price), date: sale.date });
    }

    return prices;
  }
}
