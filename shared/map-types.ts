/**
 * Core types shared by the aggregation engine and the serving layer
 */

/** A geo-tagged sale record, built fresh per request from the property store */
export interface GeoRecord {
  id: number;
  latitude: number | null;
  longitude: number | null;
  /** Latest sale price in the queried period, whole currency units */
  price: number | null;
  /** Address text */
  label?: string | null;
  /** County / administrative region */
  region?: string | null;
  /** ISO date (YYYY-MM-DD) of the sale behind `price` */
  date?: string | null;
}

export type LocatedRecord = GeoRecord & { latitude: number; longitude: number };

export interface BoundingBox {
  north: number;
  south: number;
  east: number;
  west: number;
}

export const CLUSTER_MODES = ['geographic', 'price', 'size'] as const;
export type ClusterMode = typeof CLUSTER_MODES[number];

export const ANALYSIS_MODES = [
  'spatial-patterns',
  'hotspots',
  'cluster-identification',
  'growth-decline',
  'price-heatmap',
  'sales-heatmap',
] as const;
export type AnalysisMode = typeof ANALYSIS_MODES[number];

export interface Cluster {
  centerLat: number;
  centerLng: number;
  count: number;
  bounds: BoundingBox;
  members: GeoRecord[];
}

export interface GridAggregate {
  centerLat: number;
  centerLng: number;
  count: number;
  propertyIds: number[];
  avgPrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
  /** Members with a recorded sale price */
  totalSales: number;
  bounds: BoundingBox;
}

/** [lng, lat] */
export type LngLat = [number, number];

export interface HeatmapCellMetadata {
  intensity: number;
  salesCount: number;
  avgPrice?: number;
}

export interface HeatmapPolygonCell {
  /** Closed ring of 5 points, first = last */
  coordinates: LngLat[];
  metadata: HeatmapCellMetadata;
}

export interface ViewportFilters {
  region?: string;
  startDate?: string;
  endDate?: string;
  minPrice?: number;
  maxPrice?: number;
  minSales?: number;
}

export interface DateRange {
  startDate?: string;
  endDate?: string;
}

export const PATTERN_TYPES = ['density', 'concentration'] as const;
export type PatternType = typeof PATTERN_TYPES[number];
