import type { FeatureCollection, Polygon } from 'geojson';
import type { AnalysisMode, BoundingBox, Cluster, GeoRecord, GridAggregate, HeatmapCellMetadata, HeatmapPolygonCell } from '../shared/map-types';
import type { HeatmapPoint } from '../shared/analysis';

export type MapPoint = GeoRecord;

export interface PointsResponse {
  kind: 'points';
  points: MapPoint[];
  total: number | null;        // null when truncated
  truncated: boolean;
}

export interface ClustersResponse {
  kind: 'clusters';
  clusters: Cluster[];
  totalProperties: number;     // records clustered, after sampling
  truncated: boolean;
  sampled: boolean;
  viewport: BoundingBox;
}

export interface OverviewResponse {
  kind: 'overview';
  cells: GridAggregate[];
  totalProperties: number;
  viewport: BoundingBox;
}

export interface HeatmapResponse {
  kind: 'heatmap';
  analysisMode: AnalysisMode;
  polygons: HeatmapPolygonCell[];
  totalProperties: number;
  truncated: boolean;
}

export interface HeatmapGeoJsonResponse {
  kind: 'heatmap-geojson';
  body: FeatureCollection<Polygon, HeatmapCellMetadata>;
}

/** Analysis clusters travel without their member lists */
export interface AnalysisClusterSummary {
  centerLat: number;
  centerLng: number;
  count: number;
  bounds: BoundingBox;
  avgPrice: number | null;
}

export interface AnalysisResponse {
  kind: 'analysis';
  analysisMode: AnalysisMode;
  totalProperties: number;
  truncated: boolean;
  viewport: BoundingBox;
  heatmapData: HeatmapPoint[];
  polygons: HeatmapPolygonCell[];
  clusters: AnalysisClusterSummary[];
  points: MapPoint[];
}

export type MapResponse =
  | PointsResponse
  | ClustersResponse
  | OverviewResponse
  | HeatmapResponse
  | HeatmapGeoJsonResponse
  | AnalysisResponse;
