import { MAP } from "../config/map";
import { buildAnalysisOverlay, splitPeriod, type PeriodPrices } from "@shared/analysis";
import { clusterRecords } from "@shared/clustering";
import { toFeatureCollection } from "@shared/geo";
import { aggregateAll } from "@shared/gridAggregate";
import { computePolygons } from "@shared/heatmap";
import { applyFetchPlan, planViewportFetch, type FetchPlan, type PlannedRecords, type RandomSource } from "@shared/planner";
import {
  toViewport,
  type AnalysisQuery,
  type ClustersQuery,
  type HeatmapQuery,
  type OverviewQuery,
  type PointsQuery,
} from "@shared/schema";
import type { BoundingBox, GeoRecord, ViewportFilters } from "@shared/map-types";
import type {
  AnalysisResponse,
  ClustersResponse,
  HeatmapGeoJsonResponse,
  HeatmapResponse,
  MapResponse,
  OverviewResponse,
  PointsResponse,
} from "../types/map";
import type { IPropertyStore, LatestPrice } from "./storage";

export type MapRequest =
  | { mode: "points"; query: PointsQuery }
  | { mode: "clusters"; query: ClustersQuery }
  | { mode: "overview"; query: OverviewQuery }
  | { mode: "heatmap"; query: HeatmapQuery }
  | { mode: "analysis"; query: AnalysisQuery };

/**
 * Single entry point for every map endpoint: plan the fetch, load records
 * from the store, cut them down per the plan, then run the aggregation the
 * request mode asks for.
 */
export class MapService {
  constructor(
    private readonly store: IPropertyStore,
    private readonly random: RandomSource = Math.random
  ) {}

  async aggregate(request: MapRequest, signal?: AbortSignal): Promise<MapResponse> {
    switch (request.mode) {
      case "points":
        return this.points(request.query, signal);
      case "clusters":
        return this.clusters(request.query, signal);
      case "overview":
        return this.overview(request.query, signal);
      case "heatmap":
        return this.heatmap(request.query, signal);
      case "analysis":
        return this.analysis(request.query, signal);
    }
  }

  private async load(
    plan: FetchPlan,
    bbox: BoundingBox,
    filters: ViewportFilters,
    signal?: AbortSignal
  ): Promise<PlannedRecords<GeoRecord>> {
    const fetched = await this.store.fetchViewport({ bbox, filters, limit: plan.fetchLimit });
    signal?.throwIfAborted();
    return applyFetchPlan(plan, fetched, this.random);
  }

  private async points(query: PointsQuery, signal?: AbortSignal): Promise<PointsResponse> {
    const { bbox, filters } = toViewport(query);
    // One extra row tells us whether the viewport holds more
    const fetched = await this.store.fetchViewport({ bbox, filters, limit: query.maxPoints + 1 });
    signal?.throwIfAborted();

    const truncated = fetched.length > query.maxPoints;
    const points = truncated ? fetched.slice(0, query.maxPoints) : fetched;
    return { kind: "points", points, total: truncated ? null : points.length, truncated };
  }

  private async clusters(query: ClustersQuery, signal?: AbortSignal): Promise<ClustersResponse> {
    const { bbox, filters } = toViewport(query);
    const { records, truncated, sampled } = await this.load(planViewportFetch("interactive", query.zoom), bbox, filters, signal);

    return {
      kind: "clusters",
      clusters: clusterRecords(records, query.zoom, query.clusterMode, { signal }),
      totalProperties: records.length,
      truncated,
      sampled,
      viewport: bbox,
    };
  }

  private async overview(query: OverviewQuery, signal?: AbortSignal): Promise<OverviewResponse> {
    const { bbox, filters } = toViewport(query);
    const { records } = await this.load(planViewportFetch("overview"), bbox, filters, signal);

    return {
      kind: "overview",
      cells: aggregateAll(records, query.zoom, { signal }),
      totalProperties: records.length,
      viewport: bbox,
    };
  }

  private async heatmap(query: HeatmapQuery, signal?: AbortSignal): Promise<HeatmapResponse | HeatmapGeoJsonResponse> {
    const { bbox, filters } = toViewport(query);
    const { records, truncated } = await this.load(planViewportFetch("analysis"), bbox, filters, signal);
    const polygons = computePolygons(records, bbox, query.analysisMode, query.gridCells);

    if (query.format === "geojson") {
      return { kind: "heatmap-geojson", body: toFeatureCollection(polygons) };
    }
    return {
      kind: "heatmap",
      analysisMode: query.analysisMode,
      polygons,
      totalProperties: records.length,
      truncated,
    };
  }

  private async analysis(query: AnalysisQuery, signal?: AbortSignal): Promise<AnalysisResponse> {
    const { bbox, filters } = toViewport(query);
    const { records, truncated } = await this.load(planViewportFetch("analysis"), bbox, filters, signal);

    let periodPrices: PeriodPrices | undefined;
    if (query.analysisMode === "growth-decline") {
      periodPrices = await this.periodPrices(records, filters, signal);
    }

    const overlay = buildAnalysisOverlay(query.analysisMode, records, {
      patternType: query.patternType,
      hotspotIntensity: query.hotspotIntensity,
      periodPrices,
      signal,
    });

    return {
      kind: "analysis",
      analysisMode: query.analysisMode,
      totalProperties: records.length,
      truncated,
      viewport: bbox,
      heatmapData: overlay.heatmapData,
      polygons: computePolygons(records, bbox, query.analysisMode, query.gridCells),
      clusters: overlay.clusters.map(({ centerLat, centerLng, count, bounds, avgPrice }) => ({
        centerLat,
        centerLng,
        count,
        bounds,
        avgPrice,
      })),
      points: records.slice(0, MAP.analysis.pointsLimit),
    };
  }

  /** Latest prices in each half of the filtered period, or undefined when the period is too short */
  private async periodPrices(
    records: GeoRecord[],
    filters: ViewportFilters,
    signal?: AbortSignal
  ): Promise<PeriodPrices | undefined> {
    const halves = splitPeriod(filters);
    if (!halves || records.length === 0) return undefined;

    const ids = records.map(r => r.id);
    const early = await this.store.getLatestPrices(ids, halves.early);
    const late = await this.store.getLatestPrices(ids, halves.late);
    signal?.throwIfAborted();

    const toPrices = (source: Map<number, LatestPrice>): Map<number, number> => {
      const prices = new Map<number, number>();
      for (const [id, { price }] of source) prices.set(id, price);
      return prices;
    };
    return { early: toPrices(early), late: toPrices(late) };
  }
}
