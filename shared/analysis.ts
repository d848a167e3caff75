/**
 * Analysis overlays: per-point intensity functions layered on top of the
 * grid binner and clusterer. Heatmap polygons are produced separately by
 * computePolygons and do not vary by mode.
 */

import { addDays, differenceInCalendarDays, format, parseISO } from 'date-fns';
import { MAP } from '../config/map';
import { geographicClusters } from './clustering';
import { binRecords } from './grid';
import { centroid, hasCoordinates } from './geo';
import { summarizePrices } from './gridAggregate';
import type { AnalysisMode, Cluster, DateRange, GeoRecord, PatternType } from './map-types';

export interface HeatmapPointData {
  intensity: number;
  salesCount?: number;
  avgPrice?: number;
  changePercent?: number;
  earlyAvg?: number;
  lateAvg?: number;
}

export interface HeatmapPoint {
  lat: number;
  lng: number;
  intensity: number;
  data?: HeatmapPointData;
}

export interface AnalysisCluster extends Cluster {
  avgPrice: number | null;
}

/** Latest price per record id in the early and late halves of a period */
export interface PeriodPrices {
  early: Map<number, number>;
  late: Map<number, number>;
}

export interface AnalysisOptions {
  patternType?: PatternType;
  hotspotIntensity?: number;
  periodPrices?: PeriodPrices;
  signal?: AbortSignal;
}

export interface AnalysisOverlay {
  heatmapData: HeatmapPoint[];
  clusters: AnalysisCluster[];
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function maxOf(values: number[]): number {
  let max = 0;
  for (const v of values) if (v > max) max = v;
  return max;
}

function withAvgPrice(cluster: Cluster): AnalysisCluster {
  return { ...cluster, avgPrice: summarizePrices(cluster.members).avgPrice };
}

/**
 * Split [startDate, endDate] at its midpoint. Both halves include the
 * midpoint day. Returns null when either bound is missing or the span is
 * shorter than `minDays`.
 */
export function splitPeriod(
  range: DateRange,
  minDays: number = MAP.analysis.minGrowthSpanDays
): { early: Required<DateRange>; late: Required<DateRange> } | null {
  if (!range.startDate || !range.endDate) return null;

  const start = parseISO(range.startDate);
  const end = parseISO(range.endDate);
  const span = differenceInCalendarDays(end, start);
  if (span < minDays) return null;

  const mid = format(addDays(start, Math.floor(span / 2)), 'yyyy-MM-dd');
  return {
    early: { startDate: range.startDate, endDate: mid },
    late: { startDate: mid, endDate: range.endDate },
  };
}

export function spatialPatterns(records: GeoRecord[], patternType: PatternType = 'density'): HeatmapPoint[] {
  const points: HeatmapPoint[] = [];
  for (const r of records) {
    if (!hasCoordinates(r)) continue;

    let intensity = 1;
    if (patternType === 'concentration') {
      intensity = r.price !== null ? r.price / MAP.analysis.concentrationPrice : 0.5;
    }
    points.push({ lat: r.latitude, lng: r.longitude, intensity: clamp01(intensity) });
  }
  return points;
}

export function hotspots(
  records: GeoRecord[],
  hotspotIntensity: number = MAP.analysis.defaultHotspotIntensity
): HeatmapPoint[] {
  const cells = [...binRecords(records, MAP.analysis.gridSize).values()];
  const maxCount = maxOf(cells.map(c => c.length));

  return cells.map(members => {
    const center = centroid(members);
    const intensity = clamp01((members.length / maxCount) * hotspotIntensity);
    return {
      lat: center.lat,
      lng: center.lng,
      intensity,
      data: { intensity, salesCount: members.length },
    };
  });
}

export function clusterIdentification(records: GeoRecord[], signal?: AbortSignal): AnalysisOverlay {
  const clusters = geographicClusters(records, MAP.analysis.clusterZoom, { signal }).map(withAvgPrice);

  const heatmapData = clusters.map(cluster => {
    const intensity = clamp01(cluster.count / MAP.analysis.clusterSaturation);
    const data: HeatmapPointData = { intensity, salesCount: cluster.count };
    if (cluster.avgPrice !== null) data.avgPrice = cluster.avgPrice;
    return { lat: cluster.centerLat, lng: cluster.centerLng, intensity, data };
  });

  return { heatmapData, clusters };
}

/**
 * Price change between the early and late halves of the period, per cell.
 * Intensity maps -100%..+100% onto 0..1 with 0.5 meaning no change.
 */
export function growthDecline(records: GeoRecord[], periodPrices: PeriodPrices): HeatmapPoint[] {
  const points: HeatmapPoint[] = [];

  for (const members of binRecords(records, MAP.analysis.gridSize).values()) {
    const early: number[] = [];
    const late: number[] = [];
    for (const m of members) {
      const e = periodPrices.early.get(m.id);
      const l = periodPrices.late.get(m.id);
      if (e !== undefined && e > 0) early.push(e);
      if (l !== undefined && l > 0) late.push(l);
    }
    if (early.length === 0 || late.length === 0) continue;

    const earlyAvg = average(early);
    const lateAvg = average(late);
    const changePercent = ((lateAvg - earlyAvg) / earlyAvg) * 100;
    const intensity = clamp01(changePercent / 200 + 0.5);
    const center = centroid(members);

    points.push({
      lat: center.lat,
      lng: center.lng,
      intensity,
      data: {
        intensity,
        changePercent: round2(changePercent),
        earlyAvg: round2(earlyAvg),
        lateAvg: round2(lateAvg),
      },
    });
  }

  return points;
}

export function priceHeatmap(records: GeoRecord[]): HeatmapPoint[] {
  const priced = records.filter(r => r.price !== null);
  const cells = [...binRecords(priced, MAP.analysis.gridSize).values()].map(members => ({
    members,
    avgPrice: summarizePrices(members).avgPrice ?? 0,
  }));
  const maxAvg = maxOf(cells.map(c => c.avgPrice));

  return cells.map(({ members, avgPrice }) => {
    const center = centroid(members);
    const intensity = maxAvg > 0 ? clamp01(avgPrice / maxAvg) : 0;
    return { lat: center.lat, lng: center.lng, intensity, data: { intensity, avgPrice } };
  });
}

export function salesHeatmap(records: GeoRecord[], signal?: AbortSignal): AnalysisOverlay {
  const clusters = geographicClusters(records, MAP.analysis.clusterZoom, { signal }).map(withAvgPrice);
  const maxSales = maxOf(clusters.map(c => c.count));

  const heatmapData = clusters.map(cluster => {
    const intensity = maxSales > 0 ? clamp01(cluster.count / maxSales) : 0;
    return {
      lat: cluster.centerLat,
      lng: cluster.centerLng,
      intensity,
      data: { intensity, salesCount: cluster.count },
    };
  });

  return { heatmapData, clusters };
}

export function buildAnalysisOverlay(
  mode: AnalysisMode,
  records: GeoRecord[],
  options: AnalysisOptions = {}
): AnalysisOverlay {
  switch (mode) {
    case 'spatial-patterns':
      return { heatmapData: spatialPatterns(records, options.patternType), clusters: [] };
    case 'hotspots':
      return { heatmapData: hotspots(records, options.hotspotIntensity), clusters: [] };
    case 'cluster-identification':
      return clusterIdentification(records, options.signal);
    case 'growth-decline':
      return {
        heatmapData: options.periodPrices ? growthDecline(records, options.periodPrices) : [],
        clusters: [],
      };
    case 'price-heatmap':
      return { heatmapData: priceHeatmap(records), clusters: [] };
    case 'sales-heatmap':
      return salesHeatmap(records, options.signal);
  }
}
