/**
 * Real-count grid aggregation for wide-area overviews.
 *
 * Unlike the interactive clusterer, the caller hands over the complete
 * filtered record set, so counts and price statistics are exact.
 */

import { MAP } from '../config/map';
import { binRecords } from './grid';
import { centroid, envelope } from './geo';
import type { GeoRecord, GridAggregate, LocatedRecord } from './map-types';

export interface AggregateOptions {
  signal?: AbortSignal;
}

export function aggregateCellSize(zoomLevel: number): number {
  const row = MAP.aggregate.resolutions.find(r => zoomLevel <= r.maxZoom);
  return row ? row.cellSize : MAP.aggregate.fallbackCellSize;
}

interface PriceSummary {
  avgPrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
  totalSales: number;
}

/**
 * Price statistics over priced members only. A cell without any priced
 * member reports nulls rather than zeros.
 */
export function summarizePrices(members: GeoRecord[]): PriceSummary {
  let sum = 0, n = 0;
  let min = Infinity, max = -Infinity;

  for (const m of members) {
    if (m.price === null) continue;
    sum += m.price;
    n++;
    if (m.price < min) min = m.price;
    if (m.price > max) max = m.price;
  }

  if (n === 0) {
    return { avgPrice: null, minPrice: null, maxPrice: null, totalSales: 0 };
  }
  return { avgPrice: Math.round(sum / n), minPrice: min, maxPrice: max, totalSales: n };
}

function toAggregate(members: LocatedRecord[]): GridAggregate {
  const center = centroid(members);
  return {
    centerLat: center.lat,
    centerLng: center.lng,
    count: members.length,
    propertyIds: members.map(m => m.id),
    ...summarizePrices(members),
    bounds: envelope(members),
  };
}

export function aggregateAll(
  records: GeoRecord[],
  zoomLevel: number,
  options: AggregateOptions = {}
): GridAggregate[] {
  if (records.length === 0) return [];

  const cells = binRecords(records, aggregateCellSize(zoomLevel));
  options.signal?.throwIfAborted();

  const aggregates: GridAggregate[] = [];
  for (const members of cells.values()) {
    aggregates.push(toAggregate(members));
  }
  return aggregates;
}
