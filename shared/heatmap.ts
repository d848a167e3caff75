/**
 * Heatmap polygon compositor: bins records into a fixed N x N grid anchored
 * to the viewport and emits one rectangle per non-empty cell.
 */

import { MAP } from '../config/map';
import { InvalidArgumentError } from './errors';
import { assertValidBoundingBox, hasCoordinates, rectangleRing } from './geo';
import type { AnalysisMode, BoundingBox, GeoRecord, HeatmapCellMetadata, HeatmapPolygonCell } from './map-types';

/**
 * `cells + 1` evenly spaced edges from `lo` to `hi`; the last edge is `hi` exactly
 */
export function linearEdges(lo: number, hi: number, cells: number): number[] {
  const edges = new Array<number>(cells + 1);
  for (let i = 0; i < cells; i++) {
    edges[i] = lo + ((hi - lo) * i) / cells;
  }
  edges[cells] = hi;
  return edges;
}

/**
 * Index of the cell holding `value`, or -1 when outside [first, last].
 * Cells are half-open [edge_i, edge_i+1) except the last, which also
 * includes its upper edge.
 */
export function cellIndex(edges: number[], value: number): number {
  const last = edges.length - 1;
  if (!(value >= edges[0] && value <= edges[last])) return -1;
  if (value === edges[last]) return last - 1;

  // first edge strictly greater than value
  let lo = 0, hi = last;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (edges[mid] > value) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo - 1;
}

/**
 * Aggregate records into polygon cells with normalized intensity.
 *
 * `analysisMode` does not change the grid or the intensity formula; callers
 * layer mode-specific point data on top (see analysis.ts).
 */
export function computePolygons(
  records: GeoRecord[],
  bbox: BoundingBox,
  analysisMode: AnalysisMode,
  gridCells: number = MAP.heatmap.defaultGridCells
): HeatmapPolygonCell[] {
  if (!Number.isInteger(gridCells) || gridCells <= 0) {
    throw new InvalidArgumentError(`gridCells must be a positive integer, got ${gridCells}`, 'gridCells');
  }
  assertValidBoundingBox(bbox);

  if (records.length === 0) return [];

  const latEdges = linearEdges(bbox.south, bbox.north, gridCells);
  const lngEdges = linearEdges(bbox.west, bbox.east, gridCells);

  const size = gridCells * gridCells;
  const counts = new Uint32Array(size);
  const priceSums = new Float64Array(size);
  const priceCounts = new Uint32Array(size);
  let maxCount = 0;

  for (const record of records) {
    if (!hasCoordinates(record)) continue;

    const row = cellIndex(latEdges, record.latitude);
    const col = cellIndex(lngEdges, record.longitude);
    if (row < 0 || col < 0) continue;

    const idx = row * gridCells + col;
    counts[idx]++;
    if (counts[idx] > maxCount) maxCount = counts[idx];

    if (record.price !== null) {
      priceSums[idx] += record.price;
      priceCounts[idx]++;
    }
  }

  const polygons: HeatmapPolygonCell[] = [];
  if (maxCount === 0) return polygons;

  for (let row = 0; row < gridCells; row++) {
    for (let col = 0; col < gridCells; col++) {
      const idx = row * gridCells + col;
      const count = counts[idx];
      if (count === 0) continue;

      const metadata: HeatmapCellMetadata = {
        intensity: Math.min(Math.max(count / maxCount, 0), 1),
        salesCount: count,
      };
      if (priceCounts[idx] > 0) {
        metadata.avgPrice = Math.round(priceSums[idx] / priceCounts[idx]);
      }

      polygons.push({
        coordinates: rectangleRing(latEdges[row], latEdges[row + 1], lngEdges[col], lngEdges[col + 1]),
        metadata,
      });
    }
  }

  return polygons;
}
