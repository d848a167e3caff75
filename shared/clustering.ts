/**
 * Interactive map clustering.
 *
 * Groups records into grid cells whose size halves with every zoom level
 * above the base zoom, and summarizes each non-empty cell as a Cluster.
 */

import { MAP } from '../config/map';
import { binRecords } from './grid';
import { centroid, envelope } from './geo';
import type { Cluster, ClusterMode, GeoRecord, LocatedRecord } from './map-types';

export interface ClusterOptions {
  /** Checked between binning and cluster construction */
  signal?: AbortSignal;
}

export function clusterCellSize(zoomLevel: number): number {
  const { baseCellSize, baseZoom, minCellSize } = MAP.cluster;
  return Math.max(minCellSize, baseCellSize / Math.pow(2, zoomLevel - baseZoom));
}

/**
 * Index of the lower-inclusive price bucket holding `price`, or -1
 */
export function priceBucketIndex(price: number): number {
  return MAP.priceBuckets.findIndex(([lo, hi]) => lo <= price && price < hi);
}

function toCluster(members: LocatedRecord[]): Cluster {
  const center = centroid(members);
  return {
    centerLat: center.lat,
    centerLng: center.lng,
    count: members.length,
    bounds: envelope(members),
    members,
  };
}

export function geographicClusters(
  records: GeoRecord[],
  zoomLevel: number,
  options: ClusterOptions = {}
): Cluster[] {
  if (records.length === 0) return [];

  const cells = binRecords(records, clusterCellSize(zoomLevel));
  options.signal?.throwIfAborted();

  const clusters: Cluster[] = [];
  for (const members of cells.values()) {
    clusters.push(toCluster(members));
  }
  return clusters;
}

/**
 * Cluster each price bucket independently. Unpriced records are dropped.
 */
export function priceClusters(
  records: GeoRecord[],
  zoomLevel: number,
  options: ClusterOptions = {}
): Cluster[] {
  const buckets: GeoRecord[][] = MAP.priceBuckets.map(() => []);

  for (const record of records) {
    if (record.price === null) continue;
    const index = priceBucketIndex(record.price);
    if (index >= 0) buckets[index].push(record);
  }

  const clusters: Cluster[] = [];
  for (const bucket of buckets) {
    options.signal?.throwIfAborted();
    clusters.push(...geographicClusters(bucket, zoomLevel, options));
  }
  return clusters;
}

/**
 * Cluster records for a map viewport.
 *
 * `size` mode has no size attribute to partition on and currently behaves
 * exactly like `geographic`. Output order is unspecified.
 */
export function clusterRecords(
  records: GeoRecord[],
  zoomLevel: number,
  mode: ClusterMode = 'geographic',
  options: ClusterOptions = {}
): Cluster[] {
  switch (mode) {
    case 'price':
      return priceClusters(records, zoomLevel, options);
    case 'size':
    case 'geographic':
      return geographicClusters(records, zoomLevel, options);
  }
}
