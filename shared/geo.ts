/**
 * Bounding box and GeoJSON helpers
 * Centralizes viewport validation and [lng, lat] ring construction
 */

import type { Feature, FeatureCollection, Polygon } from 'geojson';
import { InvalidArgumentError } from './errors';
import type { BoundingBox, GeoRecord, HeatmapCellMetadata, HeatmapPolygonCell, LngLat, LocatedRecord } from './map-types';

export function hasCoordinates(record: GeoRecord): record is LocatedRecord {
  return typeof record.latitude === 'number' && Number.isFinite(record.latitude) &&
    typeof record.longitude === 'number' && Number.isFinite(record.longitude);
}

/**
 * Reject bounding boxes that cannot describe a viewport.
 * Antimeridian wraparound (west > east) is not supported.
 */
export function assertValidBoundingBox(bbox: BoundingBox): void {
  const { north, south, east, west } = bbox;
  if (![north, south, east, west].every(Number.isFinite)) {
    throw new InvalidArgumentError('Bounding box edges must be finite numbers', 'bbox');
  }
  if (south > north) {
    throw new InvalidArgumentError(`Bounding box south (${south}) exceeds north (${north})`, 'bbox');
  }
  if (west > east) {
    throw new InvalidArgumentError(`Bounding box west (${west}) exceeds east (${east})`, 'bbox');
  }
}

export function containsPoint(bbox: BoundingBox, lat: number, lng: number): boolean {
  return lat >= bbox.south && lat <= bbox.north && lng >= bbox.west && lng <= bbox.east;
}

/**
 * Closed GeoJSON ring ([lng, lat], 5 points) for a lat/lng rectangle
 */
export function rectangleRing(latLo: number, latHi: number, lngLo: number, lngHi: number): LngLat[] {
  return [
    [lngLo, latLo],
    [lngHi, latLo],
    [lngHi, latHi],
    [lngLo, latHi],
    [lngLo, latLo],
  ];
}

/**
 * Min/max envelope of a set of located records
 */
export function envelope(records: LocatedRecord[]): BoundingBox {
  let north = -Infinity, south = Infinity, east = -Infinity, west = Infinity;
  for (const r of records) {
    if (r.latitude > north) north = r.latitude;
    if (r.latitude < south) south = r.latitude;
    if (r.longitude > east) east = r.longitude;
    if (r.longitude < west) west = r.longitude;
  }
  return { north, south, east, west };
}

/**
 * Arithmetic mean of member coordinates (not the grid cell midpoint)
 */
export function centroid(records: LocatedRecord[]): { lat: number; lng: number } {
  let latSum = 0, lngSum = 0;
  for (const r of records) {
    latSum += r.latitude;
    lngSum += r.longitude;
  }
  return { lat: latSum / records.length, lng: lngSum / records.length };
}

/**
 * Convert heatmap cells to a GeoJSON FeatureCollection for map libraries
 */
export function toFeatureCollection(cells: HeatmapPolygonCell[]): FeatureCollection<Polygon, HeatmapCellMetadata> {
  const features: Feature<Polygon, HeatmapCellMetadata>[] = cells.map(cell => ({
    type: 'Feature',
    properties: { ...cell.metadata },
    geometry: {
      type: 'Polygon',
      coordinates: [cell.coordinates],
    },
  }));

  return { type: 'FeatureCollection', features };
}
