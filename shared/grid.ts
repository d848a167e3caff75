import { InvalidArgumentError } from './errors';
import { hasCoordinates } from './geo';
import type { GeoRecord, LocatedRecord } from './map-types';

/**
 * "row:col" where row and col are the integer parts of lat / size and
 * lng / size, truncated toward zero
 */
export type GridKey = `${number}:${number}`;

export function assertValidCellSize(cellSizeDegrees: number): void {
  if (!Number.isFinite(cellSizeDegrees) || cellSizeDegrees <= 0) {
    throw new InvalidArgumentError(
      `cellSizeDegrees must be a positive finite number, got ${cellSizeDegrees}`,
      'cellSizeDegrees'
    );
  }
}

export function gridKey(lat: number, lng: number, cellSizeDegrees: number): GridKey {
  return `${Math.trunc(lat / cellSizeDegrees)}:${Math.trunc(lng / cellSizeDegrees)}`;
}

/**
 * Partition records into a uniform lat/lng grid anchored at (0, 0). Row and
 * column 0 straddle the equator and the prime meridian.
 * Records without coordinates are skipped; nothing else is dropped.
 * Single pass, one map insert per record; member order follows input order.
 */
export function binRecords<T extends GeoRecord>(
  records: Iterable<T>,
  cellSizeDegrees: number
): Map<GridKey, Array<T & LocatedRecord>> {
  assertValidCellSize(cellSizeDegrees);

  const cells = new Map<GridKey, Array<T & LocatedRecord>>();

  for (const record of records) {
    if (!hasCoordinates(record)) continue;

    const key = gridKey(record.latitude, record.longitude, cellSizeDegrees);
    const members = cells.get(key);
    if (members) {
      members.push(record);
    } else {
      cells.set(key, [record]);
    }
  }

  return cells;
}
