/**
 * Unit tests for real-count grid aggregation
 */

import { describe, it, expect } from 'vitest';
import { aggregateAll, aggregateCellSize, summarizePrices } from '../shared/gridAggregate';
import { geographicClusters } from '../shared/clustering';
import { applyFetchPlan, planViewportFetch } from '../shared/planner';
import type { GeoRecord } from '../shared/map-types';

const sale = (id: number, latitude: number | null, longitude: number | null, price: number | null): GeoRecord => ({
  id,
  latitude,
  longitude,
  price,
});

describe('aggregateCellSize', () => {
  it('should follow the zoom resolution table', () => {
    expect(aggregateCellSize(1)).toBe(0.1);
    expect(aggregateCellSize(4)).toBe(0.1);
    expect(aggregateCellSize(5)).toBe(0.05);
    expect(aggregateCellSize(7)).toBe(0.05);
    expect(aggregateCellSize(8)).toBe(0.01);
    expect(aggregateCellSize(10)).toBe(0.01);
    expect(aggregateCellSize(11)).toBe(0.005);
    expect(aggregateCellSize(18)).toBe(0.005);
  });
});

describe('summarizePrices', () => {
  it('should ignore unpriced members instead of counting them as zero', () => {
    const summary = summarizePrices([
      sale(1, 0, 0, 200000),
      sale(2, 0, 0, null),
      sale(3, 0, 0, 300001),
    ]);
    expect(summary).toEqual({ avgPrice: 250001, minPrice: 200000, maxPrice: 300001, totalSales: 2 });
  });

  it('should round the average to a whole unit', () => {
    expect(summarizePrices([sale(1, 0, 0, 100000), sale(2, 0, 0, 100001)]).avgPrice).toBe(100001);
  });

  it('should report null prices when no member is priced', () => {
    expect(summarizePrices([sale(1, 0, 0, null)])).toEqual({
      avgPrice: null,
      minPrice: null,
      maxPrice: null,
      totalSales: 0,
    });
  });
});

describe('aggregateAll', () => {
  it('should count every record in the cell, unlike a sampled clusterer', () => {
    const records: GeoRecord[] = [];
    for (let i = 0; i < 10000; i++) {
      records.push(sale(i + 1, 53.3412 + (i % 100) * 0.00001, -6.2571 - Math.floor(i / 100) * 0.00001, 250000));
    }

    const aggregates = aggregateAll(records, 10);
    expect(aggregates).toHaveLength(1);
    expect(aggregates[0].count).toBe(10000);
    expect(aggregates[0].propertyIds).toHaveLength(10000);

    // The interactive path at zoom 9 only ever sees a 500 record sample
    const plan = planViewportFetch('interactive', 9);
    const { records: sample } = applyFetchPlan(plan, records.slice(0, plan.fetchLimit ?? records.length), () => 0.5);
    const sampledTotal = geographicClusters(sample, 9).reduce((sum, c) => sum + c.count, 0);
    expect(sampledTotal).toBeLessThanOrEqual(500);
  });

  it('should report price statistics over priced members only', () => {
    const [cell] = aggregateAll([
      sale(1, 53.341, -6.251, 400000),
      sale(2, 53.342, -6.252, null),
      sale(3, 53.343, -6.253, 200000),
    ], 8);

    expect(cell.count).toBe(3);
    expect(cell.propertyIds).toEqual([1, 2, 3]);
    expect(cell.avgPrice).toBe(300000);
    expect(cell.minPrice).toBe(200000);
    expect(cell.maxPrice).toBe(400000);
    expect(cell.totalSales).toBe(2);
    expect(cell.bounds).toEqual({ north: 53.343, south: 53.341, east: -6.251, west: -6.253 });
  });

  it('should exclude records without coordinates', () => {
    const aggregates = aggregateAll([sale(1, null, -6.25, 100), sale(2, 53.34, -6.25, 100)], 8);
    expect(aggregates.flatMap(a => a.propertyIds)).toEqual([2]);
  });

  it('should return nothing for no records', () => {
    expect(aggregateAll([], 3)).toEqual([]);
  });
});
