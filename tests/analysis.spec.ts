/**
 * Unit tests for analysis overlays
 */

import { describe, it, expect } from 'vitest';
import {
  buildAnalysisOverlay,
  clamp01,
  clusterIdentification,
  growthDecline,
  hotspots,
  priceHeatmap,
  salesHeatmap,
  spatialPatterns,
  splitPeriod,
} from '../shared/analysis';
import { ANALYSIS_MODES, type GeoRecord } from '../shared/map-types';

const sale = (id: number, latitude: number | null, longitude: number | null, price: number | null): GeoRecord => ({
  id,
  latitude,
  longitude,
  price,
});

// Three sales in one 0.01 degree cell, one in the next cell north
const neighbourhood = [
  sale(1, 53.3412, -6.2571, 200000),
  sale(2, 53.3414, -6.2573, null),
  sale(3, 53.3416, -6.2575, 200000),
  sale(4, 53.3612, -6.2571, 400000),
  sale(5, null, -6.2571, 900000),
];

describe('clamp01', () => {
  it('should clamp into [0, 1] and map NaN to 0', () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(0.4)).toBe(0.4);
    expect(clamp01(3)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe('splitPeriod', () => {
  it('should split the range at its midpoint with both halves sharing the midpoint', () => {
    expect(splitPeriod({ startDate: '2024-01-01', endDate: '2024-12-31' })).toEqual({
      early: { startDate: '2024-01-01', endDate: '2024-07-01' },
      late: { startDate: '2024-07-01', endDate: '2024-12-31' },
    });
  });

  it('should return null for spans shorter than the minimum', () => {
    expect(splitPeriod({ startDate: '2024-01-01', endDate: '2024-01-20' })).toBeNull();
  });

  it('should return null when a bound is missing', () => {
    expect(splitPeriod({ startDate: '2024-01-01' })).toBeNull();
    expect(splitPeriod({})).toBeNull();
  });
});

describe('spatialPatterns', () => {
  it('should give every located record full intensity for density', () => {
    const points = spatialPatterns(neighbourhood, 'density');
    expect(points).toHaveLength(4);
    expect(points.every(p => p.intensity === 1)).toBe(true);
  });

  it('should scale intensity by price for concentration', () => {
    const points = spatialPatterns([
      sale(1, 53.34, -6.25, 250000),
      sale(2, 53.34, -6.25, null),
      sale(3, 53.34, -6.25, 2_000_000),
    ], 'concentration');
    expect(points.map(p => p.intensity)).toEqual([0.25, 0.5, 1]);
  });
});

describe('hotspots', () => {
  it('should weight cell density by the hotspot intensity', () => {
    const points = hotspots(neighbourhood, 0.5);
    expect(points).toHaveLength(2);
    expect(points[0].intensity).toBe(0.5);
    expect(points[0].data?.salesCount).toBe(3);
    expect(points[0].lat).toBeCloseTo(53.3414, 10);
    expect(points[1].intensity).toBeCloseTo(1 / 6, 10);
    expect(points[1].data?.salesCount).toBe(1);
  });
});

describe('clusterIdentification', () => {
  it('should saturate intensity at one hundred sales and attach average prices', () => {
    const { heatmapData, clusters } = clusterIdentification([
      sale(1, 53.3412, -6.2571, 300000),
      sale(2, 53.342, -6.259, 500000),
      sale(3, 53.4, -6.2571, null),
    ]);

    expect(clusters).toHaveLength(2);
    expect(heatmapData[0].intensity).toBe(0.02);
    expect(heatmapData[0].data).toEqual({ intensity: 0.02, salesCount: 2, avgPrice: 400000 });
    expect(clusters[1].avgPrice).toBeNull();
    expect(heatmapData[1].data).toEqual({ intensity: 0.01, salesCount: 1 });
  });
});

describe('growthDecline', () => {
  it('should map the change between period halves onto intensity', () => {
    const points = growthDecline(neighbourhood, {
      early: new Map([[1, 200000], [3, 300000], [4, 400000]]),
      late: new Map([[1, 250000], [3, 350000]]),
    });

    // The northern cell has no late price and is skipped
    expect(points).toHaveLength(1);
    expect(points[0].intensity).toBeCloseTo(0.6, 10);
    expect(points[0].data).toEqual({ intensity: points[0].intensity, changePercent: 20, earlyAvg: 250000, lateAvg: 300000 });
  });

  it('should clamp extreme changes', () => {
    const points = growthDecline([sale(1, 53.34, -6.25, null)], {
      early: new Map([[1, 100000]]),
      late: new Map([[1, 400000]]),
    });
    expect(points[0].intensity).toBe(1);
    expect(points[0].data?.changePercent).toBe(300);
  });

  it('should return nothing from buildAnalysisOverlay without period prices', () => {
    expect(buildAnalysisOverlay('growth-decline', neighbourhood).heatmapData).toEqual([]);
  });
});

describe('priceHeatmap', () => {
  it('should scale average cell prices against the highest average', () => {
    const points = priceHeatmap(neighbourhood);
    expect(points.map(p => p.intensity)).toEqual([0.5, 1]);
    expect(points.map(p => p.data?.avgPrice)).toEqual([200000, 400000]);
  });
});

describe('salesHeatmap', () => {
  it('should scale cluster counts against the largest cluster', () => {
    const { heatmapData, clusters } = salesHeatmap(neighbourhood);
    expect(clusters.map(c => c.count)).toEqual([3, 1]);
    expect(heatmapData[0].intensity).toBe(1);
    expect(heatmapData[1].intensity).toBeCloseTo(1 / 3, 10);
  });
});

describe('buildAnalysisOverlay', () => {
  it('should keep every intensity within [0, 1] for every mode', () => {
    for (const mode of ANALYSIS_MODES) {
      const overlay = buildAnalysisOverlay(mode, neighbourhood, {
        patternType: 'concentration',
        hotspotIntensity: 1,
        periodPrices: { early: new Map([[1, 500000]]), late: new Map([[1, 100]]) },
      });
      for (const point of overlay.heatmapData) {
        expect(point.intensity).toBeGreaterThanOrEqual(0);
        expect(point.intensity).toBeLessThanOrEqual(1);
      }
    }
  });

  it('should return no points for no records', () => {
    for (const mode of ANALYSIS_MODES) {
      expect(buildAnalysisOverlay(mode, []).heatmapData).toEqual([]);
    }
  });
});
