/**
 * Unit tests for map query validation
 */

import { describe, it, expect } from 'vitest';
import {
  analysisQuerySchema,
  clustersQuerySchema,
  heatmapQuerySchema,
  pointsQuerySchema,
  toViewport,
} from '../shared/schema';

const viewport = { north: '53.4', south: '53.3', east: '-6.2', west: '-6.3' };

const failedPaths = (result: { success: boolean; error?: { issues: Array<{ path: Array<string | number> }> } }) =>
  result.error?.issues.map(issue => issue.path.join('.')) ?? [];

describe('viewport query schemas', () => {
  it('should coerce query strings and apply defaults', () => {
    expect(pointsQuerySchema.parse(viewport)).toEqual({
      north: 53.4,
      south: 53.3,
      east: -6.2,
      west: -6.3,
      maxPoints: 1000,
    });

    const clusters = clustersQuerySchema.parse(viewport);
    expect(clusters.zoom).toBe(10);
    expect(clusters.clusterMode).toBe('geographic');

    const heatmap = heatmapQuerySchema.parse(viewport);
    expect(heatmap.analysisMode).toBe('sales-heatmap');
    expect(heatmap.gridCells).toBe(40);
    expect(heatmap.format).toBe('json');
  });

  it('should reject an inverted bounding box', () => {
    const result = pointsQuerySchema.safeParse({ ...viewport, south: '53.5' });
    expect(result.success).toBe(false);
    expect(failedPaths(result)).toEqual(['south']);
  });

  it('should reject a box that crosses the antimeridian', () => {
    const result = pointsQuerySchema.safeParse({ ...viewport, west: '179', east: '-179' });
    expect(failedPaths(result)).toEqual(['west']);
  });

  it('should reject coordinates out of range', () => {
    expect(pointsQuerySchema.safeParse({ ...viewport, north: '91' }).success).toBe(false);
    expect(pointsQuerySchema.safeParse({ ...viewport, east: 'east' }).success).toBe(false);
  });

  it('should validate dates and their order', () => {
    expect(pointsQuerySchema.safeParse({ ...viewport, startDate: '2024-02-30' }).success).toBe(false);
    expect(pointsQuerySchema.safeParse({ ...viewport, startDate: '01/02/2024' }).success).toBe(false);

    const reversed = pointsQuerySchema.safeParse({ ...viewport, startDate: '2024-06-01', endDate: '2024-01-01' });
    expect(failedPaths(reversed)).toEqual(['startDate']);
  });

  it('should reject a minimum price above the maximum', () => {
    const result = pointsQuerySchema.safeParse({ ...viewport, minPrice: '500000', maxPrice: '100000' });
    expect(failedPaths(result)).toEqual(['minPrice']);
  });

  it('should bound maxPoints, zoom and gridCells', () => {
    expect(pointsQuerySchema.safeParse({ ...viewport, maxPoints: '5001' }).success).toBe(false);
    expect(clustersQuerySchema.safeParse({ ...viewport, zoom: '0' }).success).toBe(false);
    expect(heatmapQuerySchema.safeParse({ ...viewport, gridCells: '0' }).success).toBe(false);
    expect(heatmapQuerySchema.safeParse({ ...viewport, gridCells: '201' }).success).toBe(false);
  });
});

describe('analysisQuerySchema', () => {
  it('should require an analysis mode', () => {
    expect(failedPaths(analysisQuerySchema.safeParse(viewport))).toEqual(['analysisMode']);
  });

  it('should accept capitalised pattern types', () => {
    const query = analysisQuerySchema.parse({ ...viewport, analysisMode: 'spatial-patterns', patternType: 'Concentration' });
    expect(query.patternType).toBe('concentration');
    expect(query.hotspotIntensity).toBe(0.5);
  });

  it('should keep hotspot intensity within [0, 1]', () => {
    expect(analysisQuerySchema.safeParse({ ...viewport, analysisMode: 'hotspots', hotspotIntensity: '1.5' }).success).toBe(false);
  });
});

describe('toViewport', () => {
  it('should split a query into bounding box and store filters', () => {
    const query = pointsQuerySchema.parse({ ...viewport, county: 'Dublin', minSales: '2', endDate: '2024-12-31' });
    expect(toViewport(query)).toEqual({
      bbox: { north: 53.4, south: 53.3, east: -6.2, west: -6.3 },
      filters: {
        region: 'Dublin',
        startDate: undefined,
        endDate: '2024-12-31',
        minPrice: undefined,
        maxPrice: undefined,
        minSales: 2,
      },
    });
  });
});
