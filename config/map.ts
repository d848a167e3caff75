export const MAP = {
  // Interactive clusterer: cellSize = max(minCellSize, baseCellSize / 2^(zoom - baseZoom))
  cluster: {
    baseCellSize: 0.5,
    baseZoom: 5,
    minCellSize: 0.01,
  },
  // Real-count aggregator: step table, first row whose maxZoom >= zoom wins
  aggregate: {
    resolutions: [
      { maxZoom: 4, cellSize: 0.1 },
      { maxZoom: 7, cellSize: 0.05 },
      { maxZoom: 10, cellSize: 0.01 },
    ],
    fallbackCellSize: 0.005,
  },
  priceBuckets: [
    [0, 100_000],
    [100_000, 200_000],
    [200_000, 300_000],
    [300_000, 400_000],
    [400_000, 500_000],
    [500_000, 750_000],
    [750_000, 1_000_000],
    [1_000_000, Infinity],
  ],
  planner: {
    sampledMaxZoom: 9,
    lowZoomCap: 500,
    oversampleFactor: 3,
    highZoomCap: 5000,
    analysisCap: 140_000,
  },
  heatmap: {
    defaultGridCells: 40,
    maxGridCells: 200,
  },
  analysis: {
    gridSize: 0.01, // ~1km
    clusterZoom: 10,
    clusterSaturation: 100,
    concentrationPrice: 1_000_000,
    defaultHotspotIntensity: 0.5,
    minGrowthSpanDays: 30,
    pointsLimit: 1000,
  },
  points: {
    defaultMax: 1000,
    max: 5000,
  },
  // Latest-price lookups are chunked to stay under driver parameter limits
  priceLookupBatchSize: 10_000,
} as const;
