/**
 * Viewport query planner: decides how many raw records a request may pull
 * from the store before any aggregation runs, and how an oversized fetch is
 * cut down. No COUNT query is ever needed; truncation is detected from the
 * fetch itself and disclosed to the caller.
 */

import { MAP } from '../config/map';

export type FetchPurpose = 'interactive' | 'analysis' | 'overview';

export interface PlannerCaps {
  sampledMaxZoom: number;
  lowZoomCap: number;
  oversampleFactor: number;
  highZoomCap: number;
  analysisCap: number;
}

export type FetchStrategy =
  /** fetch `cap * oversampleFactor`, then sample uniformly down to `cap` */
  | 'sample'
  /** fetch `cap + 1` by stable key; the extra row only signals truncation */
  | 'truncate'
  /** fetch everything (real-count aggregation) */
  | 'all';

export interface FetchPlan {
  purpose: FetchPurpose;
  strategy: FetchStrategy;
  cap: number | null;
  /** LIMIT handed to the store; null means unbounded */
  fetchLimit: number | null;
}

export interface PlannedRecords<T> {
  records: T[];
  truncated: boolean;
  sampled: boolean;
  fetchedCount: number;
}

export type RandomSource = () => number;

/**
 * Only interactive fetches depend on the zoom level
 */
export function planViewportFetch(purpose: 'interactive', zoomLevel: number, caps?: PlannerCaps): FetchPlan;
export function planViewportFetch(purpose: 'analysis' | 'overview', zoomLevel?: number, caps?: PlannerCaps): FetchPlan;
export function planViewportFetch(
  purpose: FetchPurpose,
  zoomLevel?: number,
  caps: PlannerCaps = MAP.planner
): FetchPlan {
  switch (purpose) {
    case 'overview':
      return { purpose, strategy: 'all', cap: null, fetchLimit: null };
    case 'analysis':
      return { purpose, strategy: 'truncate', cap: caps.analysisCap, fetchLimit: caps.analysisCap + 1 };
    case 'interactive':
      if (zoomLevel !== undefined && zoomLevel <= caps.sampledMaxZoom) {
        return {
          purpose,
          strategy: 'sample',
          cap: caps.lowZoomCap,
          fetchLimit: caps.lowZoomCap * caps.oversampleFactor,
        };
      }
      return { purpose, strategy: 'truncate', cap: caps.highZoomCap, fetchLimit: caps.highZoomCap + 1 };
  }
}

/**
 * Uniform random sample of `k` items without replacement (partial
 * Fisher-Yates over a copy). Input order is not preserved.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], k: number, random: RandomSource = Math.random): T[] {
  const pool = items.slice();
  const n = pool.length;
  const take = Math.min(Math.max(0, Math.floor(k)), n);

  for (let i = 0; i < take; i++) {
    const j = Math.min(n - 1, i + Math.floor(random() * (n - i)));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }

  return pool.slice(0, take);
}

/**
 * Cut a fetched batch down to the plan's cap
 */
export function applyFetchPlan<T>(
  plan: FetchPlan,
  fetched: T[],
  random: RandomSource = Math.random
): PlannedRecords<T> {
  const fetchedCount = fetched.length;

  if (plan.cap === null || fetchedCount <= plan.cap) {
    return { records: fetched, truncated: false, sampled: false, fetchedCount };
  }

  if (plan.strategy === 'sample') {
    return {
      records: sampleWithoutReplacement(fetched, plan.cap, random),
      truncated: true,
      sampled: true,
      fetchedCount,
    };
  }

  return { records: fetched.slice(0, plan.cap), truncated: true, sampled: false, fetchedCount };
}
