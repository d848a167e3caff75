/**
 * Response cache for the map endpoints.
 *
 * Sits outside the aggregation core; the core stays pure and the serving
 * layer decides what to memoize.
 */

import { createHash } from "crypto";
import { LRUCache } from "lru-cache";

export interface CacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
}

export interface StateStore<V extends {}> {
  put(key: string, value: V, ttlMs: number): void;
  get(key: string): V | undefined;
  clear(): void;
  stats(): CacheStats;
}

export class LruStateStore<V extends {}> implements StateStore<V> {
  private cache: LRUCache<string, V>;
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number) {
    this.cache = new LRUCache<string, V>({ max: maxEntries });
  }

  put(key: string, value: V, ttlMs: number): void {
    this.cache.set(key, value, { ttl: ttlMs });
  }

  get(key: string): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { size: this.cache.size, maxEntries: this.maxEntries, hits: this.hits, misses: this.misses };
  }
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** Key independent of argument property order */
export function cacheKey(name: string, args: unknown): string {
  const digest = createHash("sha1").update(stableStringify(args)).digest("hex");
  return `${name}:${digest}`;
}

export async function memoize<V extends {}>(
  store: StateStore<V>,
  name: string,
  args: unknown,
  ttlMs: number,
  compute: () => Promise<V>
): Promise<V> {
  const key = cacheKey(name, args);
  const cached = store.get(key);
  if (cached !== undefined) return cached;

  const value = await compute();
  store.put(key, value, ttlMs);
  return value;
}
