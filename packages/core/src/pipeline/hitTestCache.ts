/**
 * packages/core/src/pipeline/hitTestCache.ts — Generation-keyed hit-test results.
 *
 * Entries are keyed by (generation, x, y). Completing layout or paint bumps
 * the generation, which drops every entry at once. Past `capacity` the least
 * recently used entry is evicted; both lookups and stores count as use.
 */

import { invalidProps } from "../errors.js";
import type { HitTestEntry } from "../render/renderTree.js";

export const DEFAULT_HIT_TEST_CACHE_CAPACITY = 256;

export type HitTestCacheStats = Readonly<{
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before any lookup. */
  hitRate: number;
  size: number;
  generation: number;
}>;

export type HitTestCache = Readonly<{
  get: (x: number, y: number) => readonly HitTestEntry[] | undefined;
  set: (x: number, y: number, path: readonly HitTestEntry[]) => void;
  invalidate: () => void;
  generation: () => number;
  stats: () => HitTestCacheStats;
  resetStats: () => void;
}>;

export function createHitTestCache(opts: Readonly<{ capacity?: number }> = {}): HitTestCache {
  const capacity = opts.capacity ?? DEFAULT_HIT_TEST_CACHE_CAPACITY;
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw invalidProps(`hitTestCache: capacity must be a positive integer (got ${String(capacity)})`);
  }
  const entries = new Map<string, readonly HitTestEntry[]>();
  let generation = 0;
  let hits = 0;
  let misses = 0;

  const keyOf = (x: number, y: number): string => `${String(generation)}:${String(x)}:${String(y)}`;

  return Object.freeze({
    get: (x: number, y: number) => {
      const key = keyOf(x, y);
      const hit = entries.get(key);
      if (hit === undefined) {
        misses++;
        return undefined;
      }
      hits++;
      entries.delete(key);
      entries.set(key, hit);
      return hit;
    },
    set: (x: number, y: number, path: readonly HitTestEntry[]) => {
      const key = keyOf(x, y);
      entries.delete(key);
      entries.set(key, path);
      while (entries.size > capacity) {
        const oldest = entries.keys().next();
        if (oldest.done === true) break;
        entries.delete(oldest.value);
      }
    },
    invalidate: () => {
      generation++;
      entries.clear();
    },
    generation: () => generation,
    stats: () =>
      Object.freeze({
        hits,
        misses,
        hitRate: hits + misses === 0 ? 0 : hits / (hits + misses),
        size: entries.size,
        generation,
      }),
    resetStats: () => {
      hits = 0;
      misses = 0;
    },
  });
}
