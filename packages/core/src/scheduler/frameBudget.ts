/**
 * packages/core/src/scheduler/frameBudget.ts — Per-frame time budget and skip policy.
 */

import { TrellisError, invalidProps } from "../errors.js";
import { monotonicNowMs } from "../perf/perf.js";

export type SkipPolicy =
  | Readonly<{ kind: "never" }>
  | Readonly<{ kind: "onDeadlineMiss" }>
  | Readonly<{ kind: "onConsecutiveMisses"; count: number }>;

export const SKIP_NEVER: SkipPolicy = Object.freeze({ kind: "never" });
export const SKIP_ON_DEADLINE_MISS: SkipPolicy = Object.freeze({ kind: "onDeadlineMiss" });

export function skipOnConsecutiveMisses(count = 2): SkipPolicy {
  if (!Number.isInteger(count) || count <= 0) {
    throw invalidProps(`frameBudget: consecutive miss count must be a positive integer (got ${String(count)})`);
  }
  return Object.freeze({ kind: "onConsecutiveMisses", count });
}

/** Fraction of the budget after which the deadline counts as near. */
export const DEADLINE_NEAR_FRACTION = 0.8;

export type FrameBudgetStats = Readonly<{
  frames: number;
  missed: number;
  skipped: number;
  consecutiveMisses: number;
  /** skipped / (frames + skipped). */
  skippedFrameRate: number;
}>;

export type FrameBudget = Readonly<{
  budgetMs: number;
  skipPolicy: SkipPolicy;
  startFrame: () => void;
  /** Returns whether the frame missed its deadline. */
  finishFrame: () => boolean;
  inFrame: () => boolean;
  elapsedMs: () => number;
  remainingMs: () => number;
  isDeadlineNear: () => boolean;
  isDeadlineMissed: () => boolean;
  /** Whether the policy says to drop the next frame. */
  shouldSkip: () => boolean;
  recordSkip: () => void;
  stats: () => FrameBudgetStats;
}>;

export function createFrameBudget(
  opts: Readonly<{ budgetMs?: number; skipPolicy?: SkipPolicy; now?: () => number }> = {},
): FrameBudget {
  const budgetMs = opts.budgetMs ?? 1000 / 60;
  if (!Number.isFinite(budgetMs) || budgetMs <= 0) {
    throw invalidProps(`frameBudget: budgetMs must be a finite positive number (got ${String(budgetMs)})`);
  }
  const skipPolicy = opts.skipPolicy ?? skipOnConsecutiveMisses(2);
  const now = opts.now ?? monotonicNowMs;

  let started: number | null = null;
  let frames = 0;
  let missed = 0;
  let skipped = 0;
  let consecutive = 0;
  let lastMissed = false;

  const elapsedMs = (): number => (started === null ? 0 : now() - started);

  return Object.freeze({
    budgetMs,
    skipPolicy,
    startFrame: () => {
      if (started !== null) throw new TrellisError("TRELLIS_INVALID_STATE", "frameBudget: frame already started");
      started = now();
    },
    finishFrame: () => {
      if (started === null) throw new TrellisError("TRELLIS_INVALID_STATE", "frameBudget: no frame started");
      const miss = elapsedMs() > budgetMs;
      started = null;
      frames++;
      lastMissed = miss;
      if (miss) {
        missed++;
        consecutive++;
      } else {
        consecutive = 0;
      }
      return miss;
    },
    inFrame: () => started !== null,
    elapsedMs,
    remainingMs: () => Math.max(budgetMs - elapsedMs(), 0),
    isDeadlineNear: () => started !== null && elapsedMs() >= budgetMs * DEADLINE_NEAR_FRACTION,
    isDeadlineMissed: () => started !== null && elapsedMs() > budgetMs,
    shouldSkip: () => {
      switch (skipPolicy.kind) {
        case "never":
          return false;
        case "onDeadlineMiss":
          return lastMissed;
        case "onConsecutiveMisses":
          return consecutive >= skipPolicy.count;
      }
    },
    recordSkip: () => {
      skipped++;
      consecutive = 0;
      lastMissed = false;
    },
    stats: () =>
      Object.freeze({
        frames,
        missed,
        skipped,
        consecutiveMisses: consecutive,
        skippedFrameRate: frames + skipped === 0 ? 0 : skipped / (frames + skipped),
      }),
  });
}
