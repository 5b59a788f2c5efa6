/**
 * packages/core/src/pipeline/metrics.ts — Frame metrics accumulator.
 *
 * Counts frames and frames over budget, keeps a rolling window of frame
 * timestamps for FPS, min/avg/max frame time, per-phase stats and the
 * hit-test cache hit rate.
 */

import { invalidProps } from "../errors.js";
import { type PhaseRecorder, type PhaseStats, createPhaseRecorder } from "../perf/perf.js";

export type MetricsPhase = "build" | "layout" | "paint" | "publish";

export const METRICS_PHASES: readonly MetricsPhase[] = Object.freeze([
  "build",
  "layout",
  "paint",
  "publish",
]);

export const DEFAULT_FRAME_BUDGET_MS = 1000 / 60;
export const DEFAULT_FPS_WINDOW = 60;

export type FrameSample = Readonly<{
  /** Frame start, in the pipeline's clock. */
  timestampMs: number;
  totalMs: number;
  phases: Readonly<Partial<Record<MetricsPhase, number>>>;
}>;

export type MetricsSnapshot = Readonly<{
  frames: number;
  droppedFrames: number;
  fps: number;
  minFrameMs: number;
  avgFrameMs: number;
  maxFrameMs: number;
  phases: Readonly<Record<MetricsPhase, PhaseStats>>;
  cacheHitRate: number;
}>;

export type FrameMetrics = Readonly<{
  budgetMs: number;
  recordFrame: (sample: FrameSample) => void;
  recordCacheLookup: (hit: boolean) => void;
  snapshot: () => MetricsSnapshot;
  reset: () => void;
}>;

export type FrameMetricsOptions = Readonly<{
  budgetMs?: number;
  /** Frames in the FPS window. */
  window?: number;
}>;

export function createFrameMetrics(opts: FrameMetricsOptions = {}): FrameMetrics {
  const budgetMs = opts.budgetMs ?? DEFAULT_FRAME_BUDGET_MS;
  const window = opts.window ?? DEFAULT_FPS_WINDOW;
  if (!Number.isFinite(budgetMs) || budgetMs <= 0) {
    throw invalidProps(`metrics: budgetMs must be a finite positive number (got ${String(budgetMs)})`);
  }
  if (!Number.isInteger(window) || window < 2) {
    throw invalidProps(`metrics: window must be an integer >= 2 (got ${String(window)})`);
  }

  const phases: PhaseRecorder<MetricsPhase> = createPhaseRecorder(METRICS_PHASES);
  const stamps: number[] = [];
  let frames = 0;
  let dropped = 0;
  let totalMs = 0;
  let minMs = Number.POSITIVE_INFINITY;
  let maxMs = 0;
  let cacheHits = 0;
  let cacheLookups = 0;

  function fps(): number {
    if (stamps.length < 2) return 0;
    const first = stamps[0] ?? 0;
    const last = stamps[stamps.length - 1] ?? 0;
    const span = last - first;
    return span > 0 ? ((stamps.length - 1) * 1000) / span : 0;
  }

  return Object.freeze({
    budgetMs,
    recordFrame: (sample: FrameSample) => {
      frames++;
      if (sample.totalMs > budgetMs) dropped++;
      totalMs += sample.totalMs;
      minMs = Math.min(minMs, sample.totalMs);
      maxMs = Math.max(maxMs, sample.totalMs);
      stamps.push(sample.timestampMs);
      if (stamps.length > window) stamps.shift();
      for (const p of METRICS_PHASES) {
        const ms = sample.phases[p];
        if (ms !== undefined) phases.record(p, ms);
      }
    },
    recordCacheLookup: (hit: boolean) => {
      cacheLookups++;
      if (hit) cacheHits++;
    },
    snapshot: () =>
      Object.freeze({
        frames,
        droppedFrames: dropped,
        fps: fps(),
        minFrameMs: frames === 0 ? 0 : minMs,
        avgFrameMs: frames === 0 ? 0 : totalMs / frames,
        maxFrameMs: maxMs,
        phases: phases.snapshot(),
        cacheHitRate: cacheLookups === 0 ? 0 : cacheHits / cacheLookups,
      }),
    reset: () => {
      phases.reset();
      stamps.length = 0;
      frames = 0;
      dropped = 0;
      totalMs = 0;
      minMs = Number.POSITIVE_INFINITY;
      maxMs = 0;
      cacheHits = 0;
      cacheLookups = 0;
    },
  });
}
