/**
 * packages/core/src/scheduler/vsync.ts — Vsync signal bookkeeping and waiting.
 *
 * The host calls `signalVsync` once per display refresh (or per timer tick).
 * The scheduler keeps the last 60 intervals, counts misses (an interval
 * longer than 1.5 frame intervals) and forwards each signal to the registered
 * callback while started.
 *
 * `waitForVsync` blocks the calling thread with Atomics.wait:
 *   on        wait for the next interval boundary
 *   off       never wait
 *   adaptive  wait only while the current frame is under budget
 */

import { invalidProps } from "../errors.js";
import { monotonicNowMs } from "../perf/perf.js";

export type VsyncMode = "on" | "off" | "adaptive";

export const VSYNC_MODES: readonly VsyncMode[] = Object.freeze(["on", "off", "adaptive"]);
export const VSYNC_WINDOW = 60;
/** An interval longer than this many frame intervals counts as a miss. */
export const MISS_FACTOR = 1.5;
/** isOnTarget tolerance, as a fraction of the frame interval. */
export const TARGET_TOLERANCE = 0.05;

export type VsyncCallback = (timestampMs: number) => void;

export type VsyncStats = Readonly<{
  signals: number;
  missed: number;
  missRate: number;
  avgIntervalMs: number;
  /** Standard deviation of the windowed intervals. */
  jitterMs: number;
  effectiveFps: number;
}>;

export type VsyncSchedulerOptions = Readonly<{
  refreshRate?: number;
  mode?: VsyncMode;
  now?: () => number;
  /** Blocks for `ms`; defaults to Atomics.wait on a private buffer. */
  sleep?: (ms: number) => void;
}>;

export type VsyncScheduler = Readonly<{
  refreshRate: number;
  mode: VsyncMode;
  frameIntervalUs: number;
  frameIntervalMs: number;
  start: () => void;
  stop: () => void;
  isActive: () => boolean;
  setCallback: (cb: VsyncCallback) => void;
  clearCallback: () => void;
  signalVsync: (timestampMs?: number) => void;
  /** Returns the milliseconds waited. */
  waitForVsync: () => number;
  isOnTarget: () => boolean;
  timeSinceVsyncMs: () => number | null;
  predictNextVsyncMs: () => number | null;
  stats: () => VsyncStats;
}>;

export function atomicsSleep(ms: number): void {
  if (!(ms > 0)) return;
  const cell = new Int32Array(new SharedArrayBuffer(4));
  Atomics.wait(cell, 0, 0, ms);
}

export function createVsyncScheduler(opts: VsyncSchedulerOptions = {}): VsyncScheduler {
  const refreshRate = opts.refreshRate ?? 60;
  if (!Number.isFinite(refreshRate) || refreshRate <= 0) {
    throw invalidProps(`vsync: refreshRate must be a finite positive number (got ${String(refreshRate)})`);
  }
  const mode = opts.mode ?? "on";
  if (!VSYNC_MODES.includes(mode)) {
    throw invalidProps(`vsync: unknown mode ${JSON.stringify(mode)} (expected one of ${VSYNC_MODES.join(", ")})`);
  }
  const now = opts.now ?? monotonicNowMs;
  const sleep = opts.sleep ?? atomicsSleep;
  const frameIntervalUs = Math.floor(1_000_000 / refreshRate);
  const frameIntervalMs = frameIntervalUs / 1000;

  const intervals: number[] = [];
  let last: number | null = null;
  let signals = 0;
  let missed = 0;
  let active = false;
  let callback: VsyncCallback | null = null;

  function average(): number {
    if (intervals.length === 0) return 0;
    let sum = 0;
    for (const v of intervals) sum += v;
    return sum / intervals.length;
  }

  function signalVsync(timestampMs?: number): void {
    const ts = timestampMs ?? now();
    if (last !== null) {
      const interval = ts - last;
      intervals.push(interval);
      if (intervals.length > VSYNC_WINDOW) intervals.shift();
      if (interval > frameIntervalMs * MISS_FACTOR) missed++;
    }
    last = ts;
    signals++;
    if (active) callback?.(ts);
  }

  function waitForVsync(): number {
    if (mode === "off" || last === null) return 0;
    const elapsed = now() - last;
    let wait = 0;
    if (mode === "on") {
      const k = Math.max(1, Math.ceil(elapsed / frameIntervalMs));
      wait = k * frameIntervalMs - elapsed;
    } else if (elapsed < frameIntervalMs) {
      wait = frameIntervalMs - elapsed;
    }
    if (wait > 0) sleep(wait);
    return wait;
  }

  function stats(): VsyncStats {
    const avg = average();
    let variance = 0;
    for (const v of intervals) variance += (v - avg) * (v - avg);
    const counted = Math.max(signals - 1, 0);
    return Object.freeze({
      signals,
      missed,
      missRate: counted === 0 ? 0 : missed / counted,
      avgIntervalMs: avg,
      jitterMs: intervals.length === 0 ? 0 : Math.sqrt(variance / intervals.length),
      effectiveFps: avg > 0 ? 1000 / avg : 0,
    });
  }

  return Object.freeze({
    refreshRate,
    mode,
    frameIntervalUs,
    frameIntervalMs,
    start: () => {
      active = true;
    },
    stop: () => {
      active = false;
    },
    isActive: () => active,
    setCallback: (cb: VsyncCallback) => {
      callback = cb;
    },
    clearCallback: () => {
      callback = null;
    },
    signalVsync,
    waitForVsync,
    isOnTarget: () => {
      if (intervals.length === 0) return false;
      return Math.abs(average() - frameIntervalMs) <= frameIntervalMs * TARGET_TOLERANCE;
    },
    timeSinceVsyncMs: () => (last === null ? null : now() - last),
    predictNextVsyncMs: () => (last === null ? null : last + frameIntervalMs),
    stats,
  });
}
