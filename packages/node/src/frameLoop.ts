/**
 * packages/node/src/frameLoop.ts — Timer-driven frame loop.
 *
 * Each tick signals vsync on the scheduler; the scheduler's callback draws a
 * frame when the pipeline needs one, unless the frame budget says to drop it.
 * While frames are produced the loop ticks at the refresh interval; when the
 * pipeline goes idle the delay doubles from one interval up to eight (never
 * more than MAX_IDLE_DELAY_MS), and `wake()` (wire it to the pipeline's
 * onFrameRequested) brings it back at once.
 */

import {
  type FrameBudget,
  type FrameResult,
  type PipelineOwner,
  TrellisError,
  type VsyncScheduler,
  createVsyncScheduler,
} from "@trellis-ui/core";

/** Schedules `fn` after `ms`; returns a cancel function. */
export type ScheduleTimer = (fn: () => void, ms: number) => () => void;

export const nodeTimer: ScheduleTimer = (fn, ms) => {
  const t = setTimeout(fn, ms);
  return () => clearTimeout(t);
};

export const MAX_IDLE_DELAY_MS = 250;

/** Whole milliseconds between ticks at `refreshRate`, at least 1. */
export function tickIntervalMs(refreshRate: number): number {
  return Math.max(1, Math.floor(1000 / refreshRate));
}

export type FrameLoopOptions = Readonly<{
  pipeline: PipelineOwner;
  /** Defaults to a 60 Hz scheduler that never blocks. */
  scheduler?: VsyncScheduler;
  budget?: FrameBudget;
  timer?: ScheduleTimer;
  onFrame?: (result: FrameResult) => void;
  /** Fatal frame errors. The loop is stopped first; without a handler the error is rethrown. */
  onError?: (err: unknown) => void;
}>;

export type FrameLoopStats = Readonly<{
  ticks: number;
  frames: number;
  skipped: number;
}>;

export type FrameLoop = Readonly<{
  start: () => void;
  stop: () => void;
  isRunning: () => boolean;
  /** Schedule the next tick immediately. */
  wake: () => void;
  /** Signal one vsync synchronously; frames are drawn only while started. */
  tick: () => void;
  stats: () => FrameLoopStats;
}>;

export function createFrameLoop(opts: FrameLoopOptions): FrameLoop {
  const scheduler = opts.scheduler ?? createVsyncScheduler({ mode: "off" });
  const timer = opts.timer ?? nodeTimer;
  const interval = tickIntervalMs(scheduler.refreshRate);
  const maxIdleDelay = Math.max(interval, Math.min(MAX_IDLE_DELAY_MS, interval * 8));
  const { pipeline, budget } = opts;

  let running = false;
  let cancel: (() => void) | null = null;
  let idleDelay = 0;
  let ticks = 0;
  let frames = 0;
  let skipped = 0;

  function drawIfNeeded(timestampMs: number): void {
    if (!pipeline.needsFrame()) return;
    if (budget?.shouldSkip() === true) {
      budget.recordSkip();
      skipped++;
      pipeline.requestFrame();
      return;
    }
    budget?.startFrame();
    let result: FrameResult;
    try {
      result = pipeline.drawFrame(timestampMs);
    } finally {
      if (budget?.inFrame() === true) budget.finishFrame();
    }
    if (result.outcome !== "idle") frames++;
    opts.onFrame?.(result);
  }

  function schedule(ms: number): void {
    cancel?.();
    cancel = timer(onTimer, ms);
  }

  function tick(): void {
    ticks++;
    scheduler.signalVsync();
  }

  function onTimer(): void {
    cancel = null;
    if (!running) return;
    try {
      tick();
    } catch (err) {
      stop();
      if (opts.onError) {
        opts.onError(err);
        return;
      }
      throw err;
    }
    if (!running) return;
    if (pipeline.needsFrame()) {
      idleDelay = 0;
      schedule(interval);
    } else {
      idleDelay = idleDelay === 0 ? interval : Math.min(idleDelay * 2, maxIdleDelay);
      schedule(idleDelay);
    }
  }

  function start(): void {
    if (running) return;
    if (scheduler.isActive()) {
      throw new TrellisError("TRELLIS_INVALID_STATE", "frameLoop: scheduler is already driving another loop");
    }
    running = true;
    idleDelay = 0;
    scheduler.setCallback(drawIfNeeded);
    scheduler.start();
    schedule(0);
  }

  function stop(): void {
    if (!running) return;
    running = false;
    cancel?.();
    cancel = null;
    scheduler.stop();
    scheduler.clearCallback();
  }

  return Object.freeze({
    start,
    stop,
    isRunning: () => running,
    wake: () => {
      if (!running) return;
      idleDelay = 0;
      schedule(0);
    },
    tick,
    stats: () => Object.freeze({ ticks, frames, skipped }),
  });
}
