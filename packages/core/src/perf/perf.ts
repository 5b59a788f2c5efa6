/**
 * packages/core/src/perf/perf.ts — Per-phase timing samples.
 *
 * Each recorder keeps a ring of the most recent samples per phase and
 * reports percentile stats on demand. Recorders are plain values owned by
 * whoever measures (a pipeline's metrics, a benchmark), never globals.
 */

/** Statistics for a single phase. */
export type PhaseStats = Readonly<{
  count: number;
  totalMs: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}>;

export const EMPTY_PHASE_STATS: PhaseStats = Object.freeze({
  count: 0,
  totalMs: 0,
  avg: 0,
  p50: 0,
  p95: 0,
  max: 0,
});

/**
 * High-resolution timer.
 * Falls back to Date.now() if performance.now() is unavailable.
 */
export const monotonicNowMs: () => number = (() => {
  const g = globalThis as { performance?: { now?: () => number } };
  const perf = g.performance;
  if (typeof perf?.now === "function") {
    return () => {
      const fn = perf.now;
      return typeof fn === "function" ? fn.call(perf) : Date.now();
    };
  }
  return () => Date.now();
})();

/** Default samples kept per phase. */
export const DEFAULT_RING_CAP = 1024;

type PhaseRing = {
  samples: Float64Array;
  cursor: number;
  /** Samples currently held (at most the ring capacity). */
  held: number;
  /** Samples ever recorded. */
  count: number;
  totalMs: number;
  max: number;
};

function createPhaseRing(cap: number): PhaseRing {
  return { samples: new Float64Array(cap), cursor: 0, held: 0, count: 0, totalMs: 0, max: 0 };
}

function recordSample(ring: PhaseRing, dt: number): void {
  const cap = ring.samples.length;
  ring.samples[ring.cursor] = dt;
  ring.cursor = (ring.cursor + 1) % cap;
  ring.held = Math.min(ring.held + 1, cap);
  ring.count++;
  ring.totalMs += dt;
  if (dt > ring.max) ring.max = dt;
}

function computeStats(ring: PhaseRing): PhaseStats {
  if (ring.held === 0) return EMPTY_PHASE_STATS;

  const arr = Array.from(ring.samples.subarray(0, ring.held));
  arr.sort((a, b) => a - b);

  const p50Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.5));
  const p95Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.95));

  return Object.freeze({
    count: ring.count,
    totalMs: ring.totalMs,
    avg: ring.totalMs / ring.count,
    p50: arr[p50Idx] ?? 0,
    p95: arr[p95Idx] ?? 0,
    max: ring.max,
  });
}

export type PhaseRecorder<P extends string> = Readonly<{
  record: (phase: P, durationMs: number) => void;
  /** Time `fn` and record its duration, also when it throws. */
  time: <T>(phase: P, fn: () => T) => T;
  stats: (phase: P) => PhaseStats;
  snapshot: () => Readonly<Record<P, PhaseStats>>;
  reset: () => void;
}>;

export function createPhaseRecorder<P extends string>(
  phases: readonly P[],
  opts: Readonly<{ cap?: number; now?: () => number }> = {},
): PhaseRecorder<P> {
  const cap = opts.cap ?? DEFAULT_RING_CAP;
  const now = opts.now ?? monotonicNowMs;
  const rings = new Map<P, PhaseRing>();

  function ringFor(phase: P): PhaseRing {
    let ring = rings.get(phase);
    if (!ring) {
      ring = createPhaseRing(cap);
      rings.set(phase, ring);
    }
    return ring;
  }

  function record(phase: P, durationMs: number): void {
    recordSample(ringFor(phase), Math.max(0, durationMs));
  }

  function stats(phase: P): PhaseStats {
    const ring = rings.get(phase);
    return ring ? computeStats(ring) : EMPTY_PHASE_STATS;
  }

  return Object.freeze({
    record,
    time: <T>(phase: P, fn: () => T): T => {
      const start = now();
      try {
        return fn();
      } finally {
        record(phase, now() - start);
      }
    },
    stats,
    snapshot: () => {
      const out = {} as Record<P, PhaseStats>;
      for (const p of phases) out[p] = stats(p);
      return Object.freeze(out);
    },
    reset: () => rings.clear(),
  });
}
