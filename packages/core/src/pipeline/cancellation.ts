/**
 * packages/core/src/pipeline/cancellation.ts — Frame deadline tokens.
 *
 * The render tree polls `isCancelled` at node boundaries; once the deadline
 * passes (or `cancel()` was called) the current phase raises a recoverable
 * `cancelled` FrameError.
 */

import { invalidProps } from "../errors.js";

export type CancellationToken = Readonly<{
  isCancelled: () => boolean;
  cancel: () => void;
  /** Absolute deadline in the token's clock, or null for manual-only tokens. */
  deadlineMs: number | null;
  /** Milliseconds left before the deadline; Infinity without one, 0 once cancelled. */
  remainingMs: () => number;
}>;

export function createCancellationToken(
  opts: Readonly<{ now: () => number; budgetMs?: number }>,
): CancellationToken {
  const budget = opts.budgetMs;
  if (budget !== undefined && (!Number.isFinite(budget) || budget <= 0)) {
    throw invalidProps(`cancellation: budgetMs must be a finite positive number (got ${String(budget)})`);
  }
  const deadlineMs = budget === undefined ? null : opts.now() + budget;
  let cancelled = false;

  const remainingMs = (): number => {
    if (cancelled) return 0;
    return deadlineMs === null ? Number.POSITIVE_INFINITY : Math.max(deadlineMs - opts.now(), 0);
  };

  return Object.freeze({
    isCancelled: () => {
      if (!cancelled && deadlineMs !== null && opts.now() >= deadlineMs) cancelled = true;
      return cancelled;
    },
    cancel: () => {
      cancelled = true;
    },
    deadlineMs,
    remainingMs,
  });
}
