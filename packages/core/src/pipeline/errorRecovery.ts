/**
 * packages/core/src/pipeline/errorRecovery.ts — Recovery policy for frame errors.
 *
 * Every recoverable failure is counted and recorded. The policy decides what
 * the frame does with it; once more than `maxErrors` failures have been seen
 * the answer is `panic` whatever the policy says. `reset()` starts counting
 * again.
 */

import { type FrameError, type FrameErrorReason, type FramePhase, invalidProps } from "../errors.js";

export type RecoveryPolicy = "useLastGoodFrame" | "showErrorPlaceholder" | "skipFrame" | "panic";

export const RECOVERY_POLICIES: readonly RecoveryPolicy[] = Object.freeze([
  "useLastGoodFrame",
  "showErrorPlaceholder",
  "skipFrame",
  "panic",
]);

export const DEFAULT_MAX_ERRORS = 10;
const MAX_RECORDS = 64;

export type ErrorRecord = Readonly<{
  phase: FramePhase;
  nodeId: number | null;
  reason: FrameErrorReason;
  message: string;
  frame: number;
}>;

export type ErrorRecoveryOptions = Readonly<{
  policy: RecoveryPolicy;
  maxErrors?: number;
}>;

export type ErrorRecovery = Readonly<{
  policy: RecoveryPolicy;
  maxErrors: number;
  /** Count and record `err`; returns the action the frame must take. */
  handle: (err: FrameError, frame: number) => RecoveryPolicy;
  errorCount: () => number;
  /** Most recent failures, oldest first. */
  records: () => readonly ErrorRecord[];
  reset: () => void;
}>;

export function isRecoveryPolicy(v: unknown): v is RecoveryPolicy {
  return typeof v === "string" && (RECOVERY_POLICIES as readonly string[]).includes(v);
}

export function createErrorRecovery(opts: ErrorRecoveryOptions): ErrorRecovery {
  if (!isRecoveryPolicy(opts.policy)) {
    throw invalidProps(
      `errorRecovery: unknown policy ${JSON.stringify(opts.policy)} (expected one of ${RECOVERY_POLICIES.join(", ")})`,
    );
  }
  const maxErrors = opts.maxErrors ?? DEFAULT_MAX_ERRORS;
  if (!Number.isInteger(maxErrors) || maxErrors < 0) {
    throw invalidProps(`errorRecovery: maxErrors must be a non-negative integer (got ${String(maxErrors)})`);
  }

  let count = 0;
  const records: ErrorRecord[] = [];

  return Object.freeze({
    policy: opts.policy,
    maxErrors,
    handle: (err: FrameError, frame: number): RecoveryPolicy => {
      count++;
      records.push(
        Object.freeze({
          phase: err.phase,
          nodeId: err.nodeId,
          reason: err.reason,
          message: err.message,
          frame,
        }),
      );
      if (records.length > MAX_RECORDS) records.shift();
      return count > maxErrors ? "panic" : opts.policy;
    },
    errorCount: () => count,
    records: () => Object.freeze(records.slice()),
    reset: () => {
      count = 0;
      records.length = 0;
    },
  });
}
