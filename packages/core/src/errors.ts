/**
 * packages/core/src/errors.ts — Error types shared by every core module.
 *
 * Two kinds of failure cross module boundaries:
 *   - TrellisError: deterministic, fatal violations (bad protocol use, build
 *     cycles, re-entrant renders, invalid options). Never handled by a
 *     recovery policy; they abort the frame.
 *   - FrameError: a failure of one node in one phase (user code threw, the
 *     frame deadline expired, duplicate keys, arity mismatch). These are
 *     routed to the pipeline's recovery policy.
 */

// =============================================================================
// TrellisError
// =============================================================================

export type TrellisErrorCode =
  | "TRELLIS_PROTOCOL_VIOLATION"
  | "TRELLIS_INVALID_STATE"
  | "TRELLIS_BUILD_CYCLE"
  | "TRELLIS_REENTRANT_CALL"
  | "TRELLIS_DUPLICATE_KEY"
  | "TRELLIS_INVALID_PROPS"
  | "TRELLIS_ID_EXHAUSTED"
  | "TRELLIS_FRAME_PANIC";

export class TrellisError extends Error {
  override readonly name = "TrellisError";
  readonly code: TrellisErrorCode;

  constructor(code: TrellisErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrellisError);
    }
  }
}

export function protocolViolation(detail: string): TrellisError {
  return new TrellisError("TRELLIS_PROTOCOL_VIOLATION", `protocol violation: ${detail}`);
}

export function invalidProps(detail: string): TrellisError {
  return new TrellisError("TRELLIS_INVALID_PROPS", detail);
}

export function isTrellisError(err: unknown): err is TrellisError {
  return err instanceof TrellisError;
}

// =============================================================================
// FrameError
// =============================================================================

export type FramePhase = "build" | "layout" | "paint";

export type FrameErrorReason = "threw" | "cancelled" | "duplicateKey" | "arity";

export class FrameError extends Error {
  override readonly name = "FrameError";
  readonly phase: FramePhase;
  /** Element id for build failures, render id for layout/paint failures. */
  readonly nodeId: number | null;
  readonly reason: FrameErrorReason;

  constructor(
    phase: FramePhase,
    nodeId: number | null,
    reason: FrameErrorReason,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.phase = phase;
    this.nodeId = nodeId;
    this.reason = reason;
  }
}

/** Best-effort printable detail for an arbitrary thrown value. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}

/**
 * Wrap a value thrown by user code in a FrameError for `phase`.
 *
 * TrellisErrors and FrameErrors already raised elsewhere pass through
 * untouched so fatal conditions and already-reported failures are not
 * re-attributed to the node that happened to be on the stack.
 */
export function toFrameError(phase: FramePhase, nodeId: number | null, thrown: unknown): FrameError {
  if (thrown instanceof TrellisError) throw thrown;
  if (thrown instanceof FrameError) return thrown;
  return new FrameError(phase, nodeId, "threw", `${phase} failed: ${describeThrown(thrown)}`, thrown);
}
