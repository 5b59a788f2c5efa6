/**
 * packages/core/src/debug/frameLog.ts — NDJSON frame log.
 *
 * One JSON object per line: `{ ts, scope, stage, ...fields }`. Lines go to an
 * injected sink, else to process.stderr (through globalThis), else to
 * console.error. Enabled by TRELLIS_FRAME_LOG=1 or by passing a sink.
 */

import { type EnvSource, envFlag } from "../env.js";

export type FrameLogStage =
  | "frameStart"
  | "frameEnd"
  | "phaseError"
  | "recovery"
  | "fatal";

export type FrameLogSink = (line: string) => void;

export type FrameLogFields = Readonly<Record<string, unknown>>;

export type FrameLogger = Readonly<{
  enabled: boolean;
  emit: (stage: FrameLogStage, fields?: FrameLogFields) => void;
}>;

export type FrameLoggerOptions = Readonly<{
  scope: string;
  sink?: FrameLogSink;
  /** Overrides the environment flag. */
  enabled?: boolean;
  /** Epoch milliseconds for `ts`. */
  now?: () => number;
  env?: EnvSource;
}>;

function defaultSink(line: string): void {
  const g = globalThis as {
    process?: { stderr?: { write?: (text: string) => void } };
    console?: { error?: (msg?: unknown) => void };
  };
  if (typeof g.process?.stderr?.write === "function") {
    g.process.stderr.write(`${line}\n`);
    return;
  }
  g.console?.error?.(line);
}

export const DISABLED_FRAME_LOGGER: FrameLogger = Object.freeze({
  enabled: false,
  emit: () => {},
});

export function createFrameLogger(opts: FrameLoggerOptions): FrameLogger {
  const enabled =
    opts.enabled ?? (opts.sink !== undefined || envFlag("TRELLIS_FRAME_LOG", opts.env));
  if (!enabled) return DISABLED_FRAME_LOGGER;
  const sink = opts.sink ?? defaultSink;
  const now = opts.now ?? Date.now;

  return Object.freeze({
    enabled: true,
    emit: (stage: FrameLogStage, fields: FrameLogFields = {}) => {
      try {
        sink(
          JSON.stringify({
            ts: new Date(now()).toISOString(),
            scope: opts.scope,
            stage,
            ...fields,
          }),
        );
      } catch {
        // Diagnostics never break a frame.
      }
    },
  });
}
