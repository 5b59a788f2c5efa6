/**
 * packages/core/src/pipeline/config.ts — Pipeline configuration and presets.
 *
 * Every optional feature is off unless configured. `resolvePipelineConfig`
 * validates the options and folds in environment flags:
 *   TRELLIS_PERF=1            enable metrics when not configured
 *   TRELLIS_FRAME_LOG=1       NDJSON frame log to stderr
 *   TRELLIS_DEBUG_OVERFLOW=1  paint overflow indicators
 */

import { type EnvSource, envFlag, processEnv } from "../env.js";
import { invalidProps } from "../errors.js";
import type { FrameLogSink } from "../debug/frameLog.js";
import { type RecoveryPolicy, DEFAULT_MAX_ERRORS, RECOVERY_POLICIES, isRecoveryPolicy } from "./errorRecovery.js";
import { DEFAULT_HIT_TEST_CACHE_CAPACITY } from "./hitTestCache.js";
import { DEFAULT_FPS_WINDOW, DEFAULT_FRAME_BUDGET_MS } from "./metrics.js";

export type PresetName = "production" | "development" | "testing" | "minimal";

export const PRESET_NAMES: readonly PresetName[] = Object.freeze([
  "production",
  "development",
  "testing",
  "minimal",
]);

export type PipelineConfig = Readonly<{
  /** Without recovery, recoverable frame errors are rethrown from drawFrame. */
  recovery?: Readonly<{ policy: RecoveryPolicy; maxErrors?: number }>;
  metrics?: boolean | Readonly<{ budgetMs?: number; window?: number }>;
  hitTestCache?: boolean | Readonly<{ capacity?: number }>;
  /** Publish every painted frame into a triple buffer with this slot size. */
  frameBuffer?: Readonly<{ slotCapacity: number }>;
  /** Per-frame deadline; layout and paint are cancelled past it. */
  cancellation?: Readonly<{ budgetMs: number }>;
  debugOverflow?: boolean;
  frameLog?: boolean | FrameLogSink;
}>;

export type ResolvedPipelineConfig = Readonly<{
  recovery: Readonly<{ policy: RecoveryPolicy; maxErrors: number }> | null;
  metrics: Readonly<{ budgetMs: number; window: number }> | null;
  hitTestCache: Readonly<{ capacity: number }> | null;
  frameBuffer: Readonly<{ slotCapacity: number }> | null;
  cancellation: Readonly<{ budgetMs: number }> | null;
  debugOverflow: boolean;
  /** null: disabled; true: stderr; function: sink. */
  frameLog: FrameLogSink | true | null;
}>;

const FRAME_BUDGET_MS = 16;

const PRESETS: Readonly<Record<PresetName, PipelineConfig>> = Object.freeze({
  production: Object.freeze<PipelineConfig>({
    recovery: { policy: "useLastGoodFrame", maxErrors: DEFAULT_MAX_ERRORS },
    metrics: { budgetMs: FRAME_BUDGET_MS },
    hitTestCache: true,
    cancellation: { budgetMs: FRAME_BUDGET_MS },
  }),
  development: Object.freeze<PipelineConfig>({
    recovery: { policy: "showErrorPlaceholder", maxErrors: 100 },
    metrics: true,
    hitTestCache: true,
    debugOverflow: true,
  }),
  testing: Object.freeze<PipelineConfig>({
    recovery: { policy: "panic", maxErrors: 0 },
  }),
  minimal: Object.freeze<PipelineConfig>({}),
});

export function pipelinePreset(name: PresetName): PipelineConfig {
  const preset = PRESETS[name];
  if (preset === undefined) {
    throw invalidProps(`unknown pipeline preset ${JSON.stringify(name)} (expected one of ${PRESET_NAMES.join(", ")})`);
  }
  return preset;
}

function positive(owner: string, name: string, v: number, integer: boolean): number {
  if (!Number.isFinite(v) || v <= 0 || (integer && !Number.isInteger(v))) {
    throw invalidProps(
      `${owner}: ${name} must be a ${integer ? "positive integer" : "finite positive number"} (got ${String(v)})`,
    );
  }
  return v;
}

export function resolvePipelineConfig(
  config: PipelineConfig = {},
  env: EnvSource = processEnv(),
): ResolvedPipelineConfig {
  let recovery: ResolvedPipelineConfig["recovery"] = null;
  if (config.recovery !== undefined) {
    const { policy } = config.recovery;
    if (!isRecoveryPolicy(policy)) {
      throw invalidProps(
        `recovery: unknown policy ${JSON.stringify(policy)} (expected one of ${RECOVERY_POLICIES.join(", ")})`,
      );
    }
    const maxErrors = config.recovery.maxErrors ?? DEFAULT_MAX_ERRORS;
    if (!Number.isInteger(maxErrors) || maxErrors < 0) {
      throw invalidProps(`recovery: maxErrors must be a non-negative integer (got ${String(maxErrors)})`);
    }
    recovery = { policy, maxErrors };
  }

  let metrics: ResolvedPipelineConfig["metrics"] = null;
  const m = config.metrics ?? envFlag("TRELLIS_PERF", env);
  if (m !== false) {
    const opts: Readonly<{ budgetMs?: number; window?: number }> = m === true ? {} : m;
    metrics = {
      budgetMs: positive("metrics", "budgetMs", opts.budgetMs ?? DEFAULT_FRAME_BUDGET_MS, false),
      window: positive("metrics", "window", opts.window ?? DEFAULT_FPS_WINDOW, true),
    };
  }

  let hitTestCache: ResolvedPipelineConfig["hitTestCache"] = null;
  const h = config.hitTestCache ?? false;
  if (h !== false) {
    const opts: Readonly<{ capacity?: number }> = h === true ? {} : h;
    hitTestCache = {
      capacity: positive("hitTestCache", "capacity", opts.capacity ?? DEFAULT_HIT_TEST_CACHE_CAPACITY, true),
    };
  }

  const frameBuffer =
    config.frameBuffer === undefined
      ? null
      : { slotCapacity: positive("frameBuffer", "slotCapacity", config.frameBuffer.slotCapacity, true) };

  const cancellation =
    config.cancellation === undefined
      ? null
      : { budgetMs: positive("cancellation", "budgetMs", config.cancellation.budgetMs, false) };

  const log = config.frameLog ?? envFlag("TRELLIS_FRAME_LOG", env);

  return Object.freeze({
    recovery,
    metrics,
    hitTestCache,
    frameBuffer,
    cancellation,
    debugOverflow: config.debugOverflow ?? envFlag("TRELLIS_DEBUG_OVERFLOW", env),
    frameLog: log === false ? null : log,
  });
}
