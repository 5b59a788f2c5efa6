/**
 * packages/core/src/env.ts — Environment flags.
 *
 * Read through globalThis.process so the core never imports node:* modules.
 * Absent a process object (browsers, workers without env) every flag is off.
 */

export type EnvFlag = "TRELLIS_PERF" | "TRELLIS_FRAME_LOG" | "TRELLIS_DEBUG_OVERFLOW";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function processEnv(): EnvSource {
  try {
    const g = globalThis as { process?: { env?: Record<string, string | undefined> } };
    return g.process?.env ?? {};
  } catch {
    return {};
  }
}

/** "1", "true", "yes" and "on" (any case) enable a flag. */
export function envFlag(name: EnvFlag, env: EnvSource = processEnv()): boolean {
  const raw = env[name];
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes" || value === "on";
}
