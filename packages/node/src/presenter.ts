/**
 * packages/node/src/presenter.ts — Worker-thread frame presenter.
 *
 * Starts a worker that consumes frames a pipeline publishes into its triple
 * buffer. The main thread never waits on the worker while producing; `stop()`
 * raises the stop flag and resolves with the worker's final statistics.
 */

import { Worker } from "node:worker_threads";
import { TripleBuffer, TrellisError, invalidProps } from "@trellis-ui/core";
import {
  PRESENTER_CONTROL_BYTES,
  PRESENTER_STOP,
  type PresenterStats,
  type PresenterToMainMessage,
  type PresenterWorkerData,
} from "./worker/protocol.js";

export type PresenterOptions = Readonly<{
  /** Frames to consume: a triple buffer or its shared memory. */
  frames: TripleBuffer | SharedArrayBuffer;
  pollIntervalMs?: number;
  expectTagged?: boolean;
  onFrame?: (seq: number, commands: number) => void;
}>;

export type Presenter = Readonly<{
  /** Resolves once the worker is polling. */
  ready: Promise<void>;
  stop: () => Promise<PresenterStats>;
}>;

/** Under tsx the sources run directly, so the worker needs the .ts entry and the tsx loader. */
function workerEntry(): Readonly<{ url: URL; execArgv: readonly string[] }> {
  const fromSource = import.meta.url.endsWith(".ts");
  return Object.freeze({
    url: new URL(fromSource ? "./worker/presenterWorker.ts" : "./worker/presenterWorker.js", import.meta.url),
    execArgv: fromSource ? ["--import", "tsx"] : [],
  });
}

function isPresenterMessage(m: unknown): m is PresenterToMainMessage {
  if (typeof m !== "object" || m === null) return false;
  const type = (m as { type?: unknown }).type;
  return type === "ready" || type === "frame" || type === "done" || type === "fatal";
}

export function startPresenter(opts: PresenterOptions): Presenter {
  const pollIntervalMs = opts.pollIntervalMs ?? 1;
  if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
    throw invalidProps(`presenter: pollIntervalMs must be a positive number (got ${String(pollIntervalMs)})`);
  }
  const frames = opts.frames instanceof TripleBuffer ? opts.frames.shared : opts.frames;
  const control = new SharedArrayBuffer(PRESENTER_CONTROL_BYTES);
  const workerData: PresenterWorkerData = {
    frames,
    control,
    pollIntervalMs,
    expectTagged: opts.expectTagged === true,
    reportFrames: opts.onFrame !== undefined,
  };
  const entry = workerEntry();
  const worker = new Worker(entry.url, { workerData, execArgv: [...entry.execArgv] });

  let stopped = false;
  let resolveReady: () => void = () => {};
  let rejectReady: (err: Error) => void = () => {};
  const ready = new Promise<void>((resolve, reject) => {
    resolveReady = resolve;
    rejectReady = reject;
  });
  let resolveDone: (stats: PresenterStats) => void = () => {};
  let rejectDone: (err: Error) => void = () => {};
  const done = new Promise<PresenterStats>((resolve, reject) => {
    resolveDone = resolve;
    rejectDone = reject;
  });
  // Observed through `ready`/`stop()`; keep an early worker failure from being unhandled.
  ready.catch(() => undefined);
  done.catch(() => undefined);

  const fail = (err: Error): void => {
    rejectReady(err);
    rejectDone(err);
  };

  worker.on("message", (m: unknown) => {
    if (!isPresenterMessage(m)) return;
    switch (m.type) {
      case "ready":
        resolveReady();
        return;
      case "frame":
        opts.onFrame?.(m.seq, m.commands);
        return;
      case "done":
        resolveDone(m.stats);
        return;
      case "fatal":
        fail(new TrellisError("TRELLIS_INVALID_STATE", `presenter worker failed: ${m.detail}`));
        return;
    }
  });
  worker.on("error", (err: Error) => fail(err));
  worker.on("exit", (code: number) => {
    fail(new TrellisError("TRELLIS_INVALID_STATE", `presenter worker exited before reporting (code ${String(code)})`));
  });

  async function stop(): Promise<PresenterStats> {
    if (!stopped) {
      stopped = true;
      const word = new Int32Array(control, 0, 1);
      Atomics.store(word, 0, PRESENTER_STOP);
      Atomics.notify(word, 0);
    }
    try {
      return await done;
    } finally {
      await worker.terminate();
    }
  }

  return Object.freeze({ ready, stop });
}
