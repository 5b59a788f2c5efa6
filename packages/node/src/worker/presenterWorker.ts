/**
 * Worker-thread frame consumer.
 *
 * Polls the triple buffer, decodes each new frame and checks that sequences
 * only move forward. Sleeps on the control word between polls so a stop
 * request wakes it at once.
 */

import { parentPort, workerData } from "node:worker_threads";
import { TripleBuffer, decodeDisplayList, describeThrown } from "@trellis-ui/core";
import {
  PRESENTER_STOP,
  type PresenterStats,
  type PresenterToMainMessage,
  checkTaggedFrame,
  parseWorkerData,
} from "./protocol.js";

function postToMain(msg: PresenterToMainMessage): void {
  parentPort?.postMessage(msg);
}

function run(): PresenterStats {
  const cfg = parseWorkerData(workerData);
  const buffer = TripleBuffer.attach(cfg.frames);
  const control = new Int32Array(cfg.control, 0, 1);

  let frames = 0;
  let firstSeq: number | null = null;
  let lastSeq: number | null = null;
  let outOfOrder = 0;
  let invalid = 0;
  let firstError: string | null = null;

  const fail = (detail: string): void => {
    invalid++;
    firstError ??= detail;
  };

  const drain = (): void => {
    if (!buffer.acquire()) return;
    const seq = buffer.readSeq();
    frames++;
    firstSeq ??= seq;
    if (lastSeq !== null && seq <= lastSeq) {
      outOfOrder++;
      firstError ??= `sequence went from ${String(lastSeq)} to ${String(seq)}`;
    }
    lastSeq = seq;
    try {
      const list = decodeDisplayList(buffer.readView());
      if (cfg.expectTagged) {
        const mismatch = checkTaggedFrame(list, seq);
        if (mismatch !== null) fail(mismatch);
      }
      if (cfg.reportFrames) postToMain({ type: "frame", seq, commands: list.length });
    } catch (err) {
      fail(`frame ${String(seq)}: ${describeThrown(err)}`);
    }
  };

  postToMain({ type: "ready" });
  while (Atomics.load(control, 0) !== PRESENTER_STOP) {
    drain();
    Atomics.wait(control, 0, 0, cfg.pollIntervalMs);
  }
  drain();

  return Object.freeze({ frames, firstSeq, lastSeq, outOfOrder, invalid, firstError });
}

if (parentPort === null) {
  throw new Error("presenterWorker: parentPort is null (not running in worker_threads)");
}

try {
  postToMain({ type: "done", stats: run() });
} catch (err) {
  postToMain({ type: "fatal", detail: describeThrown(err) });
}
