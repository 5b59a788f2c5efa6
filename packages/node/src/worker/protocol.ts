/**
 * packages/node/src/worker/protocol.ts — Presenter worker wire types.
 *
 * The main thread hands the worker the triple buffer's SharedArrayBuffer and
 * a one-word control buffer. Setting STOP in the control word (and notifying)
 * ends the worker's loop; it answers with a final `done` message.
 */

import type { DisplayList } from "@trellis-ui/core";

export const PRESENTER_CONTROL_BYTES = 4;
export const PRESENTER_STOP = 1;

export type PresenterWorkerData = Readonly<{
  frames: SharedArrayBuffer;
  control: SharedArrayBuffer;
  pollIntervalMs: number;
  /** Check that every frame only carries commands tagged with its own sequence. */
  expectTagged: boolean;
  /** Post a `frame` message for every frame read. */
  reportFrames: boolean;
}>;

export type PresenterStats = Readonly<{
  frames: number;
  firstSeq: number | null;
  lastSeq: number | null;
  /** Frames whose sequence did not increase. */
  outOfOrder: number;
  /** Frames that failed to decode or to match their tag. */
  invalid: number;
  firstError: string | null;
}>;

export type PresenterToMainMessage =
  | Readonly<{ type: "ready" }>
  | Readonly<{ type: "frame"; seq: number; commands: number }>
  | Readonly<{ type: "done"; stats: PresenterStats }>
  | Readonly<{ type: "fatal"; detail: string }>;

/** Color a tagged frame uses for every rect. */
export function tagColor(seq: number): number {
  return seq & 0xffffff;
}

export function tagLabel(seq: number): string {
  return `seq:${String(seq)}`;
}

/** Null when `list` is a well-formed frame tagged `seq`, else the first mismatch. */
export function checkTaggedFrame(list: DisplayList, seq: number): string | null {
  if (list.length === 0) return `frame ${String(seq)} is empty`;
  for (const cmd of list) {
    if (cmd.op === "rect" && cmd.color !== tagColor(seq)) {
      return `frame ${String(seq)} has a rect tagged ${String(cmd.color)}`;
    }
    if (cmd.op === "label" && cmd.text !== tagLabel(seq)) {
      return `frame ${String(seq)} has a label tagged ${JSON.stringify(cmd.text)}`;
    }
  }
  return null;
}

export function parseWorkerData(data: unknown): PresenterWorkerData {
  if (typeof data !== "object" || data === null) {
    throw new Error("presenterWorker: workerData must be an object");
  }
  const wire = data as Partial<PresenterWorkerData>;
  if (!(wire.frames instanceof SharedArrayBuffer) || !(wire.control instanceof SharedArrayBuffer)) {
    throw new Error("presenterWorker: frames and control must be SharedArrayBuffers");
  }
  if (wire.control.byteLength < PRESENTER_CONTROL_BYTES) {
    throw new Error("presenterWorker: control buffer too small");
  }
  const poll = wire.pollIntervalMs;
  if (typeof poll !== "number" || !Number.isFinite(poll) || poll <= 0) {
    throw new Error(`presenterWorker: pollIntervalMs must be a positive number (got ${String(poll)})`);
  }
  return Object.freeze({
    frames: wire.frames,
    control: wire.control,
    pollIntervalMs: poll,
    expectTagged: wire.expectTagged === true,
    reportFrames: wire.reportFrames === true,
  });
}
