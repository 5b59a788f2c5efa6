/**
 * packages/core/src/render/displayListCodec.ts — Binary display list format.
 *
 * Layout (little-endian, every record 4-byte aligned):
 *   header (16 bytes): magic u32 "TRDL", version u32, command count u32, total bytes u32
 *   command: opcode u16, reserved u16, record size u32 (incl. these 8 bytes), payload
 *     coordinates and sizes are f64; colors u32;
 *     strings are u32 byte length followed by UTF-8 bytes padded to 4.
 *
 * Frames cross threads as these bytes through the triple buffer.
 */

import { TrellisError } from "../errors.js";
import type { DisplayList, PaintCommand } from "./displayList.js";

/** "TRDL" as a little-endian u32. */
export const DISPLAY_LIST_MAGIC = 0x4c445254;
export const DISPLAY_LIST_VERSION = 1;
export const DISPLAY_LIST_HEADER_SIZE = 16;

export const OP_RECT = 1;
export const OP_PUSH_CLIP = 2;
export const OP_POP_CLIP = 3;
export const OP_LABEL = 4;
export const OP_OVERFLOW_INDICATOR = 5;
export const OP_ERROR_PLACEHOLDER = 6;

const CMD_HEADER_SIZE = 8;
const F64 = 8;

export function align4(n: number): number {
  return (n + 3) & ~3;
}

type Utf8 = Readonly<{ encode: (s: string) => Uint8Array; decode: (b: Uint8Array) => string }>;

function createUtf8(): Utf8 {
  const enc = new TextEncoder();
  const dec = new TextDecoder("utf-8", { fatal: true });
  return { encode: (s) => enc.encode(s), decode: (b) => dec.decode(b) };
}

const utf8 = createUtf8();

function stringBytes(len: number): number {
  return 4 + align4(len);
}

function recordSize(cmd: PaintCommand, encoded: Uint8Array | null): number {
  switch (cmd.op) {
    case "rect":
      return CMD_HEADER_SIZE + 4 * F64 + 4 + 4;
    case "pushClip":
    case "overflowIndicator":
      return CMD_HEADER_SIZE + 4 * F64;
    case "popClip":
      return CMD_HEADER_SIZE;
    case "label":
      return CMD_HEADER_SIZE + 2 * F64 + stringBytes(encoded?.length ?? 0);
    case "errorPlaceholder":
      return CMD_HEADER_SIZE + 4 * F64 + stringBytes(encoded?.length ?? 0);
  }
}

function opcodeOf(cmd: PaintCommand): number {
  switch (cmd.op) {
    case "rect":
      return OP_RECT;
    case "pushClip":
      return OP_PUSH_CLIP;
    case "popClip":
      return OP_POP_CLIP;
    case "label":
      return OP_LABEL;
    case "overflowIndicator":
      return OP_OVERFLOW_INDICATOR;
    case "errorPlaceholder":
      return OP_ERROR_PLACEHOLDER;
  }
}

function textOf(cmd: PaintCommand): string | null {
  if (cmd.op === "label") return cmd.text;
  if (cmd.op === "errorPlaceholder") return cmd.message;
  return null;
}

export function encodeDisplayList(list: DisplayList): Uint8Array {
  const encodedText: (Uint8Array | null)[] = [];
  let total = DISPLAY_LIST_HEADER_SIZE;
  for (const cmd of list) {
    const text = textOf(cmd);
    const encoded = text === null ? null : utf8.encode(text);
    encodedText.push(encoded);
    total += recordSize(cmd, encoded);
  }

  const bytes = new Uint8Array(total);
  const dv = new DataView(bytes.buffer);
  dv.setUint32(0, DISPLAY_LIST_MAGIC, true);
  dv.setUint32(4, DISPLAY_LIST_VERSION, true);
  dv.setUint32(8, list.length, true);
  dv.setUint32(12, total, true);

  let pos = DISPLAY_LIST_HEADER_SIZE;
  const f64 = (v: number): void => {
    dv.setFloat64(pos, v, true);
    pos += F64;
  };
  const str = (b: Uint8Array | null | undefined): void => {
    const len = b?.length ?? 0;
    dv.setUint32(pos, len, true);
    pos += 4;
    if (b) bytes.set(b, pos);
    pos += align4(len);
  };

  for (let i = 0; i < list.length; i++) {
    const cmd = list[i];
    if (cmd === undefined) continue;
    const encoded = encodedText[i] ?? null;
    const start = pos;
    dv.setUint16(pos, opcodeOf(cmd), true);
    dv.setUint16(pos + 2, 0, true);
    dv.setUint32(pos + 4, recordSize(cmd, encoded), true);
    pos += CMD_HEADER_SIZE;
    switch (cmd.op) {
      case "rect":
        f64(cmd.x);
        f64(cmd.y);
        f64(cmd.width);
        f64(cmd.height);
        dv.setUint32(pos, cmd.color >>> 0, true);
        dv.setUint32(pos + 4, 0, true);
        pos += 8;
        break;
      case "pushClip":
      case "overflowIndicator":
        f64(cmd.x);
        f64(cmd.y);
        f64(cmd.width);
        f64(cmd.height);
        break;
      case "popClip":
        break;
      case "label":
        f64(cmd.x);
        f64(cmd.y);
        str(encoded);
        break;
      case "errorPlaceholder":
        f64(cmd.x);
        f64(cmd.y);
        f64(cmd.width);
        f64(cmd.height);
        str(encoded);
        break;
    }
    if (pos - start !== recordSize(cmd, encoded)) {
      throw new TrellisError("TRELLIS_INVALID_STATE", `encodeDisplayList: record size drift at command ${String(i)}`);
    }
  }
  return bytes;
}

function malformed(detail: string): TrellisError {
  return new TrellisError("TRELLIS_PROTOCOL_VIOLATION", `decodeDisplayList: ${detail}`);
}

export function decodeDisplayList(bytes: Uint8Array): DisplayList {
  if (bytes.byteLength < DISPLAY_LIST_HEADER_SIZE) throw malformed("truncated header");
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (dv.getUint32(0, true) !== DISPLAY_LIST_MAGIC) throw malformed("bad magic");
  const version = dv.getUint32(4, true);
  if (version !== DISPLAY_LIST_VERSION) throw malformed(`unsupported version ${String(version)}`);
  const count = dv.getUint32(8, true);
  const total = dv.getUint32(12, true);
  if (total > bytes.byteLength) throw malformed(`total ${String(total)} exceeds ${String(bytes.byteLength)} bytes`);

  const out: PaintCommand[] = [];
  let pos = DISPLAY_LIST_HEADER_SIZE;
  const need = (n: number): void => {
    if (pos + n > total) throw malformed(`command overruns frame at offset ${String(pos)}`);
  };
  const f64 = (): number => {
    need(F64);
    const v = dv.getFloat64(pos, true);
    pos += F64;
    return v;
  };
  const str = (): string => {
    need(4);
    const len = dv.getUint32(pos, true);
    pos += 4;
    need(align4(len));
    const text = utf8.decode(bytes.subarray(pos, pos + len));
    pos += align4(len);
    return text;
  };

  for (let i = 0; i < count; i++) {
    need(CMD_HEADER_SIZE);
    const start = pos;
    const opcode = dv.getUint16(pos, true);
    const size = dv.getUint32(pos + 4, true);
    pos += CMD_HEADER_SIZE;
    switch (opcode) {
      case OP_RECT: {
        const x = f64();
        const y = f64();
        const width = f64();
        const height = f64();
        need(8);
        const color = dv.getUint32(pos, true);
        pos += 8;
        out.push(Object.freeze({ op: "rect", x, y, width, height, color }));
        break;
      }
      case OP_PUSH_CLIP:
      case OP_OVERFLOW_INDICATOR: {
        const x = f64();
        const y = f64();
        const width = f64();
        const height = f64();
        out.push(
          Object.freeze({
            op: opcode === OP_PUSH_CLIP ? "pushClip" : "overflowIndicator",
            x,
            y,
            width,
            height,
          }),
        );
        break;
      }
      case OP_POP_CLIP:
        out.push(Object.freeze({ op: "popClip" }));
        break;
      case OP_LABEL: {
        const x = f64();
        const y = f64();
        out.push(Object.freeze({ op: "label", x, y, text: str() }));
        break;
      }
      case OP_ERROR_PLACEHOLDER: {
        const x = f64();
        const y = f64();
        const width = f64();
        const height = f64();
        out.push(Object.freeze({ op: "errorPlaceholder", x, y, width, height, message: str() }));
        break;
      }
      default:
        throw malformed(`unknown opcode ${String(opcode)} at offset ${String(start)}`);
    }
    if (pos - start !== size) {
      throw malformed(`record size ${String(size)} does not match payload at offset ${String(start)}`);
    }
  }
  if (pos !== total) throw malformed(`trailing bytes after ${String(count)} commands`);
  return Object.freeze(out);
}
