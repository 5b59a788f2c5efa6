/**
 * packages/core/src/pipeline/tripleBuffer.ts — Lock-free latest-frame exchange.
 *
 * Three byte slots plus a control word in one SharedArrayBuffer. The producer
 * owns a write slot, the consumer owns a read slot, and the third ("swap")
 * slot is handed between them with a single atomic exchange:
 *
 *   control word = swap index (bits 0-1) | FRESH (bit 2)
 *
 *   publish(): write slot <-> swap slot, set FRESH.
 *   acquire(): if FRESH, read slot <-> swap slot, clear FRESH.
 *
 * Neither side ever waits. A frame published while the previous one is still
 * unread replaces it (latest wins); the consumer never observes a slot the
 * producer is writing.
 *
 * Buffer layout (Int32 words, then slot bytes):
 *   [0] control   [1] magic   [2] slot capacity
 *   [3..5] byte length per slot   [6..8] sequence per slot
 *   [HEADER_BYTES ...] slot 0 | slot 1 | slot 2
 */

import { TrellisError, invalidProps, protocolViolation } from "../errors.js";

const CONTROL = 0;
const MAGIC_WORD = 1;
const CAPACITY_WORD = 2;
const LENGTH_BASE = 3;
const SEQ_BASE = 6;
const HEADER_WORDS = 12;

export const TRIPLE_BUFFER_HEADER_BYTES = HEADER_WORDS * 4;
export const TRIPLE_BUFFER_MAGIC = 0x42425254; // "TRBB"

const INDEX_MASK = 0b011;
const FRESH = 0b100;

export type SlotIndex = 0 | 1 | 2;

function toSlotIndex(v: number): SlotIndex {
  const i = v & INDEX_MASK;
  if (i === 0 || i === 1 || i === 2) return i;
  throw protocolViolation(`tripleBuffer: corrupt control word (slot index ${String(i)})`);
}

export class TripleBuffer {
  readonly shared: SharedArrayBuffer;
  readonly slotCapacity: number;
  private readonly header: Int32Array;
  private readonly bytes: Uint8Array;
  private writeIndex: SlotIndex = 0;
  private readIndex: SlotIndex = 2;

  private constructor(shared: SharedArrayBuffer, slotCapacity: number) {
    this.shared = shared;
    this.slotCapacity = slotCapacity;
    this.header = new Int32Array(shared, 0, HEADER_WORDS);
    this.bytes = new Uint8Array(shared, TRIPLE_BUFFER_HEADER_BYTES, slotCapacity * 3);
  }

  /** Allocate a buffer; the creating side is expected to be the producer. */
  static create(slotCapacity: number): TripleBuffer {
    if (!Number.isInteger(slotCapacity) || slotCapacity <= 0) {
      throw invalidProps(`tripleBuffer: slotCapacity must be a positive integer (got ${String(slotCapacity)})`);
    }
    const shared = new SharedArrayBuffer(TRIPLE_BUFFER_HEADER_BYTES + slotCapacity * 3);
    const tb = new TripleBuffer(shared, slotCapacity);
    Atomics.store(tb.header, MAGIC_WORD, TRIPLE_BUFFER_MAGIC);
    Atomics.store(tb.header, CAPACITY_WORD, slotCapacity);
    Atomics.store(tb.header, CONTROL, 1);
    return tb;
  }

  /** Open a buffer created elsewhere (typically on another thread, as the consumer). */
  static attach(shared: SharedArrayBuffer): TripleBuffer {
    if (shared.byteLength < TRIPLE_BUFFER_HEADER_BYTES) {
      throw protocolViolation(`tripleBuffer.attach: buffer too small (${String(shared.byteLength)} bytes)`);
    }
    const header = new Int32Array(shared, 0, HEADER_WORDS);
    if (Atomics.load(header, MAGIC_WORD) !== TRIPLE_BUFFER_MAGIC) {
      throw protocolViolation("tripleBuffer.attach: bad magic");
    }
    const slotCapacity = Atomics.load(header, CAPACITY_WORD);
    if (slotCapacity <= 0 || TRIPLE_BUFFER_HEADER_BYTES + slotCapacity * 3 > shared.byteLength) {
      throw protocolViolation(`tripleBuffer.attach: slot capacity ${String(slotCapacity)} does not fit the buffer`);
    }
    return new TripleBuffer(shared, slotCapacity);
  }

  private slot(index: SlotIndex): Uint8Array {
    const start = index * this.slotCapacity;
    return this.bytes.subarray(start, start + this.slotCapacity);
  }

  // ---------------------------------------------------------------------------
  // Producer
  // ---------------------------------------------------------------------------

  /** The producer's current slot, full capacity. */
  writeView(): Uint8Array {
    return this.slot(this.writeIndex);
  }

  /**
   * Copy `frame` into the write slot and publish it.
   * Returns true if an unread frame was replaced.
   */
  write(frame: Uint8Array, seq: number): boolean {
    if (frame.byteLength > this.slotCapacity) {
      throw new TrellisError(
        "TRELLIS_INVALID_STATE",
        `tripleBuffer: frame of ${String(frame.byteLength)} bytes exceeds slot capacity ${String(this.slotCapacity)}`,
      );
    }
    this.writeView().set(frame);
    return this.publish(frame.byteLength, seq);
  }

  /**
   * Publish the first `byteLength` bytes of the write slot with sequence `seq`.
   * Returns true if an unread frame was replaced.
   */
  publish(byteLength: number, seq: number): boolean {
    if (!Number.isInteger(byteLength) || byteLength < 0 || byteLength > this.slotCapacity) {
      throw protocolViolation(`tripleBuffer.publish: invalid byte length ${String(byteLength)}`);
    }
    Atomics.store(this.header, LENGTH_BASE + this.writeIndex, byteLength);
    Atomics.store(this.header, SEQ_BASE + this.writeIndex, seq | 0);
    const prev = Atomics.exchange(this.header, CONTROL, this.writeIndex | FRESH);
    this.writeIndex = toSlotIndex(prev);
    return (prev & FRESH) !== 0;
  }

  // ---------------------------------------------------------------------------
  // Consumer
  // ---------------------------------------------------------------------------

  hasFresh(): boolean {
    return (Atomics.load(this.header, CONTROL) & FRESH) !== 0;
  }

  /** Take the latest published frame, if any arrived since the last acquire. */
  acquire(): boolean {
    if (!this.hasFresh()) return false;
    const prev = Atomics.exchange(this.header, CONTROL, this.readIndex);
    this.readIndex = toSlotIndex(prev);
    return true;
  }

  /** Bytes of the frame last acquired (empty before the first). */
  readView(): Uint8Array {
    const len = Atomics.load(this.header, LENGTH_BASE + this.readIndex);
    return this.slot(this.readIndex).subarray(0, len);
  }

  readSeq(): number {
    return Atomics.load(this.header, SEQ_BASE + this.readIndex);
  }
}
