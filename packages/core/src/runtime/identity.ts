/**
 * packages/core/src/runtime/identity.ts — Monotonic id allocation.
 *
 * Element ids and render ids come from an allocator that never reuses a value.
 * Ids compare by creation order. A SharedArrayBuffer-backed allocator shares
 * one counter between worker threads (advanced with Atomics.add), so views
 * produced off the frame thread never collide with ids issued on it.
 */

import { TrellisError } from "../errors.js";

/** Identifier of an element in the element arena. */
export type ElementId = number;

/** Identifier of a render node in the render arena. */
export type RenderId = number;

export type IdAllocator = Readonly<{
  /** Issue the next id. Throws TRELLIS_ID_EXHAUSTED past Number.MAX_SAFE_INTEGER. */
  allocate: () => number;
  /** Next id that `allocate` would return (no side effects). */
  peek: () => number;
}>;

/** Bytes needed for a shared allocator counter. */
export const SHARED_ID_COUNTER_BYTES = 8;

function exhausted(): TrellisError {
  return new TrellisError("TRELLIS_ID_EXHAUSTED", "id allocator exhausted Number.MAX_SAFE_INTEGER");
}

function assertStart(start: number): void {
  if (!Number.isSafeInteger(start) || start < 0) {
    throw new TrellisError(
      "TRELLIS_INVALID_PROPS",
      `createIdAllocator: start must be a non-negative safe integer (got ${String(start)})`,
    );
  }
}

/**
 * Allocate a shared counter initialised to `start`.
 * Pass the result to `createIdAllocator` on every thread that issues ids.
 */
export function createSharedIdCounter(start = 1): SharedArrayBuffer {
  assertStart(start);
  const shared = new SharedArrayBuffer(SHARED_ID_COUNTER_BYTES);
  Atomics.store(new BigInt64Array(shared), 0, BigInt(start));
  return shared;
}

/**
 * With `shared`, `start` is a floor: a counter below it is raised to it, a
 * counter already past it is left alone.
 */
export function createIdAllocator(start = 1, shared?: SharedArrayBuffer): IdAllocator {
  assertStart(start);

  if (shared !== undefined) {
    if (shared.byteLength < SHARED_ID_COUNTER_BYTES) {
      throw new TrellisError(
        "TRELLIS_INVALID_PROPS",
        `createIdAllocator: shared counter needs ${String(SHARED_ID_COUNTER_BYTES)} bytes`,
      );
    }
    const counter = new BigInt64Array(shared, 0, 1);
    const floor = BigInt(start);
    let seen = Atomics.load(counter, 0);
    while (seen < floor) {
      const prev = Atomics.compareExchange(counter, 0, seen, floor);
      if (prev === seen) break;
      seen = prev;
    }
    const max = BigInt(Number.MAX_SAFE_INTEGER);
    return Object.freeze({
      allocate(): number {
        const prev = Atomics.add(counter, 0, 1n);
        if (prev > max) throw exhausted();
        return Number(prev);
      },
      peek(): number {
        return Number(Atomics.load(counter, 0));
      },
    });
  }

  let next = start;
  return Object.freeze({
    allocate(): number {
      if (next > Number.MAX_SAFE_INTEGER) throw exhausted();
      const id = next;
      next++;
      return id;
    },
    peek(): number {
      return next;
    },
  });
}
