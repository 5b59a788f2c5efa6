/**
 * packages/core/src/render/boxConstraints.ts — Box layout constraints.
 *
 * Constraints go down, sizes come up. A constraint is valid when
 * 0 <= min <= max on each axis, min is finite and nothing is NaN; max may be
 * Infinity (unbounded). Invalid constraints are a protocol violation.
 */

import { protocolViolation } from "../errors.js";
import type { Size } from "./types.js";

export type BoxConstraints = Readonly<{
  minWidth: number;
  maxWidth: number;
  minHeight: number;
  maxHeight: number;
}>;

export type EdgeInsets = Readonly<{ left: number; top: number; right: number; bottom: number }>;

function checkAxis(axis: string, min: number, max: number): void {
  if (Number.isNaN(min) || Number.isNaN(max)) {
    throw protocolViolation(`BoxConstraints ${axis}: NaN`);
  }
  if (!Number.isFinite(min)) {
    throw protocolViolation(`BoxConstraints ${axis}: min must be finite (got ${String(min)})`);
  }
  if (min < 0 || min > max) {
    throw protocolViolation(
      `BoxConstraints ${axis}: expected 0 <= min <= max (got ${String(min)}..${String(max)})`,
    );
  }
}

export function boxConstraints(
  minWidth: number,
  maxWidth: number,
  minHeight: number,
  maxHeight: number,
): BoxConstraints {
  checkAxis("width", minWidth, maxWidth);
  checkAxis("height", minHeight, maxHeight);
  return Object.freeze({ minWidth, maxWidth, minHeight, maxHeight });
}

export const UNCONSTRAINED: BoxConstraints = boxConstraints(
  0,
  Number.POSITIVE_INFINITY,
  0,
  Number.POSITIVE_INFINITY,
);

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/** Exactly `size`. */
export function tight(s: Size): BoxConstraints {
  return boxConstraints(s.width, s.width, s.height, s.height);
}

/** Tight on the given axes, unconstrained on the others. */
export function tightFor(width?: number, height?: number): BoxConstraints {
  return boxConstraints(
    width ?? 0,
    width ?? Number.POSITIVE_INFINITY,
    height ?? 0,
    height ?? Number.POSITIVE_INFINITY,
  );
}

/** Anything from zero up to `size`. */
export function loose(s: Size): BoxConstraints {
  return boxConstraints(0, s.width, 0, s.height);
}

/** As large as `c` allows on each bounded axis. */
export function expand(c: BoxConstraints): BoxConstraints {
  return boxConstraints(
    hasBoundedWidth(c) ? c.maxWidth : c.minWidth,
    c.maxWidth,
    hasBoundedHeight(c) ? c.maxHeight : c.minHeight,
    c.maxHeight,
  );
}

export function loosen(c: BoxConstraints): BoxConstraints {
  return boxConstraints(0, c.maxWidth, 0, c.maxHeight);
}

/** Tighten to `width`/`height`, clamped into `c`. */
export function tighten(c: BoxConstraints, width?: number, height?: number): BoxConstraints {
  const w = width === undefined ? undefined : clamp(width, c.minWidth, c.maxWidth);
  const h = height === undefined ? undefined : clamp(height, c.minHeight, c.maxHeight);
  return boxConstraints(w ?? c.minWidth, w ?? c.maxWidth, h ?? c.minHeight, h ?? c.maxHeight);
}

/** `c` clamped so it respects `outer`. */
export function enforce(c: BoxConstraints, outer: BoxConstraints): BoxConstraints {
  return boxConstraints(
    clamp(c.minWidth, outer.minWidth, outer.maxWidth),
    clamp(c.maxWidth, outer.minWidth, outer.maxWidth),
    clamp(c.minHeight, outer.minHeight, outer.maxHeight),
    clamp(c.maxHeight, outer.minHeight, outer.maxHeight),
  );
}

/** Shrink by insets, never below zero. */
export function deflate(c: BoxConstraints, insets: EdgeInsets): BoxConstraints {
  const horizontal = insets.left + insets.right;
  const vertical = insets.top + insets.bottom;
  const minWidth = Math.max(0, c.minWidth - horizontal);
  const minHeight = Math.max(0, c.minHeight - vertical);
  return boxConstraints(
    minWidth,
    Math.max(minWidth, c.maxWidth - horizontal),
    minHeight,
    Math.max(minHeight, c.maxHeight - vertical),
  );
}

/** Nearest size to `s` that satisfies `c`. */
export function constrain(c: BoxConstraints, s: Size): Size {
  return Object.freeze({
    width: clamp(s.width, c.minWidth, c.maxWidth),
    height: clamp(s.height, c.minHeight, c.maxHeight),
  });
}

export function isSatisfiedBy(c: BoxConstraints, s: Size): boolean {
  return (
    c.minWidth <= s.width &&
    s.width <= c.maxWidth &&
    c.minHeight <= s.height &&
    s.height <= c.maxHeight
  );
}

/** Largest size `c` allows (may be infinite). */
export function biggest(c: BoxConstraints): Size {
  return Object.freeze({ width: c.maxWidth, height: c.maxHeight });
}

export function smallest(c: BoxConstraints): Size {
  return Object.freeze({ width: c.minWidth, height: c.minHeight });
}

/** Largest finite size: unbounded axes fall back to their minimum. */
export function biggestFinite(c: BoxConstraints): Size {
  return Object.freeze({
    width: hasBoundedWidth(c) ? c.maxWidth : c.minWidth,
    height: hasBoundedHeight(c) ? c.maxHeight : c.minHeight,
  });
}

export function hasBoundedWidth(c: BoxConstraints): boolean {
  return Number.isFinite(c.maxWidth);
}

export function hasBoundedHeight(c: BoxConstraints): boolean {
  return Number.isFinite(c.maxHeight);
}

export function isTight(c: BoxConstraints): boolean {
  return c.minWidth === c.maxWidth && c.minHeight === c.maxHeight;
}

export function boxConstraintsEqual(a: BoxConstraints, b: BoxConstraints): boolean {
  return (
    a.minWidth === b.minWidth &&
    a.maxWidth === b.maxWidth &&
    a.minHeight === b.minHeight &&
    a.maxHeight === b.maxHeight
  );
}

export function describeBoxConstraints(c: BoxConstraints): string {
  return `BoxConstraints(w ${String(c.minWidth)}..${String(c.maxWidth)}, h ${String(c.minHeight)}..${String(c.maxHeight)})`;
}
