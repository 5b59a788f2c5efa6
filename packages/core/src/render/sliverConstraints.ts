/**
 * packages/core/src/render/sliverConstraints.ts — Sliver layout protocol values.
 *
 * Slivers lay out along a scroll axis. The parent says how far the viewport is
 * scrolled into this sliver (`scrollOffset`) and how much paintable extent is
 * left (`remainingPaintExtent`); the sliver answers with its total scrollable
 * extent and how much of it is visible.
 */

import { protocolViolation } from "../errors.js";

export type Axis = "vertical" | "horizontal";

export type SliverConstraints = Readonly<{
  axis: Axis;
  /** How far the leading edge of the viewport is past this sliver's start. */
  scrollOffset: number;
  remainingPaintExtent: number;
  crossAxisExtent: number;
  viewportMainAxisExtent: number;
  /** Scroll extent consumed by slivers before this one. */
  precedingScrollExtent: number;
}>;

export type SliverGeometry = Readonly<{
  scrollExtent: number;
  paintExtent: number;
  paintOrigin: number;
  layoutExtent: number;
  maxPaintExtent: number;
  hitTestExtent: number;
  visible: boolean;
  hasVisualOverflow: boolean;
}>;

function checkNonNegative(name: string, v: number, allowInfinity: boolean): void {
  if (Number.isNaN(v) || v < 0 || (!allowInfinity && !Number.isFinite(v))) {
    throw protocolViolation(`SliverConstraints.${name}: invalid value ${String(v)}`);
  }
}

export function sliverConstraints(init: SliverConstraints): SliverConstraints {
  checkNonNegative("scrollOffset", init.scrollOffset, false);
  checkNonNegative("remainingPaintExtent", init.remainingPaintExtent, true);
  checkNonNegative("crossAxisExtent", init.crossAxisExtent, false);
  checkNonNegative("viewportMainAxisExtent", init.viewportMainAxisExtent, false);
  checkNonNegative("precedingScrollExtent", init.precedingScrollExtent, true);
  return Object.freeze({ ...init });
}

export function sliverConstraintsEqual(a: SliverConstraints, b: SliverConstraints): boolean {
  return (
    a.axis === b.axis &&
    a.scrollOffset === b.scrollOffset &&
    a.remainingPaintExtent === b.remainingPaintExtent &&
    a.crossAxisExtent === b.crossAxisExtent &&
    a.viewportMainAxisExtent === b.viewportMainAxisExtent &&
    a.precedingScrollExtent === b.precedingScrollExtent
  );
}

export type SliverGeometryInit = Readonly<{
  scrollExtent: number;
  paintExtent?: number;
  paintOrigin?: number;
  layoutExtent?: number;
  maxPaintExtent?: number;
  hitTestExtent?: number;
  visible?: boolean;
  hasVisualOverflow?: boolean;
}>;

/**
 * Geometry with the usual defaults: layout and hit-test extents follow the
 * paint extent, max paint extent follows the scroll extent, and the sliver is
 * visible when it paints anything.
 */
export function sliverGeometry(init: SliverGeometryInit): SliverGeometry {
  const paintExtent = init.paintExtent ?? 0;
  const layoutExtent = init.layoutExtent ?? paintExtent;
  const geometry: SliverGeometry = {
    scrollExtent: init.scrollExtent,
    paintExtent,
    paintOrigin: init.paintOrigin ?? 0,
    layoutExtent,
    maxPaintExtent: init.maxPaintExtent ?? init.scrollExtent,
    hitTestExtent: init.hitTestExtent ?? paintExtent,
    visible: init.visible ?? paintExtent > 0,
    hasVisualOverflow: init.hasVisualOverflow ?? false,
  };
  if (
    Number.isNaN(geometry.scrollExtent) ||
    geometry.scrollExtent < 0 ||
    Number.isNaN(paintExtent) ||
    paintExtent < 0
  ) {
    throw protocolViolation(
      `SliverGeometry: extents must be non-negative (scroll ${String(geometry.scrollExtent)}, paint ${String(paintExtent)})`,
    );
  }
  if (layoutExtent > paintExtent) {
    throw protocolViolation(
      `SliverGeometry: layoutExtent ${String(layoutExtent)} exceeds paintExtent ${String(paintExtent)}`,
    );
  }
  return Object.freeze(geometry);
}

export const ZERO_SLIVER_GEOMETRY: SliverGeometry = sliverGeometry({ scrollExtent: 0 });

/**
 * Portion of the range [from, to) (in this sliver's scroll coordinates) that
 * falls inside the visible window described by `c`.
 */
export function calculatePaintOffset(c: SliverConstraints, from: number, to: number): number {
  const start = c.scrollOffset;
  const end = c.scrollOffset + c.remainingPaintExtent;
  const a = Math.min(Math.max(from, start), end);
  const b = Math.min(Math.max(to, start), end);
  return Math.min(Math.max(b - a, 0), c.remainingPaintExtent);
}

/** Main-axis offset expressed as a 2D offset along `axis`. */
export function mainAxisOffset(axis: Axis, main: number): Readonly<{ x: number; y: number }> {
  return axis === "vertical" ? { x: 0, y: main } : { x: main, y: 0 };
}
