/**
 * packages/core/src/render/types.ts — Render object capability interfaces.
 *
 * A render object is the layout/paint behaviour owned by a render node. The
 * render tree (renderTree.ts) owns all bookkeeping: parent/child links,
 * cached constraints and geometry, dirty flags, paint caches. Objects only
 * compute: `performLayout` receives a LayoutContext for its children and
 * returns its own size (box) or geometry (sliver); `paint` emits commands and
 * asks the context to paint children at their cached offsets.
 */

import type { BoxConstraints } from "./boxConstraints.js";
import type { Canvas } from "./displayList.js";
import type { SliverConstraints, SliverGeometry } from "./sliverConstraints.js";
import type { RenderId } from "../runtime/identity.js";

export type Size = Readonly<{ width: number; height: number }>;
export type Offset = Readonly<{ x: number; y: number }>;
export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

export const ZERO_SIZE: Size = Object.freeze({ width: 0, height: 0 });
export const ZERO_OFFSET: Offset = Object.freeze({ x: 0, y: 0 });

export function offset(x: number, y: number): Offset {
  return Object.freeze({ x, y });
}

export function size(width: number, height: number): Size {
  return Object.freeze({ width, height });
}

export function addOffsets(a: Offset, b: Offset): Offset {
  return Object.freeze({ x: a.x + b.x, y: a.y + b.y });
}

export function offsetsEqual(a: Offset, b: Offset): boolean {
  return a.x === b.x && a.y === b.y;
}

export function sizesEqual(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

export type RenderProtocol = "box" | "sliver";

/** How many children a render object accepts. */
export type Arity =
  | Readonly<{ kind: "leaf" }>
  | Readonly<{ kind: "single" }>
  | Readonly<{ kind: "fixed"; count: number }>
  | Readonly<{ kind: "variable" }>;

export const LEAF: Arity = Object.freeze({ kind: "leaf" });
export const SINGLE: Arity = Object.freeze({ kind: "single" });
export const VARIABLE: Arity = Object.freeze({ kind: "variable" });

export function fixedArity(count: number): Arity {
  return Object.freeze({ kind: "fixed", count });
}

export function describeArity(arity: Arity): string {
  return arity.kind === "fixed" ? `fixed(${String(arity.count)})` : arity.kind;
}

/** Children available to a render object during `performLayout`. */
export interface LayoutContext {
  readonly nodeId: RenderId;
  readonly childCount: number;
  childProtocol(index: number): RenderProtocol;
  /** Lay out a box child. Each child may be laid out at most once per call. */
  layoutBox(index: number, constraints: BoxConstraints): Size;
  /** Lay out a sliver child. Each child may be laid out at most once per call. */
  layoutSliver(index: number, constraints: SliverConstraints): SliverGeometry;
  /** Record where the child paints, relative to this node's origin. */
  positionChild(index: number, offset: Offset): void;
  /** Content extent this node could not fit in its own size. */
  reportOverflow(contentSize: Size): void;
}

export interface PaintContext {
  readonly nodeId: RenderId;
  readonly canvas: Canvas;
  /** Painted bounds from the latest layout; for slivers, the visible rect along the axis. */
  readonly size: Size;
  /** Latest geometry for slivers, null for boxes. */
  readonly geometry: SliverGeometry | null;
  readonly childCount: number;
  /** Paint child `index` at this node's offset plus the child's cached offset. Culled children are skipped. */
  paintChild(index: number): void;
}

type RenderObjectBase = {
  readonly arity: Arity;
  readonly debugName: string;
  paint(ctx: PaintContext, offset: Offset): void;
  /** Whether a point (local coordinates) inside the node's bounds hits the node itself. Defaults to true. */
  hitTestSelf?(local: Offset): boolean;
};

export interface BoxRenderObject extends RenderObjectBase {
  readonly protocol: "box";
  performLayout(ctx: LayoutContext, constraints: BoxConstraints): Size;
}

export interface SliverRenderObject extends RenderObjectBase {
  readonly protocol: "sliver";
  performLayout(ctx: LayoutContext, constraints: SliverConstraints): SliverGeometry;
}

export type RenderObject = BoxRenderObject | SliverRenderObject;
