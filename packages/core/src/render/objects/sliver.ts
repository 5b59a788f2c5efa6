/**
 * packages/core/src/render/objects/sliver.ts — Built-in sliver render objects
 * and the viewport that hosts them.
 */

import { invalidProps } from "../../errors.js";
import { type View, type ViewKey, type RenderView, renderView } from "../../runtime/view.js";
import { type BoxConstraints, biggestFinite, boxConstraints } from "../boxConstraints.js";
import {
  type Axis,
  type SliverConstraints,
  type SliverGeometry,
  ZERO_SLIVER_GEOMETRY,
  calculatePaintOffset,
  mainAxisOffset,
  sliverConstraints,
  sliverGeometry,
} from "../sliverConstraints.js";
import {
  type BoxRenderObject,
  type LayoutContext,
  type Offset,
  type PaintContext,
  type Size,
  type SliverRenderObject,
  LEAF,
  SINGLE,
  VARIABLE,
} from "../types.js";

function keyed(key: ViewKey | undefined): Readonly<{ key?: ViewKey }> {
  return key === undefined ? {} : { key };
}

function checkPositive(owner: string, name: string, v: number): void {
  if (!Number.isFinite(v) || v <= 0) {
    throw invalidProps(`${owner}: ${name} must be a finite positive number (got ${String(v)})`);
  }
}

/** Box constraints for a child that fills the cross axis and sizes itself along the main axis. */
function crossTight(axis: Axis, cross: number, mainMin: number, mainMax: number): BoxConstraints {
  return axis === "vertical"
    ? boxConstraints(cross, cross, mainMin, mainMax)
    : boxConstraints(mainMin, mainMax, cross, cross);
}

function clipToBounds(ctx: PaintContext, at: Offset, paintChildren: () => void): void {
  ctx.canvas.pushClip(at.x, at.y, ctx.size.width, ctx.size.height);
  paintChildren();
  ctx.canvas.popClip();
}

function paintAll(ctx: PaintContext): void {
  for (let i = 0; i < ctx.childCount; i++) ctx.paintChild(i);
}

// =============================================================================
// Sequential layout
// =============================================================================

export type SliverSequenceResult = Readonly<{
  scrollExtent: number;
  paintExtent: number;
  maxPaintExtent: number;
  hasVisualOverflow: boolean;
  /** Children laid out before the remaining paint extent ran out. */
  laidOut: number;
}>;

/**
 * Lay out sliver children one after another along `c.axis`. Each child sees
 * the scroll offset and paint extent left over by its predecessors and is
 * positioned at the paint extent accumulated so far. Layout stops once the
 * remaining paint extent is used up; later children are culled.
 */
export function layoutSliverSequence(ctx: LayoutContext, c: SliverConstraints): SliverSequenceResult {
  let scroll = 0;
  let paint = 0;
  let maxPaint = 0;
  let overflow = false;
  let laidOut = 0;
  for (let i = 0; i < ctx.childCount; i++) {
    if (c.remainingPaintExtent - paint <= 0) break;
    const g: SliverGeometry = ctx.layoutSliver(
      i,
      sliverConstraints({
        axis: c.axis,
        scrollOffset: Math.max(c.scrollOffset - scroll, 0),
        remainingPaintExtent: Math.max(c.remainingPaintExtent - paint, 0),
        crossAxisExtent: c.crossAxisExtent,
        viewportMainAxisExtent: c.viewportMainAxisExtent,
        precedingScrollExtent: c.precedingScrollExtent + scroll,
      }),
    );
    ctx.positionChild(i, mainAxisOffset(c.axis, paint));
    scroll += g.scrollExtent;
    paint += g.paintExtent;
    maxPaint += g.maxPaintExtent;
    if (g.hasVisualOverflow) overflow = true;
    laidOut++;
  }
  return {
    scrollExtent: scroll,
    paintExtent: Math.min(paint, c.remainingPaintExtent),
    maxPaintExtent: maxPaint,
    hasVisualOverflow: overflow || paint > c.remainingPaintExtent,
    laidOut,
  };
}

// =============================================================================
// Sliver extent leaf
// =============================================================================

/** Leaf sliver with a fixed scroll extent that paints a rect over its visible part. */
export class RenderSliverExtent implements SliverRenderObject {
  readonly protocol = "sliver";
  readonly arity = LEAF;
  readonly debugName = "SliverExtent";
  extent = 0;
  color = 0;
  label: string | undefined = undefined;

  performLayout(_ctx: LayoutContext, c: SliverConstraints): SliverGeometry {
    const paintExtent = calculatePaintOffset(c, 0, this.extent);
    return sliverGeometry({ scrollExtent: this.extent, paintExtent });
  }

  paint(ctx: PaintContext, at: Offset): void {
    ctx.canvas.rect(at.x, at.y, ctx.size.width, ctx.size.height, this.color);
    if (this.label !== undefined) ctx.canvas.label(at.x, at.y, this.label);
  }
}

export function sliverExtent(
  props: Readonly<{ key?: ViewKey; extent: number; color?: number; label?: string }>,
): RenderView {
  if (!Number.isFinite(props.extent) || props.extent < 0) {
    throw invalidProps(`sliverExtent: extent must be a finite non-negative number (got ${String(props.extent)})`);
  }
  return renderView(RenderSliverExtent, "sliver", {
    ...keyed(props.key),
    create: () => new RenderSliverExtent(),
    update: (o) => {
      o.extent = props.extent;
      o.color = props.color ?? 0;
      o.label = props.label;
    },
  });
}

// =============================================================================
// Error sliver
// =============================================================================

/** Stands in for a failed sliver child: no scroll or paint extent. */
export class RenderErrorSliver implements SliverRenderObject {
  readonly protocol = "sliver";
  readonly arity = LEAF;
  readonly debugName = "ErrorSliver";
  message = "";

  performLayout(): SliverGeometry {
    return ZERO_SLIVER_GEOMETRY;
  }

  paint(): void {
    // zero extent: nothing to paint
  }
}

export function errorSliver(message: string, key?: ViewKey): RenderView {
  return renderView(RenderErrorSliver, "sliver", {
    ...keyed(key),
    create: () => new RenderErrorSliver(),
    update: (o) => {
      o.message = message;
    },
  });
}

// =============================================================================
// Sliver to box adapter
// =============================================================================

/** Hosts one box child, scrolled by the incoming scroll offset and clipped to the visible part. */
export class RenderSliverToBoxAdapter implements SliverRenderObject {
  readonly protocol = "sliver";
  readonly arity = SINGLE;
  readonly debugName = "SliverToBoxAdapter";

  performLayout(ctx: LayoutContext, c: SliverConstraints): SliverGeometry {
    if (ctx.childCount === 0) return sliverGeometry({ scrollExtent: 0 });
    const child: Size = ctx.layoutBox(0, crossTight(c.axis, c.crossAxisExtent, 0, Number.POSITIVE_INFINITY));
    const extent = c.axis === "vertical" ? child.height : child.width;
    const paintExtent = calculatePaintOffset(c, 0, extent);
    ctx.positionChild(0, mainAxisOffset(c.axis, -c.scrollOffset));
    return sliverGeometry({
      scrollExtent: extent,
      paintExtent,
      hasVisualOverflow: extent > c.remainingPaintExtent || c.scrollOffset > 0,
    });
  }

  paint(ctx: PaintContext, at: Offset): void {
    if (ctx.childCount === 0) return;
    clipToBounds(ctx, at, () => ctx.paintChild(0));
  }
}

export function sliverToBoxAdapter(child: View, key?: ViewKey): RenderView {
  return renderView(RenderSliverToBoxAdapter, "sliver", {
    ...keyed(key),
    create: () => new RenderSliverToBoxAdapter(),
    children: [child],
  });
}

// =============================================================================
// Fixed-extent list
// =============================================================================

/** Box children of equal main-axis extent; only the children in the visible window are laid out. */
export class RenderSliverFixedExtentList implements SliverRenderObject {
  readonly protocol = "sliver";
  readonly arity = VARIABLE;
  readonly debugName = "SliverFixedExtentList";
  itemExtent = 1;

  performLayout(ctx: LayoutContext, c: SliverConstraints): SliverGeometry {
    const n = ctx.childCount;
    const item = this.itemExtent;
    const scrollExtent = n * item;
    const windowEnd = c.scrollOffset + c.remainingPaintExtent;
    const first = Math.min(Math.floor(c.scrollOffset / item), n);
    const last = Number.isFinite(windowEnd) ? Math.min(Math.ceil(windowEnd / item) - 1, n - 1) : n - 1;
    const childConstraints = crossTight(c.axis, c.crossAxisExtent, item, item);
    for (let i = first; i <= last; i++) {
      ctx.layoutBox(i, childConstraints);
      ctx.positionChild(i, mainAxisOffset(c.axis, i * item - c.scrollOffset));
    }
    const paintExtent = calculatePaintOffset(c, 0, scrollExtent);
    return sliverGeometry({
      scrollExtent,
      paintExtent,
      hasVisualOverflow: scrollExtent - c.scrollOffset > c.remainingPaintExtent || c.scrollOffset > 0,
    });
  }

  paint(ctx: PaintContext, at: Offset): void {
    clipToBounds(ctx, at, () => paintAll(ctx));
  }
}

export function sliverFixedExtentList(
  props: Readonly<{ key?: ViewKey; itemExtent: number }>,
  children: readonly View[],
): RenderView {
  checkPositive("sliverFixedExtentList", "itemExtent", props.itemExtent);
  return renderView(RenderSliverFixedExtentList, "sliver", {
    ...keyed(props.key),
    create: () => new RenderSliverFixedExtentList(),
    update: (o) => {
      o.itemExtent = props.itemExtent;
    },
    children,
  });
}

// =============================================================================
// Sliver group
// =============================================================================

/** Sliver children laid out back to back as one sliver. */
export class RenderSliverGroup implements SliverRenderObject {
  readonly protocol = "sliver";
  readonly arity = VARIABLE;
  readonly debugName = "SliverGroup";

  performLayout(ctx: LayoutContext, c: SliverConstraints): SliverGeometry {
    const r = layoutSliverSequence(ctx, c);
    return sliverGeometry({
      scrollExtent: r.scrollExtent,
      paintExtent: r.paintExtent,
      maxPaintExtent: r.maxPaintExtent,
      hasVisualOverflow: r.hasVisualOverflow,
    });
  }

  paint(ctx: PaintContext): void {
    paintAll(ctx);
  }
}

export function sliverGroup(children: readonly View[], key?: ViewKey): RenderView {
  return renderView(RenderSliverGroup, "sliver", {
    ...keyed(key),
    create: () => new RenderSliverGroup(),
    childProtocol: "sliver",
    children,
  });
}

// =============================================================================
// Viewport
// =============================================================================

/**
 * Box that fills its constraints and shows its sliver children scrolled by
 * `scrollOffset` along `axis`.
 */
export class RenderViewport implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = VARIABLE;
  readonly debugName = "Viewport";
  axis: Axis = "vertical";
  scrollOffset = 0;
  clip = true;
  /** Furthest scroll offset at which content still reaches the trailing edge; from the latest layout. */
  maxScrollExtent = 0;

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    const size = biggestFinite(c);
    const main = this.axis === "vertical" ? size.height : size.width;
    const cross = this.axis === "vertical" ? size.width : size.height;
    const r = layoutSliverSequence(
      ctx,
      sliverConstraints({
        axis: this.axis,
        scrollOffset: this.scrollOffset,
        remainingPaintExtent: main,
        crossAxisExtent: cross,
        viewportMainAxisExtent: main,
        precedingScrollExtent: 0,
      }),
    );
    this.maxScrollExtent = Math.max(r.scrollExtent - main, 0);
    return size;
  }

  paint(ctx: PaintContext, at: Offset): void {
    if (this.clip) clipToBounds(ctx, at, () => paintAll(ctx));
    else paintAll(ctx);
  }
}

export type ViewportProps = Readonly<{
  key?: ViewKey;
  axis?: Axis;
  scrollOffset?: number;
  clip?: boolean;
}>;

export function viewport(props: ViewportProps, slivers: readonly View[]): RenderView {
  const scrollOffset = props.scrollOffset ?? 0;
  if (!Number.isFinite(scrollOffset) || scrollOffset < 0) {
    throw invalidProps(`viewport: scrollOffset must be a finite non-negative number (got ${String(scrollOffset)})`);
  }
  return renderView(RenderViewport, "box", {
    ...keyed(props.key),
    create: () => new RenderViewport(),
    update: (o) => {
      o.axis = props.axis ?? "vertical";
      o.scrollOffset = scrollOffset;
      o.clip = props.clip ?? true;
    },
    childProtocol: "sliver",
    children: slivers,
  });
}
