/**
 * packages/core/src/render/objects/box.ts — Built-in box render objects.
 *
 * Enough primitives to drive the box protocol end to end: a sized leaf, a
 * colored container, padding, an extra-constraints wrapper, a linear flex, a
 * stack and the error box used as a build-failure placeholder. Visual widgets
 * live outside the core.
 */

import { invalidProps } from "../../errors.js";
import { type View, type ViewKey, type RenderView, renderView } from "../../runtime/view.js";
import {
  type BoxConstraints,
  type EdgeInsets,
  biggestFinite,
  boxConstraints,
  constrain,
  deflate,
  enforce,
  loosen,
} from "../boxConstraints.js";
import {
  type BoxRenderObject,
  type LayoutContext,
  type Offset,
  type PaintContext,
  type Size,
  LEAF,
  SINGLE,
  VARIABLE,
  ZERO_SIZE,
} from "../types.js";

function checkExtent(owner: string, name: string, v: number | undefined): void {
  if (v === undefined) return;
  if (!Number.isFinite(v) || v < 0) {
    throw invalidProps(`${owner}: ${name} must be a finite non-negative number (got ${String(v)})`);
  }
}

function childList(child: View | undefined): readonly View[] {
  return child === undefined ? [] : [child];
}

export function insetsAll(v: number): EdgeInsets {
  return Object.freeze({ left: v, top: v, right: v, bottom: v });
}

export function insetsSymmetric(horizontal: number, vertical: number): EdgeInsets {
  return Object.freeze({ left: horizontal, top: vertical, right: horizontal, bottom: vertical });
}

// =============================================================================
// Sized leaf
// =============================================================================

/** Leaf with a preferred size; an unspecified axis fills its bounded maximum. */
export class RenderSizedBox implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = LEAF;
  readonly debugName = "SizedBox";
  width: number | undefined = undefined;
  height: number | undefined = undefined;
  /** 0xRRGGBB */
  color = 0;
  label: string | undefined = undefined;

  performLayout(_ctx: LayoutContext, c: BoxConstraints): Size {
    const fill = biggestFinite(c);
    return { width: this.width ?? fill.width, height: this.height ?? fill.height };
  }

  paint(ctx: PaintContext, at: Offset): void {
    ctx.canvas.rect(at.x, at.y, ctx.size.width, ctx.size.height, this.color);
    if (this.label !== undefined) ctx.canvas.label(at.x, at.y, this.label);
  }
}

export type SizedBoxProps = Readonly<{
  key?: ViewKey;
  width?: number;
  height?: number;
  color?: number;
  label?: string;
}>;

export function sizedBox(props: SizedBoxProps = {}): RenderView {
  checkExtent("sizedBox", "width", props.width);
  checkExtent("sizedBox", "height", props.height);
  return renderView(RenderSizedBox, "box", {
    ...(props.key === undefined ? {} : { key: props.key }),
    create: () => new RenderSizedBox(),
    update: (o) => {
      o.width = props.width;
      o.height = props.height;
      o.color = props.color ?? 0;
      o.label = props.label;
    },
  });
}

// =============================================================================
// Colored container
// =============================================================================

/** Fills its bounds, then paints its child on top. Sizes to the child, or to the smallest size without one. */
export class RenderColoredBox implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = SINGLE;
  readonly debugName = "ColoredBox";
  color = 0;

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    if (ctx.childCount === 0) return constrain(c, ZERO_SIZE);
    return ctx.layoutBox(0, c);
  }

  paint(ctx: PaintContext, at: Offset): void {
    ctx.canvas.rect(at.x, at.y, ctx.size.width, ctx.size.height, this.color);
    if (ctx.childCount > 0) ctx.paintChild(0);
  }
}

export function coloredBox(props: Readonly<{ key?: ViewKey; color: number }>, child?: View): RenderView {
  return renderView(RenderColoredBox, "box", {
    ...(props.key === undefined ? {} : { key: props.key }),
    create: () => new RenderColoredBox(),
    update: (o) => {
      o.color = props.color;
    },
    children: childList(child),
  });
}

// =============================================================================
// Padding
// =============================================================================

export class RenderPadding implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = SINGLE;
  readonly debugName = "Padding";
  insets: EdgeInsets = insetsAll(0);

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    const { left, top, right, bottom } = this.insets;
    if (ctx.childCount === 0) {
      return constrain(c, { width: left + right, height: top + bottom });
    }
    const child = ctx.layoutBox(0, deflate(c, this.insets));
    ctx.positionChild(0, { x: left, y: top });
    return constrain(c, { width: child.width + left + right, height: child.height + top + bottom });
  }

  paint(ctx: PaintContext): void {
    if (ctx.childCount > 0) ctx.paintChild(0);
  }
}

export function padding(props: Readonly<{ key?: ViewKey; insets: EdgeInsets }>, child?: View): RenderView {
  const { left, top, right, bottom } = props.insets;
  checkExtent("padding", "left", left);
  checkExtent("padding", "top", top);
  checkExtent("padding", "right", right);
  checkExtent("padding", "bottom", bottom);
  return renderView(RenderPadding, "box", {
    ...(props.key === undefined ? {} : { key: props.key }),
    create: () => new RenderPadding(),
    update: (o) => {
      o.insets = props.insets;
    },
    children: childList(child),
  });
}

// =============================================================================
// Constrained box
// =============================================================================

/** Applies additional constraints, clamped into the incoming ones. */
export class RenderConstrainedBox implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = SINGLE;
  readonly debugName = "ConstrainedBox";
  additional: BoxConstraints = boxConstraints(0, Number.POSITIVE_INFINITY, 0, Number.POSITIVE_INFINITY);

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    const inner = enforce(this.additional, c);
    if (ctx.childCount === 0) return constrain(inner, ZERO_SIZE);
    return ctx.layoutBox(0, inner);
  }

  paint(ctx: PaintContext): void {
    if (ctx.childCount > 0) ctx.paintChild(0);
  }
}

export function constrainedBox(
  props: Readonly<{ key?: ViewKey; constraints: BoxConstraints }>,
  child?: View,
): RenderView {
  return renderView(RenderConstrainedBox, "box", {
    ...(props.key === undefined ? {} : { key: props.key }),
    create: () => new RenderConstrainedBox(),
    update: (o) => {
      o.additional = props.constraints;
    },
    children: childList(child),
  });
}

// =============================================================================
// Flex
// =============================================================================

export type FlexDirection = "row" | "column";
export type MainAxisAlignment = "start" | "center" | "end" | "spaceBetween";
export type CrossAxisAlignment = "start" | "center" | "end" | "stretch";

/** A flex child that takes a share of the remaining main-axis space. */
export type Flexible = Readonly<{ kind: "flexible"; flex: number; child: View }>;

export function flexible(flex: number, child: View): Flexible {
  if (!Number.isFinite(flex) || flex <= 0) {
    throw invalidProps(`flexible: flex must be a positive number (got ${String(flex)})`);
  }
  return Object.freeze({ kind: "flexible", flex, child });
}

/**
 * Linear layout. Inflexible children take their natural main-axis size; the
 * space left on a bounded main axis is split between flexible children in
 * proportion to their factors. The flex fills a bounded main axis.
 */
export class RenderFlex implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = VARIABLE;
  readonly debugName = "Flex";
  direction: FlexDirection = "row";
  mainAxisAlignment: MainAxisAlignment = "start";
  crossAxisAlignment: CrossAxisAlignment = "start";
  flexFactors: readonly number[] = [];

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    const row = this.direction === "row";
    const maxMain = row ? c.maxWidth : c.maxHeight;
    const maxCross = row ? c.maxHeight : c.maxWidth;
    const boundedMain = Number.isFinite(maxMain);
    const stretch = this.crossAxisAlignment === "stretch" && Number.isFinite(maxCross);
    const crossMin = stretch ? maxCross : 0;
    const childConstraints = (mainMin: number, mainMax: number): BoxConstraints =>
      row
        ? boxConstraints(mainMin, mainMax, crossMin, maxCross)
        : boxConstraints(crossMin, maxCross, mainMin, mainMax);
    const mainOf = (s: Size): number => (row ? s.width : s.height);
    const crossOf = (s: Size): number => (row ? s.height : s.width);

    const n = ctx.childCount;
    const sizes: Size[] = new Array<Size>(n).fill(ZERO_SIZE);
    let allocated = 0;
    let totalFlex = 0;
    for (let i = 0; i < n; i++) {
      const f = this.flexFactors[i] ?? 0;
      if (f > 0 && boundedMain) {
        totalFlex += f;
        continue;
      }
      const s = ctx.layoutBox(i, childConstraints(0, Number.POSITIVE_INFINITY));
      sizes[i] = s;
      allocated += mainOf(s);
    }
    if (totalFlex > 0) {
      const free = Math.max(maxMain - allocated, 0);
      for (let i = 0; i < n; i++) {
        const f = this.flexFactors[i] ?? 0;
        if (f <= 0) continue;
        const share = (free * f) / totalFlex;
        const s = ctx.layoutBox(i, childConstraints(share, share));
        sizes[i] = s;
        allocated += mainOf(s);
      }
    }

    let cross = stretch ? maxCross : 0;
    for (const s of sizes) cross = Math.max(cross, crossOf(s));
    const main = boundedMain ? maxMain : allocated;
    const size = constrain(c, row ? { width: main, height: cross } : { width: cross, height: main });
    const actualMain = mainOf(size);
    const actualCross = crossOf(size);
    if (allocated > actualMain) {
      ctx.reportOverflow(
        row ? { width: allocated, height: size.height } : { width: size.width, height: allocated },
      );
    }

    const remaining = Math.max(actualMain - allocated, 0);
    let leading = 0;
    let between = 0;
    switch (this.mainAxisAlignment) {
      case "start":
        break;
      case "end":
        leading = remaining;
        break;
      case "center":
        leading = remaining / 2;
        break;
      case "spaceBetween":
        between = n > 1 ? remaining / (n - 1) : 0;
        break;
    }

    let pos = leading;
    for (let i = 0; i < n; i++) {
      const s = sizes[i] ?? ZERO_SIZE;
      const free = actualCross - crossOf(s);
      const crossPos =
        this.crossAxisAlignment === "end" ? free : this.crossAxisAlignment === "center" ? free / 2 : 0;
      ctx.positionChild(i, row ? { x: pos, y: crossPos } : { x: crossPos, y: pos });
      pos += mainOf(s) + between;
    }
    return size;
  }

  paint(ctx: PaintContext): void {
    for (let i = 0; i < ctx.childCount; i++) ctx.paintChild(i);
  }
}

export type FlexProps = Readonly<{
  key?: ViewKey;
  direction: FlexDirection;
  mainAxisAlignment?: MainAxisAlignment;
  crossAxisAlignment?: CrossAxisAlignment;
}>;

export function flex(props: FlexProps, children: readonly (View | Flexible)[]): RenderView {
  const views: View[] = [];
  const factors: number[] = [];
  for (const c of children) {
    if (c.kind === "flexible") {
      views.push(c.child);
      factors.push(c.flex);
    } else {
      views.push(c);
      factors.push(0);
    }
  }
  return renderView(RenderFlex, "box", {
    ...(props.key === undefined ? {} : { key: props.key }),
    create: () => new RenderFlex(),
    update: (o) => {
      o.direction = props.direction;
      o.mainAxisAlignment = props.mainAxisAlignment ?? "start";
      o.crossAxisAlignment = props.crossAxisAlignment ?? "start";
      o.flexFactors = factors;
    },
    children: views,
  });
}

export function row(
  children: readonly (View | Flexible)[],
  props: Omit<FlexProps, "direction"> = {},
): RenderView {
  return flex({ ...props, direction: "row" }, children);
}

export function column(
  children: readonly (View | Flexible)[],
  props: Omit<FlexProps, "direction"> = {},
): RenderView {
  return flex({ ...props, direction: "column" }, children);
}

// =============================================================================
// Stack
// =============================================================================

/** Fractional alignment: (0, 0) top-left, (1, 1) bottom-right. */
export type Alignment = Readonly<{ x: number; y: number }>;

export const TOP_LEFT: Alignment = Object.freeze({ x: 0, y: 0 });
export const CENTER: Alignment = Object.freeze({ x: 0.5, y: 0.5 });
export const BOTTOM_RIGHT: Alignment = Object.freeze({ x: 1, y: 1 });

/** Children share one area; later children paint on top and win hit tests. */
export class RenderStack implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = VARIABLE;
  readonly debugName = "Stack";
  alignment: Alignment = TOP_LEFT;

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    if (ctx.childCount === 0) return biggestFinite(c);
    const inner = loosen(c);
    const sizes: Size[] = [];
    let width = 0;
    let height = 0;
    for (let i = 0; i < ctx.childCount; i++) {
      const s = ctx.layoutBox(i, inner);
      sizes.push(s);
      width = Math.max(width, s.width);
      height = Math.max(height, s.height);
    }
    const size = constrain(c, { width, height });
    sizes.forEach((s, i) => {
      ctx.positionChild(i, {
        x: (size.width - s.width) * this.alignment.x,
        y: (size.height - s.height) * this.alignment.y,
      });
    });
    return size;
  }

  paint(ctx: PaintContext): void {
    for (let i = 0; i < ctx.childCount; i++) ctx.paintChild(i);
  }
}

export function stack(
  children: readonly View[],
  props: Readonly<{ key?: ViewKey; alignment?: Alignment }> = {},
): RenderView {
  return renderView(RenderStack, "box", {
    ...(props.key === undefined ? {} : { key: props.key }),
    create: () => new RenderStack(),
    update: (o) => {
      o.alignment = props.alignment ?? TOP_LEFT;
    },
    children,
  });
}

// =============================================================================
// Error box
// =============================================================================

/** Build-failure placeholder: fills the largest finite size and paints an error placeholder. */
export class RenderErrorBox implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = LEAF;
  readonly debugName = "ErrorBox";
  message = "";

  performLayout(_ctx: LayoutContext, c: BoxConstraints): Size {
    return biggestFinite(c);
  }

  paint(ctx: PaintContext, at: Offset): void {
    ctx.canvas.errorPlaceholder(at.x, at.y, ctx.size.width, ctx.size.height, this.message);
  }
}

export function errorBox(message: string, key?: ViewKey): RenderView {
  return renderView(RenderErrorBox, "box", {
    ...(key === undefined ? {} : { key }),
    create: () => new RenderErrorBox(),
    update: (o) => {
      o.message = message;
    },
  });
}
