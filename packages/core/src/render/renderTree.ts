/**
 * packages/core/src/render/renderTree.ts — Render node arena, layout and paint.
 *
 * Nodes live in a map keyed by RenderId; parent/child links are ids. The tree
 * owns every cache: constraints, size or sliver geometry, child offsets,
 * paint commands. Render objects only compute.
 *
 * Dirty flags:
 *   - markNeedsLayout(id): node gets needsLayout, node and ancestors get
 *     needsPaint. A clean ancestor replays its cached commands.
 *   - needsLayout is cleared only when the node's layout completes, so an
 *     aborted layout pass leaves the node queued for the next frame.
 *   - A size change after relayout marks the parent needsLayout, unless the
 *     parent is the caller laying this node out.
 *
 * Per-node failures become FrameErrors and go to `onNodeError`, which either
 * substitutes a placeholder (the pass continues) or aborts the phase.
 * Protocol violations are thrown as TrellisErrors and never handled here.
 */

import { FrameError, type FramePhase, protocolViolation, toFrameError } from "../errors.js";
import type { RenderId, IdAllocator } from "../runtime/identity.js";
import {
  type BoxConstraints,
  biggestFinite,
  boxConstraintsEqual,
  constrain,
  describeBoxConstraints,
} from "./boxConstraints.js";
import {
  type PaintCommand,
  type DisplayList,
  type RecordingCanvas,
  createRecordingCanvas,
} from "./displayList.js";
import {
  type SliverConstraints,
  type SliverGeometry,
  ZERO_SLIVER_GEOMETRY,
  sliverConstraintsEqual,
  sliverGeometry,
} from "./sliverConstraints.js";
import {
  type LayoutContext,
  type Offset,
  type PaintContext,
  type RenderObject,
  type RenderProtocol,
  type Size,
  ZERO_OFFSET,
  addOffsets,
  describeArity,
  offsetsEqual,
  sizesEqual,
} from "./types.js";

/** What the tree should do with a failed node. */
export type NodeErrorAction = "placeholder" | "abort";

export type RenderTreeOptions = Readonly<{
  ids: IdAllocator;
  /** Paint overflow indicators over nodes whose content exceeded their size. */
  debugOverflow?: boolean;
  /** Recovery hook; without one every failure aborts the phase. */
  onNodeError?: (err: FrameError) => NodeErrorAction;
  /** Polled at node boundaries during layout and paint. */
  isCancelled?: () => boolean;
  onLayoutComplete?: (id: RenderId) => void;
  onPaintComplete?: (id: RenderId) => void;
}>;

type RenderNode = {
  readonly id: RenderId;
  readonly object: RenderObject;
  parent: RenderId | null;
  children: RenderId[];
  depth: number;
  boxConstraints: BoxConstraints | null;
  sliverConstraints: SliverConstraints | null;
  size: Size | null;
  geometry: SliverGeometry | null;
  childOffsets: Offset[];
  /** Children laid out in the most recent pass; the rest are culled. */
  childLaidOut: boolean[];
  needsLayout: boolean;
  needsPaint: boolean;
  overflow: Size | null;
  error: FrameError | null;
  paintCache: Readonly<{ offset: Offset; commands: readonly PaintCommand[] }> | null;
};

export type RenderNodeView = Readonly<{
  id: RenderId;
  object: RenderObject;
  protocol: RenderProtocol;
  parent: RenderId | null;
  children: readonly RenderId[];
  depth: number;
  boxConstraints: BoxConstraints | null;
  sliverConstraints: SliverConstraints | null;
  size: Size | null;
  geometry: SliverGeometry | null;
  childOffsets: readonly Offset[];
  needsLayout: boolean;
  needsPaint: boolean;
  overflow: Size | null;
  error: FrameError | null;
}>;

export type HitTestEntry = Readonly<{ id: RenderId; local: Offset }>;

export type RenderTree = Readonly<{
  insert: (object: RenderObject) => RenderId;
  release: (id: RenderId) => void;
  setChildren: (id: RenderId, children: readonly RenderId[]) => void;
  has: (id: RenderId) => boolean;
  get: (id: RenderId) => RenderNodeView | undefined;
  size: () => number;
  markNeedsLayout: (id: RenderId) => void;
  markNeedsPaint: (id: RenderId) => void;
  needsLayout: (id: RenderId) => boolean;
  needsPaint: (id: RenderId) => boolean;
  layoutBox: (id: RenderId, constraints: BoxConstraints) => Size;
  layoutSliver: (id: RenderId, constraints: SliverConstraints) => SliverGeometry;
  layout: (id: RenderId, constraints: BoxConstraints | SliverConstraints) => Size | SliverGeometry;
  flushLayout: (rootId: RenderId, rootConstraints: BoxConstraints) => void;
  pendingLayoutCount: () => number;
  paint: (id: RenderId, offset: Offset, canvas: RecordingCanvas) => void;
  paintRoot: (rootId: RenderId) => DisplayList;
  hitTest: (rootId: RenderId, point: Offset) => readonly HitTestEntry[];
}>;

function isSliverConstraints(c: BoxConstraints | SliverConstraints): c is SliverConstraints {
  return "axis" in c;
}

/** Painted/hit-testable bounds of a node in its own coordinates. */
function extentOf(node: RenderNode): Size | null {
  if (node.object.protocol === "box") return node.size;
  const g = node.geometry;
  const c = node.sliverConstraints;
  if (!g || !c) return null;
  return c.axis === "vertical"
    ? { width: c.crossAxisExtent, height: g.paintExtent }
    : { width: g.paintExtent, height: c.crossAxisExtent };
}

function hitExtentOf(node: RenderNode): Size | null {
  if (node.object.protocol === "box") return node.size;
  const g = node.geometry;
  const c = node.sliverConstraints;
  if (!g || !c) return null;
  return c.axis === "vertical"
    ? { width: c.crossAxisExtent, height: g.hitTestExtent }
    : { width: g.hitTestExtent, height: c.crossAxisExtent };
}

export function createRenderTree(opts: RenderTreeOptions): RenderTree {
  const nodes = new Map<RenderId, RenderNode>();
  const dirtyLayout = new Set<RenderId>();
  const activeLayout = new Set<RenderId>();
  const onNodeError = opts.onNodeError ?? ((): NodeErrorAction => "abort");
  const debugOverflow = opts.debugOverflow === true;

  function mustGet(id: RenderId): RenderNode {
    const node = nodes.get(id);
    if (!node) throw protocolViolation(`render node ${String(id)} does not exist`);
    return node;
  }

  function checkCancelled(phase: FramePhase, id: RenderId): void {
    if (opts.isCancelled?.() === true) {
      throw new FrameError(phase, id, "cancelled", `${phase} cancelled at render node ${String(id)}: frame deadline expired`);
    }
  }

  function setDepth(node: RenderNode, depth: number): void {
    node.depth = depth;
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child) setDepth(child, depth + 1);
    }
  }

  function markNeedsPaint(id: RenderId): void {
    let cur = nodes.get(id);
    while (cur) {
      cur.needsPaint = true;
      cur = cur.parent === null ? undefined : nodes.get(cur.parent);
    }
  }

  function markNeedsLayout(id: RenderId): void {
    const node = mustGet(id);
    node.needsLayout = true;
    dirtyLayout.add(id);
    markNeedsPaint(id);
  }

  function detachFromParent(node: RenderNode): void {
    if (node.parent === null) return;
    const parent = nodes.get(node.parent);
    node.parent = null;
    if (!parent) return;
    const idx = parent.children.indexOf(node.id);
    if (idx >= 0) {
      parent.children.splice(idx, 1);
      parent.childOffsets.splice(idx, 1);
      parent.childLaidOut.splice(idx, 1);
      markNeedsLayout(parent.id);
    }
  }

  function checkArityForChildren(node: RenderNode, count: number): void {
    const arity = node.object.arity;
    const ok =
      arity.kind === "variable" ||
      (arity.kind === "leaf" && count === 0) ||
      (arity.kind === "single" && count <= 1) ||
      (arity.kind === "fixed" && count <= arity.count);
    if (!ok) {
      throw protocolViolation(
        `${node.object.debugName}#${String(node.id)} has arity ${describeArity(arity)} but was given ${String(count)} children`,
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Layout
  // ---------------------------------------------------------------------------

  function createLayoutContext(
    node: RenderNode,
    laidOut: boolean[],
    reported: { overflow: Size | null },
  ): LayoutContext {
    const childAt = (index: number): RenderNode => {
      const childId = node.children[index];
      if (childId === undefined) {
        throw protocolViolation(
          `${node.object.debugName}#${String(node.id)}: child index ${String(index)} out of range (${String(node.children.length)} children)`,
        );
      }
      return mustGet(childId);
    };
    const claim = (index: number): RenderNode => {
      const child = childAt(index);
      if (laidOut[index] === true) {
        throw protocolViolation(
          `${node.object.debugName}#${String(node.id)} laid out child ${String(index)} twice in one pass`,
        );
      }
      laidOut[index] = true;
      return child;
    };
    return {
      nodeId: node.id,
      childCount: node.children.length,
      childProtocol: (index) => childAt(index).object.protocol,
      layoutBox: (index, constraints) => layoutBox(claim(index).id, constraints),
      layoutSliver: (index, constraints) => layoutSliver(claim(index).id, constraints),
      positionChild: (index, off) => {
        childAt(index);
        node.childOffsets[index] = off;
      },
      reportOverflow: (content) => {
        const prev = reported.overflow;
        reported.overflow = {
          width: Math.max(prev?.width ?? 0, content.width),
          height: Math.max(prev?.height ?? 0, content.height),
        };
      },
    };
  }

  /** Handle a node's own layout failure; returns normally only for placeholders. */
  function recoverLayout(node: RenderNode, err: FrameError): void {
    if (onNodeError(err) === "abort") throw err;
    node.error = err;
    node.childLaidOut = node.children.map(() => false);
  }

  function finishLayout(node: RenderNode): void {
    node.needsLayout = false;
    node.needsPaint = true;
    dirtyLayout.delete(node.id);
    opts.onLayoutComplete?.(node.id);
  }

  function bubbleSizeChange(node: RenderNode): void {
    if (node.parent === null || activeLayout.has(node.parent)) return;
    if (nodes.has(node.parent)) markNeedsLayout(node.parent);
  }

  function runPerformLayout<R>(
    node: RenderNode,
    perform: (ctx: LayoutContext) => R,
    placeholder: () => R,
  ): Readonly<{ result: R; overflow: Size | null }> {
    checkCancelled("layout", node.id);
    const arity = node.object.arity;
    const laidOut = node.children.map(() => false);
    const reported: { overflow: Size | null } = { overflow: null };
    if (arity.kind === "fixed" && node.children.length !== arity.count) {
      recoverLayout(
        node,
        new FrameError(
          "layout",
          node.id,
          "arity",
          `${node.object.debugName}#${String(node.id)} expects ${String(arity.count)} children, has ${String(node.children.length)}`,
        ),
      );
      return { result: placeholder(), overflow: null };
    }
    activeLayout.add(node.id);
    try {
      const result = perform(createLayoutContext(node, laidOut, reported));
      node.error = null;
      node.childLaidOut = laidOut;
      return { result, overflow: reported.overflow };
    } catch (e) {
      if (e instanceof FrameError) throw e;
      recoverLayout(node, toFrameError("layout", node.id, e));
      return { result: placeholder(), overflow: null };
    } finally {
      activeLayout.delete(node.id);
    }
  }

  function layoutBox(id: RenderId, constraints: BoxConstraints): Size {
    const node = mustGet(id);
    const object = node.object;
    if (object.protocol !== "box") {
      throw protocolViolation(`${object.debugName}#${String(id)} is a sliver but received box constraints`);
    }
    if (
      !node.needsLayout &&
      node.size !== null &&
      node.boxConstraints !== null &&
      boxConstraintsEqual(node.boxConstraints, constraints)
    ) {
      return node.size;
    }

    const prevSize = node.size;
    const { result, overflow } = runPerformLayout(
      node,
      (ctx) => object.performLayout(ctx, constraints),
      () => biggestFinite(constraints),
    );
    if (Number.isNaN(result.width) || Number.isNaN(result.height)) {
      throw protocolViolation(`${object.debugName}#${String(id)} returned a NaN size`);
    }
    const clamped = constrain(constraints, result);
    if (!Number.isFinite(clamped.width) || !Number.isFinite(clamped.height)) {
      throw protocolViolation(
        `${object.debugName}#${String(id)} returned an infinite size under ${describeBoxConstraints(constraints)}`,
      );
    }
    const excessW = Math.max(result.width - clamped.width, (overflow?.width ?? 0) - clamped.width, 0);
    const excessH = Math.max(result.height - clamped.height, (overflow?.height ?? 0) - clamped.height, 0);

    node.boxConstraints = constraints;
    node.size = clamped;
    node.overflow = excessW > 0 || excessH > 0 ? { width: excessW, height: excessH } : null;
    finishLayout(node);
    if (prevSize !== null && !sizesEqual(prevSize, clamped)) bubbleSizeChange(node);
    return clamped;
  }

  function layoutSliver(id: RenderId, constraints: SliverConstraints): SliverGeometry {
    const node = mustGet(id);
    const object = node.object;
    if (object.protocol !== "sliver") {
      throw protocolViolation(`${object.debugName}#${String(id)} is a box but received sliver constraints`);
    }
    if (
      !node.needsLayout &&
      node.geometry !== null &&
      node.sliverConstraints !== null &&
      sliverConstraintsEqual(node.sliverConstraints, constraints)
    ) {
      return node.geometry;
    }

    const prev = node.geometry;
    const { result } = runPerformLayout(
      node,
      (ctx) => object.performLayout(ctx, constraints),
      () => ZERO_SLIVER_GEOMETRY,
    );
    let geometry = result;
    let overflow: Size | null = null;
    if (result.paintExtent > constraints.remainingPaintExtent) {
      const excess = result.paintExtent - constraints.remainingPaintExtent;
      geometry = sliverGeometry({
        ...result,
        paintExtent: constraints.remainingPaintExtent,
        layoutExtent: Math.min(result.layoutExtent, constraints.remainingPaintExtent),
        hitTestExtent: Math.min(result.hitTestExtent, constraints.remainingPaintExtent),
        hasVisualOverflow: true,
      });
      overflow =
        constraints.axis === "vertical" ? { width: 0, height: excess } : { width: excess, height: 0 };
    }

    node.sliverConstraints = constraints;
    node.geometry = geometry;
    node.overflow = overflow;
    finishLayout(node);
    if (
      prev !== null &&
      (prev.scrollExtent !== geometry.scrollExtent ||
        prev.paintExtent !== geometry.paintExtent ||
        prev.layoutExtent !== geometry.layoutExtent)
    ) {
      bubbleSizeChange(node);
    }
    return geometry;
  }

  function isUnder(node: RenderNode, rootId: RenderId): boolean {
    let cur: RenderNode | undefined = node;
    while (cur) {
      if (cur.id === rootId) return true;
      cur = cur.parent === null ? undefined : nodes.get(cur.parent);
    }
    return false;
  }

  function flushLayout(rootId: RenderId, rootConstraints: BoxConstraints): void {
    const root = mustGet(rootId);
    if (root.parent !== null) {
      throw protocolViolation(`flushLayout: render node ${String(rootId)} is not a root`);
    }
    layoutBox(rootId, rootConstraints);

    while (dirtyLayout.size > 0) {
      const pending: RenderNode[] = [];
      for (const id of dirtyLayout) {
        const node = nodes.get(id);
        if (!node || !node.needsLayout || !isUnder(node, rootId)) {
          dirtyLayout.delete(id);
          continue;
        }
        pending.push(node);
      }
      if (pending.length === 0) break;
      pending.sort((a, b) => a.depth - b.depth || a.id - b.id);

      for (const node of pending) {
        if (!node.needsLayout) continue;
        if (node.boxConstraints !== null) {
          layoutBox(node.id, node.boxConstraints);
        } else if (node.sliverConstraints !== null) {
          layoutSliver(node.id, node.sliverConstraints);
        } else if (node.parent !== null) {
          // Never laid out: only its parent can supply constraints.
          dirtyLayout.delete(node.id);
          markNeedsLayout(node.parent);
        } else {
          dirtyLayout.delete(node.id);
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Paint
  // ---------------------------------------------------------------------------

  function paint(id: RenderId, offset: Offset, canvas: RecordingCanvas): void {
    const node = mustGet(id);
    checkCancelled("paint", id);
    if (node.needsLayout) {
      throw protocolViolation(`${node.object.debugName}#${String(id)} painted while it needs layout`);
    }
    const extent = extentOf(node);
    if (extent === null || extent.width <= 0 || extent.height <= 0) {
      node.needsPaint = false;
      node.paintCache = null;
      return;
    }
    const cache = node.paintCache;
    if (!node.needsPaint && cache !== null && offsetsEqual(cache.offset, offset)) {
      canvas.replay(cache.commands, 0, 0);
      return;
    }

    const mark = canvas.mark();
    const clips = canvas.clipDepth();
    if (node.error !== null && node.error.phase === "layout") {
      canvas.errorPlaceholder(offset.x, offset.y, extent.width, extent.height, node.error.message);
    } else {
      const ctx: PaintContext = {
        nodeId: id,
        canvas,
        size: extent,
        geometry: node.geometry,
        childCount: node.children.length,
        paintChild: (index) => {
          const childId = node.children[index];
          if (childId === undefined) {
            throw protocolViolation(
              `${node.object.debugName}#${String(id)}: paint child index ${String(index)} out of range`,
            );
          }
          if (node.childLaidOut[index] !== true) return;
          paint(childId, addOffsets(offset, node.childOffsets[index] ?? ZERO_OFFSET), canvas);
        },
      };
      try {
        node.object.paint(ctx, offset);
        while (canvas.clipDepth() > clips) canvas.popClip();
        if (node.error?.phase === "paint") node.error = null;
      } catch (e) {
        if (e instanceof FrameError) throw e;
        const err = toFrameError("paint", id, e);
        if (onNodeError(err) === "abort") throw err;
        canvas.truncate(mark);
        node.error = err;
        canvas.errorPlaceholder(offset.x, offset.y, extent.width, extent.height, err.message);
      }
    }
    if (debugOverflow && node.overflow !== null) {
      canvas.overflowIndicator(offset.x, offset.y, extent.width, extent.height);
    }
    node.paintCache = { offset, commands: canvas.since(mark) };
    node.needsPaint = false;
    opts.onPaintComplete?.(id);
  }

  function paintRoot(rootId: RenderId): DisplayList {
    const canvas = createRecordingCanvas();
    paint(rootId, ZERO_OFFSET, canvas);
    return canvas.finish();
  }

  // ---------------------------------------------------------------------------
  // Hit testing
  // ---------------------------------------------------------------------------

  function hitNode(node: RenderNode, local: Offset, path: HitTestEntry[]): boolean {
    if (node.needsLayout) return false;
    const extent = hitExtentOf(node);
    if (extent === null) return false;
    if (local.x < 0 || local.y < 0 || local.x >= extent.width || local.y >= extent.height) {
      return false;
    }
    let childHit = false;
    for (let i = node.children.length - 1; i >= 0; i--) {
      if (node.childLaidOut[i] !== true) continue;
      const childId = node.children[i];
      const child = childId === undefined ? undefined : nodes.get(childId);
      if (!child) continue;
      const off = node.childOffsets[i] ?? ZERO_OFFSET;
      if (hitNode(child, { x: local.x - off.x, y: local.y - off.y }, path)) {
        childHit = true;
        break;
      }
    }
    const self = node.object.hitTestSelf?.(local) ?? true;
    if (!childHit && !self) return false;
    path.push(Object.freeze({ id: node.id, local: Object.freeze({ x: local.x, y: local.y }) }));
    return true;
  }

  function hitTest(rootId: RenderId, point: Offset): readonly HitTestEntry[] {
    const path: HitTestEntry[] = [];
    hitNode(mustGet(rootId), point, path);
    return Object.freeze(path);
  }

  // ---------------------------------------------------------------------------
  // Structure
  // ---------------------------------------------------------------------------

  function insert(object: RenderObject): RenderId {
    const id = opts.ids.allocate();
    nodes.set(id, {
      id,
      object,
      parent: null,
      children: [],
      depth: 0,
      boxConstraints: null,
      sliverConstraints: null,
      size: null,
      geometry: null,
      childOffsets: [],
      childLaidOut: [],
      needsLayout: true,
      needsPaint: true,
      overflow: null,
      error: null,
      paintCache: null,
    });
    dirtyLayout.add(id);
    return id;
  }

  function release(id: RenderId): void {
    const node = nodes.get(id);
    if (!node) return;
    detachFromParent(node);
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child && child.parent === id) child.parent = null;
    }
    nodes.delete(id);
    dirtyLayout.delete(id);
  }

  function setChildren(id: RenderId, children: readonly RenderId[]): void {
    const node = mustGet(id);
    checkArityForChildren(node, children.length);
    if (
      children.length === node.children.length &&
      children.every((c, i) => node.children[i] === c)
    ) {
      return;
    }
    const next = new Set(children);
    if (next.size !== children.length) {
      throw protocolViolation(`setChildren(${String(id)}): duplicate child ids`);
    }
    for (const oldId of node.children) {
      if (next.has(oldId)) continue;
      const old = nodes.get(oldId);
      if (old && old.parent === id) old.parent = null;
    }
    for (const childId of children) {
      const child = mustGet(childId);
      if (childId === id) throw protocolViolation(`setChildren(${String(id)}): node cannot parent itself`);
      if (child.parent !== null && child.parent !== id) detachFromParent(child);
      child.parent = id;
      setDepth(child, node.depth + 1);
    }
    node.children = children.slice();
    node.childOffsets = children.map(() => ZERO_OFFSET);
    node.childLaidOut = children.map(() => false);
    markNeedsLayout(id);
  }

  function view(node: RenderNode): RenderNodeView {
    return Object.freeze({
      id: node.id,
      object: node.object,
      protocol: node.object.protocol,
      parent: node.parent,
      children: Object.freeze(node.children.slice()),
      depth: node.depth,
      boxConstraints: node.boxConstraints,
      sliverConstraints: node.sliverConstraints,
      size: node.size,
      geometry: node.geometry,
      childOffsets: Object.freeze(node.childOffsets.slice()),
      needsLayout: node.needsLayout,
      needsPaint: node.needsPaint,
      overflow: node.overflow,
      error: node.error,
    });
  }

  return Object.freeze({
    insert,
    release,
    setChildren,
    has: (id: RenderId) => nodes.has(id),
    get: (id: RenderId) => {
      const node = nodes.get(id);
      return node ? view(node) : undefined;
    },
    size: () => nodes.size,
    markNeedsLayout,
    markNeedsPaint: (id: RenderId) => {
      mustGet(id);
      markNeedsPaint(id);
    },
    needsLayout: (id: RenderId) => mustGet(id).needsLayout,
    needsPaint: (id: RenderId) => mustGet(id).needsPaint,
    layoutBox,
    layoutSliver,
    layout: (id: RenderId, constraints: BoxConstraints | SliverConstraints) =>
      isSliverConstraints(constraints) ? layoutSliver(id, constraints) : layoutBox(id, constraints),
    flushLayout,
    pendingLayoutCount: () => dirtyLayout.size,
    paint,
    paintRoot,
    hitTest,
  });
}
