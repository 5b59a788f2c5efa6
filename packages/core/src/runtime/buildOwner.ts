/**
 * packages/core/src/runtime/buildOwner.ts — Dirty-element scheduling and build scopes.
 *
 * Dirty elements wait in a min-heap ordered by (depth, id). `buildScope`
 * rebuilds them shallow-first so a parent's rebuild, which may update or
 * replace its children, always runs before the children themselves.
 *
 * Within one scope each element rebuilds at most once. An element re-dirtied
 * after its rebuild (by a deeper element) is carried to the next scope. An
 * element that dirties itself while building is a build cycle and fatal.
 */

import { FrameError, TrellisError, protocolViolation, toFrameError } from "../errors.js";
import type { RenderTree } from "../render/renderTree.js";
import { type ElementTree, type ElementRecord, createElementTree } from "./elementTree.js";
import {
  type RenderEffects,
  type SignalTracker,
  abortRender,
  beginRender,
  createHookContext,
  endRender,
  runEffects,
} from "./hooks.js";
import type { ElementId, IdAllocator } from "./identity.js";
import { type PrevChild, reconcileChildren } from "./reconcile.js";
import { type BuildContext, type View, isGlobalKey, typeName } from "./view.js";

export type BuildScopeResult = Readonly<{
  rebuilt: number;
  /** Elements whose build failed without a replacement; still dirty. */
  failed: readonly ElementId[];
  /** Elements re-dirtied after rebuilding in this scope; queued for the next. */
  carried: number;
}>;

export type BuildOwnerOptions = Readonly<{
  ids: IdAllocator;
  renderTree: RenderTree;
  /**
   * Replacement child for an element whose build failed, or null to keep the
   * previous child and retry next scope. Without a handler failures are rethrown.
   */
  onBuildError?: (id: ElementId, err: FrameError) => View | null;
  /** Called whenever an element is queued for rebuild. */
  onBuildScheduled?: () => void;
  /** Failures thrown by effects and effect cleanups. */
  onEffectError?: (id: ElementId | null, err: unknown) => void;
}>;

export type BuildOwner = Readonly<{
  tree: ElementTree;
  scheduleBuildFor: (id: ElementId, depth: number) => void;
  buildScope: () => BuildScopeResult;
  finalizeTree: () => void;
  flushEffects: () => void;
  isBuilding: () => boolean;
  dirtyCount: () => number;
  hasDirtyElements: () => boolean;
}>;

type HeapEntry = Readonly<{ id: ElementId; depth: number }>;

function before(a: HeapEntry, b: HeapEntry): boolean {
  return a.depth < b.depth || (a.depth === b.depth && a.id < b.id);
}

/** Binary min-heap of dirty elements. */
class DirtyHeap {
  private readonly items: HeapEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  push(entry: HeapEntry): void {
    const items = this.items;
    items.push(entry);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const p = items[parent];
      if (p === undefined || !before(entry, p)) break;
      items[i] = p;
      i = parent;
    }
    items[i] = entry;
  }

  pop(): HeapEntry | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) return top;
    let i = 0;
    const n = items.length;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let smallest = i;
      let best = last;
      const left = items[l];
      if (l < n && left !== undefined && before(left, best)) {
        smallest = l;
        best = left;
      }
      const right = items[r];
      if (r < n && right !== undefined && before(right, best)) smallest = r;
      if (smallest === i) break;
      const next = items[smallest];
      if (next === undefined) break;
      items[i] = next;
      i = smallest;
    }
    items[i] = last;
    return top;
  }
}

export function createBuildOwner(opts: BuildOwnerOptions): BuildOwner {
  const heap = new DirtyHeap();
  const pendingEffects: { id: ElementId; effects: RenderEffects }[] = [];
  let building = false;
  let current: ElementId | null = null;

  const reportEffectError = (id: ElementId | null, err: unknown): void => {
    if (opts.onEffectError) opts.onEffectError(id, err);
    else throw err;
  };

  function scheduleBuildFor(id: ElementId, depth: number): void {
    if (current === id) {
      throw new TrellisError(
        "TRELLIS_BUILD_CYCLE",
        `element ${String(id)} marked itself dirty while building`,
      );
    }
    heap.push({ id, depth });
    opts.onBuildScheduled?.();
  }

  const tree = createElementTree({
    ids: opts.ids,
    renderTree: opts.renderTree,
    onDirty: scheduleBuildFor,
    onCleanupError: reportEffectError,
  });

  const tracker: SignalTracker = Object.freeze({
    current: () => {
      const id = current;
      return id === null ? null : { id, invalidate: () => tree.markDirty(id) };
    },
  });

  function reconcileInto(el: ElementRecord, views: readonly View[]): void {
    const prev: PrevChild[] = [];
    for (const childId of el.children) {
      const child = tree.get(childId);
      if (child) prev.push({ elementId: childId, view: child.view });
    }
    const res = reconcileChildren(el.id, prev, views, (key) => {
      const holder = tree.lookupGlobalKey(key);
      const rec = holder === undefined ? undefined : tree.get(holder);
      return rec === undefined ? undefined : { elementId: rec.id, view: rec.view };
    });
    if (!res.ok) {
      throw new FrameError("build", el.id, "duplicateKey", res.fatal.detail);
    }

    const mountedKeys = new Set<unknown>();
    for (const p of res.value.next) {
      if (p.kind === "mount" && isGlobalKey(p.view.key)) mountedKeys.add(p.view.key);
    }
    for (const id of res.value.removed) {
      const rec = tree.get(id);
      if (!rec) continue;
      const key = rec.view.key;
      if (isGlobalKey(key) && !mountedKeys.has(key)) tree.deactivate(id);
      else tree.unmount(id);
    }

    const nextIds: ElementId[] = [];
    res.value.next.forEach((p, slot) => {
      switch (p.kind) {
        case "reuse":
          tree.update(p.elementId, p.view);
          nextIds.push(p.elementId);
          break;
        case "adopt": {
          if (tree.isAncestorOrSelf(p.elementId, el.id)) {
            throw protocolViolation(
              `global key "${typeName(p.view.type)}" would reparent element ${String(p.elementId)} under its own descendant ${String(el.id)}`,
            );
          }
          const rec = tree.get(p.elementId);
          if (rec?.lifecycle === "active") tree.deactivate(p.elementId);
          tree.activate(p.elementId, el.id, slot);
          tree.update(p.elementId, p.view);
          nextIds.push(p.elementId);
          break;
        }
        case "mount":
          nextIds.push(tree.mount(p.view, el.id, slot));
          break;
      }
    });
    tree.setChildren(el.id, nextIds);
  }

  function performRebuild(el: ElementRecord): void {
    const view = el.view;
    switch (view.kind) {
      case "component": {
        const store = tree.hooksFor(el.id);
        const ctx: BuildContext = {
          elementId: el.id,
          depth: el.depth,
          hooks: createHookContext(store, {
            invalidate: () => tree.markDirty(el.id),
            tracker,
            buildContext: () => ctx,
          }),
          dependOn: (providerType) => tree.dependOn(el.id, providerType),
          markNeedsBuild: () => tree.markDirty(el.id),
        };
        beginRender(store);
        let child: View | null;
        let effects: RenderEffects;
        try {
          child = view.build(ctx);
          effects = endRender(store);
        } catch (e) {
          abortRender(store);
          throw e;
        }
        reconcileInto(el, child === null ? [] : [child]);
        if (effects.effects.length > 0 || effects.cleanups.length > 0) {
          pendingEffects.push({ id: el.id, effects });
        }
        return;
      }
      case "provider":
        reconcileInto(el, [view.child]);
        return;
      case "render": {
        const renderId = el.renderId;
        if (renderId === null) {
          throw protocolViolation(`render element ${String(el.id)} has no render node`);
        }
        const built = el.builtView;
        if (built !== view) {
          if (built !== null && built.kind === "render") {
            const node = opts.renderTree.get(renderId);
            if (node) view.updateRenderObject?.(node.object, built);
          }
          opts.renderTree.markNeedsLayout(renderId);
        }
        reconcileInto(el, view.children);
        return;
      }
    }
  }

  function rebuild(el: ElementRecord): boolean {
    tree.clearDirty(el.id);
    current = el.id;
    try {
      performRebuild(el);
      current = null;
      tree.setBuilt(el.id, null);
      return true;
    } catch (e) {
      current = null;
      const err = toFrameError("build", el.id, e);
      tree.setBuilt(el.id, err);
      tree.markDirty(el.id);
      if (!opts.onBuildError) throw err;
      const replacement = opts.onBuildError(el.id, err);
      if (replacement === null) return false;
      const rec = tree.get(el.id);
      if (!rec || rec.view.kind === "render") return false;
      tree.clearDirty(el.id);
      reconcileInto(rec, [replacement]);
      return true;
    } finally {
      current = null;
    }
  }

  function finalizeTree(): void {
    for (const id of tree.inactiveRoots()) {
      if (tree.has(id)) tree.unmount(id);
    }
  }

  function buildScope(): BuildScopeResult {
    if (building) {
      throw new TrellisError("TRELLIS_REENTRANT_CALL", "buildScope is already running");
    }
    building = true;
    const built = new Set<ElementId>();
    const carried: ElementId[] = [];
    const failed: ElementId[] = [];
    let rebuilt = 0;
    try {
      for (let entry = heap.pop(); entry !== undefined; entry = heap.pop()) {
        const el = tree.get(entry.id);
        if (!el || el.lifecycle !== "active" || !el.dirty) continue;
        if (built.has(el.id)) {
          carried.push(el.id);
          continue;
        }
        built.add(el.id);
        if (rebuild(el)) rebuilt++;
        else failed.push(el.id);
      }
      finalizeTree();
      tree.flushRenderSync();
    } finally {
      const requeue = new Set(carried);
      for (const id of failed) requeue.add(id);
      for (const id of requeue) {
        const el = tree.get(id);
        if (el && el.dirty && el.lifecycle === "active") heap.push({ id, depth: el.depth });
      }
      building = false;
    }
    const carriedCount = carried.filter((id) => !failed.includes(id)).length;
    return Object.freeze({ rebuilt, failed: Object.freeze(failed), carried: carriedCount });
  }

  function flushEffects(): void {
    if (pendingEffects.length === 0) return;
    const batch = pendingEffects.splice(0, pendingEffects.length);
    for (const { id, effects } of batch) {
      runEffects([effects], (err) => reportEffectError(id, err));
    }
  }

  return Object.freeze({
    tree,
    scheduleBuildFor,
    buildScope,
    finalizeTree,
    flushEffects,
    isBuilding: () => building,
    dirtyCount: () => tree.dirtyCount(),
    hasDirtyElements: () => tree.dirtyCount() > 0,
  });
}
