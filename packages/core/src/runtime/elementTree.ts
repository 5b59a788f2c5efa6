/**
 * packages/core/src/runtime/elementTree.ts — Element arena and lifecycle.
 *
 * Elements are stored in a map keyed by ElementId; parent/child links are ids.
 * Lifecycle:
 *
 *   initial ──mount──▶ active ──deactivate──▶ inactive ──activate──▶ active
 *                        │                       │
 *                        └──────unmount──────────┴──▶ defunct (removed)
 *
 * Any other transition is a protocol violation. Inactive subtrees keep their
 * state (hooks, render nodes) so a global-keyed element can be reparented
 * within one build scope; the build owner unmounts whatever is still inactive
 * when the scope ends.
 *
 * Render-bearing elements own one render node each. The render child list of
 * such an element is the set of nearest render-bearing descendants; structural
 * changes queue a resync that the build owner flushes at the end of a scope.
 */

import { type FrameError, protocolViolation } from "../errors.js";
import type { RenderTree } from "../render/renderTree.js";
import type { RenderId, ElementId, IdAllocator } from "./identity.js";
import { type HookStore, createHookStore, disposeHookStore } from "./hooks.js";
import {
  type GlobalKey,
  type ProviderView,
  type View,
  type ViewType,
  canUpdate,
  describeKey,
  isGlobalKey,
  typeName,
} from "./view.js";

export type ElementLifecycle = "initial" | "active" | "inactive" | "defunct";

type ElementNode = {
  readonly id: ElementId;
  view: View;
  /** View at the last successful rebuild (null before the first). */
  builtView: View | null;
  parent: ElementId | null;
  children: ElementId[];
  slot: number;
  depth: number;
  lifecycle: ElementLifecycle;
  dirty: boolean;
  readonly renderId: RenderId | null;
  hooks: HookStore | null;
  readonly globalKey: GlobalKey | null;
  lastError: FrameError | null;
};

export type ElementRecord = Readonly<{
  id: ElementId;
  view: View;
  builtView: View | null;
  parent: ElementId | null;
  children: readonly ElementId[];
  slot: number;
  depth: number;
  lifecycle: ElementLifecycle;
  dirty: boolean;
  renderId: RenderId | null;
  hooks: HookStore | null;
  lastError: FrameError | null;
}>;

export type ElementSnapshot = Readonly<{
  id: ElementId;
  kind: View["kind"];
  type: string;
  key: string;
  parent: ElementId | null;
  children: readonly ElementId[];
  depth: number;
  lifecycle: ElementLifecycle;
  dirty: boolean;
  renderId: RenderId | null;
  error: string | null;
}>;

export type TreeSnapshot = Readonly<{
  root: ElementId | null;
  elements: readonly ElementSnapshot[];
}>;

export type ElementTreeOptions = Readonly<{
  ids: IdAllocator;
  renderTree: RenderTree;
  /** Called when an active element becomes dirty. */
  onDirty: (id: ElementId, depth: number) => void;
  /** Receives failures from effect cleanups run during unmount. */
  onCleanupError: (id: ElementId, err: unknown) => void;
}>;

export type ElementTree = Readonly<{
  mount: (view: View, parent: ElementId | null, slot: number) => ElementId;
  update: (id: ElementId, view: View) => void;
  canUpdate: (prev: View, next: View) => boolean;
  deactivate: (id: ElementId) => void;
  activate: (id: ElementId, parent: ElementId, slot: number) => void;
  unmount: (id: ElementId) => void;
  /** Replace the ordered child list of `id` (slots follow list order). */
  setChildren: (id: ElementId, children: readonly ElementId[]) => void;
  markDirty: (id: ElementId) => void;
  clearDirty: (id: ElementId) => void;
  setBuilt: (id: ElementId, error: FrameError | null) => void;
  hooksFor: (id: ElementId) => HookStore;
  dependOn: (dependent: ElementId, providerType: ViewType) => ProviderView | null;
  notifyDependents: (provider: ElementId) => void;
  dependentsOf: (provider: ElementId) => readonly ElementId[];
  lookupGlobalKey: (key: GlobalKey) => ElementId | undefined;
  isAncestorOrSelf: (ancestor: ElementId, id: ElementId) => boolean;
  get: (id: ElementId) => ElementRecord | undefined;
  has: (id: ElementId) => boolean;
  root: () => ElementId | null;
  renderRootId: () => RenderId | null;
  inactiveRoots: () => readonly ElementId[];
  flushRenderSync: () => void;
  dirtyCount: () => number;
  maxDepth: () => number;
  size: () => number;
  snapshot: () => TreeSnapshot;
}>;

export function createElementTree(opts: ElementTreeOptions): ElementTree {
  const nodes = new Map<ElementId, ElementNode>();
  const globalKeys = new Map<GlobalKey, ElementId>();
  /** provider → dependents */
  const dependents = new Map<ElementId, Set<ElementId>>();
  /** dependent → providers it registered with */
  const dependencies = new Map<ElementId, Set<ElementId>>();
  const inactive = new Set<ElementId>();
  const renderSync = new Set<ElementId>();
  const renderTree = opts.renderTree;
  let rootId: ElementId | null = null;

  function mustGet(id: ElementId): ElementNode {
    const node = nodes.get(id);
    if (!node) throw protocolViolation(`element ${String(id)} does not exist`);
    return node;
  }

  function label(node: ElementNode): string {
    return `${typeName(node.view.type)}#${String(node.id)}`;
  }

  /** Element whose render child list includes the render nodes under `id`. */
  function renderOwnerOf(id: ElementId | null): ElementId | null {
    let cur = id === null ? undefined : nodes.get(id);
    while (cur) {
      if (cur.renderId !== null) return cur.id;
      cur = cur.parent === null ? undefined : nodes.get(cur.parent);
    }
    return null;
  }

  function queueRenderSync(parent: ElementId | null): void {
    const owner = renderOwnerOf(parent);
    if (owner !== null) renderSync.add(owner);
  }

  function collectRenderChildren(node: ElementNode, out: RenderId[]): void {
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (!child || child.lifecycle !== "active") continue;
      if (child.renderId !== null) out.push(child.renderId);
      else collectRenderChildren(child, out);
    }
  }

  function flushRenderSync(): void {
    for (const id of renderSync) {
      const node = nodes.get(id);
      if (!node || node.lifecycle !== "active" || node.renderId === null) continue;
      const out: RenderId[] = [];
      collectRenderChildren(node, out);
      renderTree.setChildren(node.renderId, out);
    }
    renderSync.clear();
  }

  function markDirty(id: ElementId): void {
    const node = nodes.get(id);
    if (!node || node.lifecycle !== "active" || node.dirty) return;
    node.dirty = true;
    opts.onDirty(id, node.depth);
  }

  function setDepth(node: ElementNode, depth: number): void {
    node.depth = depth;
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child) setDepth(child, depth + 1);
    }
  }

  function dropDependencies(id: ElementId): void {
    const providers = dependencies.get(id);
    if (!providers) return;
    for (const p of providers) dependents.get(p)?.delete(id);
    dependencies.delete(id);
  }

  function removeFromParent(node: ElementNode): void {
    if (node.parent === null) return;
    const parent = nodes.get(node.parent);
    node.parent = null;
    if (!parent) return;
    const idx = parent.children.indexOf(node.id);
    if (idx >= 0) {
      parent.children.splice(idx, 1);
      parent.children.forEach((childId, slot) => {
        const child = nodes.get(childId);
        if (child) child.slot = slot;
      });
      queueRenderSync(parent.id);
    }
  }

  function mount(view: View, parent: ElementId | null, slot: number): ElementId {
    let parentNode: ElementNode | null = null;
    if (parent === null) {
      if (rootId !== null) {
        throw protocolViolation(`mount: tree already has root element ${String(rootId)}`);
      }
    } else {
      parentNode = mustGet(parent);
      if (parentNode.lifecycle !== "active") {
        throw protocolViolation(`mount: parent ${label(parentNode)} is ${parentNode.lifecycle}`);
      }
    }

    const key = isGlobalKey(view.key) ? view.key : null;
    if (key !== null) {
      const holder = globalKeys.get(key);
      if (holder !== undefined) {
        throw protocolViolation(
          `mount: global key "${describeKey(key)}" is already used by element ${String(holder)}`,
        );
      }
    }

    const renderId = view.kind === "render" ? renderTree.insert(view.createRenderObject()) : null;
    const id = opts.ids.allocate();
    const node: ElementNode = {
      id,
      view,
      builtView: null,
      parent,
      children: [],
      slot,
      depth: parentNode === null ? 0 : parentNode.depth + 1,
      lifecycle: "initial",
      dirty: false,
      renderId,
      hooks: null,
      globalKey: key,
      lastError: null,
    };
    nodes.set(id, node);
    if (key !== null) globalKeys.set(key, id);

    if (parentNode === null) {
      rootId = id;
    } else {
      const at = Math.max(0, Math.min(slot, parentNode.children.length));
      parentNode.children.splice(at, 0, id);
      queueRenderSync(parentNode.id);
    }
    node.lifecycle = "active";
    if (renderId !== null) renderSync.add(id);
    markDirty(id);
    return id;
  }

  function update(id: ElementId, view: View): void {
    const node = mustGet(id);
    if (node.lifecycle !== "active") {
      throw protocolViolation(`update: ${label(node)} is ${node.lifecycle}`);
    }
    if (node.view === view) return;
    if (!canUpdate(node.view, view)) {
      throw protocolViolation(
        `update: ${label(node)} cannot take a view of type ${typeName(view.type)} key "${describeKey(view.key)}"`,
      );
    }
    const prev = node.view;
    node.view = view;
    if (prev.kind === "provider" && view.kind === "provider" && view.updateShouldNotify(prev)) {
      notifyDependents(id);
    }
    markDirty(id);
  }

  function deactivateSubtree(node: ElementNode): void {
    node.lifecycle = "inactive";
    dropDependencies(node.id);
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child) deactivateSubtree(child);
    }
  }

  function deactivate(id: ElementId): void {
    const node = mustGet(id);
    if (node.lifecycle !== "active") {
      throw protocolViolation(`deactivate: ${label(node)} is ${node.lifecycle}`);
    }
    if (id === rootId) throw protocolViolation("deactivate: the root element cannot be deactivated");
    removeFromParent(node);
    deactivateSubtree(node);
    inactive.add(id);
  }

  function activateSubtree(node: ElementNode): void {
    node.lifecycle = "active";
    // Dirty marks made before deactivation were dropped by the build queue.
    if (node.dirty) opts.onDirty(node.id, node.depth);
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child) activateSubtree(child);
    }
  }

  function activate(id: ElementId, parent: ElementId, slot: number): void {
    const node = mustGet(id);
    if (node.lifecycle !== "inactive" || !inactive.has(id)) {
      throw protocolViolation(`activate: ${label(node)} is ${node.lifecycle}, not an inactive root`);
    }
    const parentNode = mustGet(parent);
    if (parentNode.lifecycle !== "active") {
      throw protocolViolation(`activate: parent ${label(parentNode)} is ${parentNode.lifecycle}`);
    }
    inactive.delete(id);
    node.parent = parent;
    node.slot = slot;
    const at = Math.max(0, Math.min(slot, parentNode.children.length));
    parentNode.children.splice(at, 0, id);
    setDepth(node, parentNode.depth + 1);
    activateSubtree(node);
    queueRenderSync(parent);
    node.dirty = false;
    markDirty(id);
  }

  function unmountNode(node: ElementNode): void {
    for (const childId of node.children) {
      const child = nodes.get(childId);
      if (child) unmountNode(child);
    }
    node.lifecycle = "defunct";
    node.dirty = false;
    if (node.renderId !== null) renderTree.release(node.renderId);
    if (node.hooks !== null) {
      disposeHookStore(node.hooks, (err) => opts.onCleanupError(node.id, err));
      node.hooks = null;
    }
    dropDependencies(node.id);
    dependents.delete(node.id);
    if (node.globalKey !== null && globalKeys.get(node.globalKey) === node.id) {
      globalKeys.delete(node.globalKey);
    }
    inactive.delete(node.id);
    renderSync.delete(node.id);
    nodes.delete(node.id);
  }

  function unmount(id: ElementId): void {
    const node = mustGet(id);
    if (node.lifecycle !== "active" && node.lifecycle !== "inactive") {
      throw protocolViolation(`unmount: ${label(node)} is ${node.lifecycle}`);
    }
    removeFromParent(node);
    if (id === rootId) rootId = null;
    unmountNode(node);
  }

  function setChildren(id: ElementId, children: readonly ElementId[]): void {
    const node = mustGet(id);
    const same =
      children.length === node.children.length && children.every((c, i) => node.children[i] === c);
    children.forEach((childId, slot) => {
      const child = mustGet(childId);
      if (child.parent !== id) {
        throw protocolViolation(`setChildren: element ${String(childId)} is not a child of ${label(node)}`);
      }
      child.slot = slot;
    });
    if (!same) {
      node.children = children.slice();
      queueRenderSync(id);
    }
  }

  function dependOn(dependent: ElementId, providerType: ViewType): ProviderView | null {
    const node = mustGet(dependent);
    let cur = node.parent === null ? undefined : nodes.get(node.parent);
    while (cur) {
      const view = cur.view;
      if (view.kind === "provider" && view.type === providerType) {
        let set = dependents.get(cur.id);
        if (!set) {
          set = new Set();
          dependents.set(cur.id, set);
        }
        set.add(dependent);
        let providers = dependencies.get(dependent);
        if (!providers) {
          providers = new Set();
          dependencies.set(dependent, providers);
        }
        providers.add(cur.id);
        return view;
      }
      cur = cur.parent === null ? undefined : nodes.get(cur.parent);
    }
    return null;
  }

  function notifyDependents(provider: ElementId): void {
    const set = dependents.get(provider);
    if (!set) return;
    for (const id of set) markDirty(id);
  }

  function record(node: ElementNode): ElementRecord {
    return Object.freeze({
      id: node.id,
      view: node.view,
      builtView: node.builtView,
      parent: node.parent,
      children: Object.freeze(node.children.slice()),
      slot: node.slot,
      depth: node.depth,
      lifecycle: node.lifecycle,
      dirty: node.dirty,
      renderId: node.renderId,
      hooks: node.hooks,
      lastError: node.lastError,
    });
  }

  function snapshot(): TreeSnapshot {
    const elements: ElementSnapshot[] = [];
    const visit = (id: ElementId): void => {
      const node = nodes.get(id);
      if (!node) return;
      elements.push(
        Object.freeze({
          id: node.id,
          kind: node.view.kind,
          type: typeName(node.view.type),
          key: describeKey(node.view.key),
          parent: node.parent,
          children: Object.freeze(node.children.slice()),
          depth: node.depth,
          lifecycle: node.lifecycle,
          dirty: node.dirty,
          renderId: node.renderId,
          error: node.lastError?.message ?? null,
        }),
      );
      for (const childId of node.children) visit(childId);
    };
    if (rootId !== null) visit(rootId);
    return Object.freeze({ root: rootId, elements: Object.freeze(elements) });
  }

  return Object.freeze({
    mount,
    update,
    canUpdate,
    deactivate,
    activate,
    unmount,
    setChildren,
    markDirty,
    clearDirty: (id: ElementId) => {
      mustGet(id).dirty = false;
    },
    setBuilt: (id: ElementId, error: FrameError | null) => {
      const node = mustGet(id);
      node.lastError = error;
      if (error === null) node.builtView = node.view;
    },
    hooksFor: (id: ElementId) => {
      const node = mustGet(id);
      if (node.hooks === null) node.hooks = createHookStore(id, typeName(node.view.type));
      return node.hooks;
    },
    dependOn,
    notifyDependents,
    dependentsOf: (provider: ElementId) => Object.freeze(Array.from(dependents.get(provider) ?? [])),
    lookupGlobalKey: (key: GlobalKey) => globalKeys.get(key),
    isAncestorOrSelf: (ancestor: ElementId, id: ElementId) => {
      let cur = nodes.get(id);
      while (cur) {
        if (cur.id === ancestor) return true;
        cur = cur.parent === null ? undefined : nodes.get(cur.parent);
      }
      return false;
    },
    get: (id: ElementId) => {
      const node = nodes.get(id);
      return node ? record(node) : undefined;
    },
    has: (id: ElementId) => nodes.has(id),
    root: () => rootId,
    renderRootId: () => {
      let cur = rootId === null ? undefined : nodes.get(rootId);
      while (cur) {
        if (cur.renderId !== null) return cur.renderId;
        const first = cur.children[0];
        cur = first === undefined ? undefined : nodes.get(first);
      }
      return null;
    },
    inactiveRoots: () => Object.freeze(Array.from(inactive)),
    flushRenderSync,
    dirtyCount: () => {
      let n = 0;
      for (const node of nodes.values()) if (node.dirty && node.lifecycle === "active") n++;
      return n;
    },
    maxDepth: () => {
      let max = 0;
      for (const node of nodes.values()) if (node.depth > max) max = node.depth;
      return max;
    },
    size: () => nodes.size,
    snapshot,
  });
}
