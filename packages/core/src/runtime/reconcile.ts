/**
 * packages/core/src/runtime/reconcile.ts — Child list reconciliation.
 *
 * Matches a parent's new child views against its previous child elements and
 * returns a plan: which elements are updated in place, which are mounted
 * fresh, which are adopted from elsewhere in the tree (global keys) and which
 * are removed. Applying the plan is the build owner's job.
 *
 * Rules:
 *   - Keyed children match by key, unkeyed children by position.
 *   - A match is reused only when `canUpdate(prev, next)` holds.
 *   - Duplicate sibling keys fail the whole list (TRELLIS_DUPLICATE_KEY).
 *   - A global key not found among the siblings is looked up tree-wide.
 */

import type { ElementId } from "./identity.js";
import { type GlobalKey, type View, canUpdate, describeKey, slotKeyOf } from "./view.js";

export type ReconcileFatal = Readonly<{
  code: "TRELLIS_DUPLICATE_KEY";
  detail: string;
}>;

export type PlannedChild =
  | Readonly<{ kind: "reuse"; view: View; elementId: ElementId; prevIndex: number }>
  | Readonly<{ kind: "mount"; view: View }>
  | Readonly<{ kind: "adopt"; view: View; elementId: ElementId }>;

export type ReconcileChildrenOk = Readonly<{
  next: readonly PlannedChild[];
  /** Previous children not carried into `next`, in previous order. */
  removed: readonly ElementId[];
}>;

export type ReconcileChildrenResult =
  | Readonly<{ ok: true; value: ReconcileChildrenOk }>
  | Readonly<{ ok: false; fatal: ReconcileFatal }>;

export type PrevChild = Readonly<{ elementId: ElementId; view: View }>;

/** Finds an element holding `key` outside this parent's child list. */
export type GlobalKeyLookup = (key: GlobalKey) => PrevChild | undefined;

const EMPTY_IDS: readonly ElementId[] = Object.freeze([]);

function duplicateKeyDetail(parentId: ElementId, key: string, a: number, b: number): string {
  return `duplicate sibling key "${key}" under element ${String(parentId)} (child indices ${String(a)} and ${String(b)})`;
}

function anyKeyed(views: readonly Readonly<{ key?: unknown }>[]): boolean {
  for (const v of views) {
    if (v.key !== undefined) return true;
  }
  return false;
}

function reconcileUnkeyed(prev: readonly PrevChild[], next: readonly View[]): ReconcileChildrenOk {
  const planned: PlannedChild[] = [];
  const removed: ElementId[] = [];
  const shared = Math.min(prev.length, next.length);

  for (let i = 0; i < shared; i++) {
    const p = prev[i];
    const view = next[i];
    if (p === undefined || view === undefined) continue;
    if (canUpdate(p.view, view)) {
      planned.push({ kind: "reuse", view, elementId: p.elementId, prevIndex: i });
    } else {
      removed.push(p.elementId);
      planned.push({ kind: "mount", view });
    }
  }
  for (let i = shared; i < next.length; i++) {
    const view = next[i];
    if (view !== undefined) planned.push({ kind: "mount", view });
  }
  for (let i = shared; i < prev.length; i++) {
    const p = prev[i];
    if (p !== undefined) removed.push(p.elementId);
  }
  return { next: planned, removed: removed.length === 0 ? EMPTY_IDS : removed };
}

export function reconcileChildren(
  parentId: ElementId,
  prev: readonly PrevChild[],
  next: readonly View[],
  lookupGlobal?: GlobalKeyLookup,
): ReconcileChildrenResult {
  if (!anyKeyed(next) && !prev.some((p) => p.view.key !== undefined)) {
    return { ok: true, value: reconcileUnkeyed(prev, next) };
  }

  const prevBySlot = new Map<string | GlobalKey, number>();
  for (let i = 0; i < prev.length; i++) {
    const p = prev[i];
    if (p === undefined) continue;
    const slot = slotKeyOf(p.view) ?? `i:${String(i)}`;
    if (!prevBySlot.has(slot)) prevBySlot.set(slot, i);
  }

  const seenKeys = new Map<string | GlobalKey, number>();
  const usedPrev = new Array<boolean>(prev.length).fill(false);
  const planned: PlannedChild[] = [];

  for (let i = 0; i < next.length; i++) {
    const view = next[i];
    if (view === undefined) continue;
    const key = slotKeyOf(view);
    if (key !== undefined) {
      const seen = seenKeys.get(key);
      if (seen !== undefined) {
        return {
          ok: false,
          fatal: {
            code: "TRELLIS_DUPLICATE_KEY",
            detail: duplicateKeyDetail(parentId, describeKey(view.key), seen, i),
          },
        };
      }
      seenKeys.set(key, i);
    }

    const slot = key ?? `i:${String(i)}`;
    const prevIndex = prevBySlot.get(slot);
    const match = prevIndex === undefined ? undefined : prev[prevIndex];
    if (
      prevIndex !== undefined &&
      match !== undefined &&
      usedPrev[prevIndex] === false &&
      canUpdate(match.view, view)
    ) {
      usedPrev[prevIndex] = true;
      planned.push({ kind: "reuse", view, elementId: match.elementId, prevIndex });
      continue;
    }

    if (typeof key === "object" && lookupGlobal !== undefined) {
      const elsewhere = lookupGlobal(key);
      if (elsewhere !== undefined && canUpdate(elsewhere.view, view)) {
        planned.push({ kind: "adopt", view, elementId: elsewhere.elementId });
        continue;
      }
    }

    planned.push({ kind: "mount", view });
  }

  const removed: ElementId[] = [];
  for (let i = 0; i < prev.length; i++) {
    const p = prev[i];
    if (p !== undefined && usedPrev[i] !== true) removed.push(p.elementId);
  }
  return { ok: true, value: { next: planned, removed: removed.length === 0 ? EMPTY_IDS : removed } };
}
