/**
 * packages/core/src/runtime/hooks.ts — Per-element hook state.
 *
 * Each component element owns a HookStore. Hooks are identified by call order:
 * the n-th hook call of a render reads slot n. A render that calls hooks in a
 * different order or count than the previous successful render is rejected.
 *
 * The store carries an exclusive render lock. Beginning a render while the
 * same store is already rendering (a nested build of the same element) throws
 * TRELLIS_REENTRANT_CALL instead of corrupting the hook index.
 *
 * Effects are collected during render and run after the frame; cleanups of
 * replaced effects run first. A render that throws leaves the hook slots as
 * the last successful render committed them. On dispose, cleanups run in reverse declaration
 * order and setters captured by earlier renders become no-ops.
 */

import { TrellisError } from "../errors.js";
import type { ElementId } from "./identity.js";
import type { BuildContext, Provider } from "./view.js";

export type EffectCleanup = () => void;

export type EffectState = {
  deps: readonly unknown[] | undefined;
  cleanup: EffectCleanup | undefined;
  effect: () => undefined | EffectCleanup;
  pending: boolean;
};

export type RefState<T = unknown> = { current: T };

/** Reactive cell owned by one element; readers that call `get()` during their render rebuild when it changes. */
export type Signal<T> = Readonly<{
  get: () => T;
  set: (value: T) => void;
  update: (fn: (prev: T) => T) => void;
  /** Read without subscribing the rendering element. */
  peek: () => T;
}>;

/** Element currently rendering, as seen by signals. */
export type SignalSubscriber = Readonly<{ id: ElementId; invalidate: () => void }>;

export type SignalTracker = Readonly<{ current: () => SignalSubscriber | null }>;

type UnknownCallback = (...args: never[]) => unknown;

type HookState =
  | { kind: "state"; value: unknown }
  | { kind: "signal"; signal: unknown }
  | { kind: "ref"; ref: RefState }
  | { kind: "effect"; effect: EffectState }
  | { kind: "memo"; deps: readonly unknown[] | undefined; value: unknown }
  | { kind: "callback"; deps: readonly unknown[] | undefined; callback: UnknownCallback };

export type HookStore = Readonly<{
  elementId: ElementId;
  typeName: string;
}>;

type MutableHookStore = {
  readonly elementId: ElementId;
  readonly typeName: string;
  hooks: HookState[];
  /** Slots as of the last successful render; restored when a render aborts. */
  committed: HookState[];
  /** Effects superseded by the current render; retired when it commits. */
  replacedEffects: EffectState[];
  hookIndex: number;
  pendingEffects: EffectState[];
  pendingCleanups: EffectCleanup[];
  expectedHookCount: number | null;
  generation: number;
  rendering: boolean;
  disposed: boolean;
};

export type RenderEffects = Readonly<{
  effects: readonly EffectState[];
  cleanups: readonly EffectCleanup[];
}>;

export type HookContext = Readonly<{
  useState: <T>(initial: T | (() => T)) => [T, (v: T | ((prev: T) => T)) => void];
  useSignal: <T>(initial: T | (() => T)) => Signal<T>;
  useRef: <T>(initial: T) => RefState<T>;
  useEffect: {
    (effect: () => void, deps?: readonly unknown[]): void;
    (effect: () => EffectCleanup, deps?: readonly unknown[]): void;
  };
  useMemo: <T>(factory: () => T, deps?: readonly unknown[]) => T;
  /** Derived value; recomputed when a dependency changes. */
  useComputed: <T>(compute: () => T, deps: readonly unknown[]) => T;
  useCallback: <T extends UnknownCallback>(callback: T, deps?: readonly unknown[]) => T;
  useContext: <T>(provider: Provider<T>) => T;
}>;

const stores = new WeakMap<HookStore, MutableHookStore>();

function mutable(store: HookStore): MutableHookStore {
  const m = stores.get(store);
  if (!m) throw new TrellisError("TRELLIS_INVALID_STATE", "unknown hook store");
  return m;
}

export function createHookStore(elementId: ElementId, typeName: string): HookStore {
  const state: MutableHookStore = {
    elementId,
    typeName,
    hooks: [],
    committed: [],
    replacedEffects: [],
    hookIndex: 0,
    pendingEffects: [],
    pendingCleanups: [],
    expectedHookCount: null,
    generation: 0,
    rendering: false,
    disposed: false,
  };
  const handle: HookStore = Object.freeze({ elementId, typeName });
  stores.set(handle, state);
  return handle;
}

function depsEqual(
  prev: readonly unknown[] | undefined,
  next: readonly unknown[] | undefined,
): boolean {
  if (prev === undefined || next === undefined) return false;
  if (prev.length !== next.length) return false;
  for (let i = 0; i < prev.length; i++) {
    if (!Object.is(prev[i], next[i])) return false;
  }
  return true;
}

/** Acquire the render lock and reset the hook cursor. */
export function beginRender(store: HookStore): void {
  const state = mutable(store);
  if (state.disposed) {
    throw new TrellisError(
      "TRELLIS_INVALID_STATE",
      `render of ${state.typeName}#${String(state.elementId)} after its hook store was disposed`,
    );
  }
  if (state.rendering) {
    throw new TrellisError(
      "TRELLIS_REENTRANT_CALL",
      `${state.typeName}#${String(state.elementId)} is already rendering`,
    );
  }
  state.rendering = true;
  state.hookIndex = 0;
  state.committed = state.hooks.slice();
  state.replacedEffects = [];
  state.pendingEffects = [];
  state.pendingCleanups = [];
}

/** Validate hook count, release the lock and hand back this render's effects. */
export function endRender(store: HookStore): RenderEffects {
  const state = mutable(store);
  state.rendering = false;
  const used = state.hookIndex;
  if (state.expectedHookCount === null) {
    state.expectedHookCount = used;
  } else if (used !== state.expectedHookCount) {
    throw new Error(
      `Hook count mismatch for ${state.typeName}#${String(state.elementId)}: expected ${String(state.expectedHookCount)}, got ${String(used)}`,
    );
  }
  for (const prev of state.replacedEffects) prev.pending = false;
  state.replacedEffects = [];
  state.committed = [];
  return Object.freeze({
    effects: Object.freeze(state.pendingEffects),
    cleanups: Object.freeze(state.pendingCleanups),
  });
}

/** Release the lock after a failed render; its effects are dropped and its slot changes undone. */
export function abortRender(store: HookStore): void {
  const state = mutable(store);
  state.rendering = false;
  state.hooks = state.committed;
  state.committed = [];
  state.replacedEffects = [];
  state.pendingEffects = [];
  state.pendingCleanups = [];
}

export function isRendering(store: HookStore): boolean {
  return mutable(store).rendering;
}

/**
 * Invalidate stale setters and run effect cleanups in reverse declaration
 * order. Cleanup failures are passed to `onError`; the remaining cleanups
 * still run.
 */
export function disposeHookStore(store: HookStore, onError: (err: unknown) => void): void {
  const state = mutable(store);
  if (state.disposed) return;
  state.disposed = true;
  state.generation++;
  for (let i = state.hooks.length - 1; i >= 0; i--) {
    const hook = state.hooks[i];
    if (!hook || hook.kind !== "effect") continue;
    const cleanup = hook.effect.cleanup;
    hook.effect.cleanup = undefined;
    if (cleanup) runGuarded(cleanup, onError);
  }
  state.hooks = [];
}

function runGuarded(fn: () => void, onError: (err: unknown) => void): void {
  try {
    fn();
  } catch (err) {
    onError(err);
  }
}

/** Run cleanups, then effects, collected from one or more renders. */
export function runEffects(batch: readonly RenderEffects[], onError: (err: unknown) => void): void {
  for (const r of batch) {
    for (const cleanup of r.cleanups) runGuarded(cleanup, onError);
  }
  for (const r of batch) {
    for (const state of r.effects) {
      if (!state.pending) continue;
      state.pending = false;
      runGuarded(() => {
        const cleanup = state.effect();
        state.cleanup = typeof cleanup === "function" ? cleanup : undefined;
      }, onError);
    }
  }
}

export type HookContextDeps = Readonly<{
  /** Schedule a rebuild of the owning element. */
  invalidate: () => void;
  tracker: SignalTracker;
  buildContext: () => BuildContext;
}>;

/** Hook implementations for one render of `store`. */
export function createHookContext(store: HookStore, deps: HookContextDeps): HookContext {
  const state = mutable(store);

  function assertRendering(name: string): void {
    if (!state.rendering) {
      throw new TrellisError(
        "TRELLIS_INVALID_STATE",
        `${name} called outside the render of ${state.typeName}#${String(state.elementId)}`,
      );
    }
  }

  function nextIndex(kind: HookState["kind"]): number {
    assertRendering(kind);
    const index = state.hookIndex;
    state.hookIndex++;
    if (
      state.hooks[index] === undefined &&
      state.expectedHookCount !== null &&
      index >= state.expectedHookCount
    ) {
      throw new Error(
        `Hook count mismatch at index ${String(index)}: rendered more hooks than previous render while reading ${kind}`,
      );
    }
    return index;
  }

  function mismatch(index: number, expected: string, got: string): Error {
    return new Error(`Hook order mismatch at index ${String(index)}: expected ${expected}, got ${got}`);
  }

  function useState<T>(initial: T | (() => T)): [T, (v: T | ((prev: T) => T)) => void] {
    const index = nextIndex("state");
    let hook = state.hooks[index];
    if (hook === undefined) {
      hook = {
        kind: "state",
        value: typeof initial === "function" ? (initial as () => T)() : initial,
      };
      state.hooks[index] = hook;
    } else if (hook.kind !== "state") {
      throw mismatch(index, "state", hook.kind);
    }
    const cell = hook;
    const generation = state.generation;
    const setValue = (v: T | ((prev: T) => T)): void => {
      if (state.generation !== generation) return;
      const prev = cell.value as T;
      const next = typeof v === "function" ? (v as (prev: T) => T)(prev) : v;
      if (Object.is(prev, next)) return;
      cell.value = next;
      deps.invalidate();
    };
    return [cell.value as T, setValue];
  }

  function useSignal<T>(initial: T | (() => T)): Signal<T> {
    const index = nextIndex("signal");
    const hook = state.hooks[index];
    if (hook !== undefined) {
      if (hook.kind !== "signal") throw mismatch(index, "signal", hook.kind);
      return hook.signal as Signal<T>;
    }
    let value: T = typeof initial === "function" ? (initial as () => T)() : initial;
    let subscribers = new Map<ElementId, () => void>();
    const generation = state.generation;
    const set = (next: T): void => {
      if (state.generation !== generation) return;
      if (Object.is(value, next)) return;
      value = next;
      const notify = subscribers;
      subscribers = new Map();
      for (const invalidate of notify.values()) invalidate();
    };
    const signal: Signal<T> = Object.freeze({
      get: (): T => {
        const reader = deps.tracker.current();
        if (reader !== null) subscribers.set(reader.id, reader.invalidate);
        return value;
      },
      set,
      update: (fn: (prev: T) => T) => set(fn(value)),
      peek: (): T => value,
    });
    state.hooks[index] = { kind: "signal", signal };
    return signal;
  }

  function useRef<T>(initial: T): RefState<T> {
    const index = nextIndex("ref");
    const hook = state.hooks[index];
    if (hook === undefined) {
      const ref: RefState<T> = { current: initial };
      state.hooks[index] = { kind: "ref", ref };
      return ref;
    }
    if (hook.kind !== "ref") throw mismatch(index, "ref", hook.kind);
    return hook.ref as RefState<T>;
  }

  function useEffect(effect: () => unknown, effectDeps?: readonly unknown[]): void {
    const index = nextIndex("effect");
    const hook = state.hooks[index];
    const normalized = (): undefined | EffectCleanup => {
      const result = effect();
      return typeof result === "function" ? () => void result() : undefined;
    };
    if (hook === undefined) {
      const effectState: EffectState = {
        deps: effectDeps,
        cleanup: undefined,
        effect: normalized,
        pending: true,
      };
      state.hooks[index] = { kind: "effect", effect: effectState };
      state.pendingEffects.push(effectState);
      return;
    }
    if (hook.kind !== "effect") throw mismatch(index, "effect", hook.kind);
    const prev = hook.effect;
    if (depsEqual(prev.deps, effectDeps) && !prev.pending) return;
    if (prev.cleanup) state.pendingCleanups.push(prev.cleanup);
    const effectState: EffectState = {
      deps: effectDeps,
      cleanup: undefined,
      effect: normalized,
      pending: true,
    };
    state.replacedEffects.push(prev);
    state.hooks[index] = { kind: "effect", effect: effectState };
    state.pendingEffects.push(effectState);
  }

  function useMemo<T>(factory: () => T, memoDeps?: readonly unknown[]): T {
    const index = nextIndex("memo");
    const hook = state.hooks[index];
    if (hook !== undefined && hook.kind !== "memo") throw mismatch(index, "memo", hook.kind);
    if (hook !== undefined && depsEqual(hook.deps, memoDeps)) return hook.value as T;
    const value = factory();
    state.hooks[index] = { kind: "memo", deps: memoDeps, value };
    return value;
  }

  function useCallback<T extends UnknownCallback>(callback: T, cbDeps?: readonly unknown[]): T {
    const index = nextIndex("callback");
    const hook = state.hooks[index];
    if (hook !== undefined && hook.kind !== "callback") {
      throw mismatch(index, "callback", hook.kind);
    }
    if (hook !== undefined && depsEqual(hook.deps, cbDeps)) return hook.callback as T;
    state.hooks[index] = { kind: "callback", deps: cbDeps, callback };
    return callback;
  }

  function useContext<T>(provider: Provider<T>): T {
    assertRendering("useContext");
    return provider.of(deps.buildContext());
  }

  return Object.freeze({
    useState,
    useSignal,
    useRef,
    useEffect,
    useMemo,
    useComputed: <T>(compute: () => T, computedDeps: readonly unknown[]): T =>
      useMemo(compute, computedDeps),
    useCallback,
    useContext,
  });
}
