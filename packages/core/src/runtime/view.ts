/**
 * packages/core/src/runtime/view.ts — Declarative view configurations.
 *
 * A view is an immutable description of one element: a component that builds
 * a child, a provider that exposes a value to its subtree, or a render view
 * that owns a render object. Views are cheap to create and are compared by
 * `type` and `key` only (see `canUpdate`).
 */

import { TrellisError, invalidProps } from "../errors.js";
import type { RenderObject, RenderProtocol } from "../render/types.js";
import type { HookContext } from "./hooks.js";
import type { ElementId } from "./identity.js";

/** Reconciliation type: a string tag, a symbol or an object compared by identity. */
export type ViewType = string | symbol | Readonly<{ name: string }>;

/** Key that identifies an element across the whole tree, not just among siblings. */
export type GlobalKey = Readonly<{ kind: "globalKey"; name: string }>;

export type ViewKey = string | number | GlobalKey;

export interface BuildContext {
  readonly elementId: ElementId;
  readonly depth: number;
  readonly hooks: HookContext;
  /**
   * Nearest provider ancestor of `providerType`; registers this element as a
   * dependent so it rebuilds when the provider notifies.
   */
  dependOn(providerType: ViewType): ProviderView | null;
  /** Schedule a rebuild of this element. */
  markNeedsBuild(): void;
}

export type ComponentView = Readonly<{
  kind: "component";
  type: ViewType;
  key?: ViewKey;
  /** Retained for inspection; `build` closes over the typed props. */
  props: unknown;
  build: (ctx: BuildContext) => View | null;
}>;

export type ProviderView = Readonly<{
  kind: "provider";
  type: ViewType;
  key?: ViewKey;
  value: unknown;
  /** Whether dependents must rebuild when `previous` is replaced by this view. */
  updateShouldNotify: (previous: ProviderView) => boolean;
  child: View;
}>;

export type RenderView = Readonly<{
  kind: "render";
  type: ViewType;
  key?: ViewKey;
  protocol: RenderProtocol;
  /** Protocol the render object lays its children out with. */
  childProtocol: RenderProtocol;
  createRenderObject: () => RenderObject;
  updateRenderObject?: (object: RenderObject, previous: RenderView) => void;
  children: readonly View[];
}>;

export type View = ComponentView | ProviderView | RenderView;

// =============================================================================
// Keys and identity
// =============================================================================

export function globalKey(name: string): GlobalKey {
  return Object.freeze({ kind: "globalKey", name });
}

export function isGlobalKey(key: ViewKey | undefined): key is GlobalKey {
  return typeof key === "object";
}

/**
 * Key used to match siblings during reconciliation: a tagged string for
 * local keys, the key object itself for global keys, undefined when unkeyed.
 */
export function slotKeyOf(view: View): string | GlobalKey | undefined {
  const key = view.key;
  if (key === undefined) return undefined;
  if (typeof key === "string") return `s:${key}`;
  if (typeof key === "number") return `n:${String(key)}`;
  return key;
}

function keysEqual(a: ViewKey | undefined, b: ViewKey | undefined): boolean {
  return a === b;
}

/**
 * Whether an element configured by `prev` may be updated in place with `next`:
 * same kind, identical type, equal or both-absent keys. Global keys compare by
 * identity.
 */
export function canUpdate(prev: View, next: View): boolean {
  return prev.kind === next.kind && prev.type === next.type && keysEqual(prev.key, next.key);
}

export function typeName(type: ViewType): string {
  if (typeof type === "string") return type;
  if (typeof type === "symbol") return type.description ?? "symbol";
  return type.name;
}

export function describeKey(key: ViewKey | undefined): string {
  if (key === undefined) return "";
  if (typeof key === "object") return `global:${key.name}`;
  return String(key);
}

// =============================================================================
// Components
// =============================================================================

/**
 * Define a component. The returned factory creates views; every view from the
 * same definition shares one reconciliation type.
 */
export function defineComponent<P>(
  name: string,
  build: (props: P, ctx: BuildContext) => View | null,
): (props: P, key?: ViewKey) => ComponentView {
  const type: Readonly<{ name: string }> = Object.freeze({ name });
  return (props: P, key?: ViewKey): ComponentView => {
    const view: ComponentView = {
      kind: "component",
      type,
      ...(key === undefined ? {} : { key }),
      props,
      build: (ctx: BuildContext) => build(props, ctx),
    };
    return Object.freeze(view);
  };
}

// =============================================================================
// Providers
// =============================================================================

export type Provider<T> = Readonly<{
  type: Readonly<{ name: string }>;
  provide: (value: T, child: View, key?: ViewKey) => ProviderView;
  /** Value from the nearest provider; the default when there is none. */
  of: (ctx: BuildContext) => T;
  /** Value from the nearest provider, or undefined. */
  maybeOf: (ctx: BuildContext) => T | undefined;
}>;

export type ProviderOptions<T> = Readonly<{
  defaultValue?: T;
  updateShouldNotify?: (previous: T, next: T) => boolean;
}>;

export function createProvider<T>(name: string, opts: ProviderOptions<T> = {}): Provider<T> {
  const type: Readonly<{ name: string }> = Object.freeze({ name });
  const values = new WeakMap<ProviderView, { value: T }>();
  const shouldNotify = opts.updateShouldNotify ?? ((a: T, b: T) => !Object.is(a, b));

  const provide = (value: T, child: View, key?: ViewKey): ProviderView => {
    const view: ProviderView = Object.freeze<ProviderView>({
      kind: "provider",
      type,
      ...(key === undefined ? {} : { key }),
      value,
      updateShouldNotify: (previous: ProviderView): boolean => {
        const prev = values.get(previous);
        return prev === undefined ? true : shouldNotify(prev.value, value);
      },
      child,
    });
    values.set(view, { value });
    return view;
  };

  const maybeOf = (ctx: BuildContext): T | undefined => {
    const view = ctx.dependOn(type);
    if (view === null) return undefined;
    return values.get(view)?.value;
  };

  const of = (ctx: BuildContext): T => {
    const view = ctx.dependOn(type);
    const entry = view === null ? undefined : values.get(view);
    if (entry !== undefined) return entry.value;
    if (opts.defaultValue !== undefined) return opts.defaultValue;
    throw new TrellisError(
      "TRELLIS_INVALID_STATE",
      `${name}.of(): no ${name} provider above element ${String(ctx.elementId)}`,
    );
  };

  return Object.freeze({ type, provide, of, maybeOf });
}

// =============================================================================
// Render views
// =============================================================================

export type RenderViewConfig<O extends RenderObject> = Readonly<{
  key?: ViewKey;
  create: () => O;
  /** Apply this view's configuration to an existing object. */
  update?: (object: O) => void;
  children?: readonly View[];
  /** Defaults to "box". */
  childProtocol?: RenderProtocol;
}>;

/**
 * Render view whose reconciliation type is the render object class. `update`
 * only runs when the live object is an instance of `ctor`.
 */
export function renderView<O extends RenderObject>(
  ctor: abstract new (...args: never[]) => O,
  protocol: RenderProtocol,
  config: RenderViewConfig<O>,
): RenderView {
  const update = config.update;
  if (config.children !== undefined && !Array.isArray(config.children)) {
    throw invalidProps(`${ctor.name}: children must be an array`);
  }
  const view: RenderView = {
    kind: "render",
    type: ctor,
    ...(config.key === undefined ? {} : { key: config.key }),
    protocol,
    childProtocol: config.childProtocol ?? "box",
    createRenderObject: () => {
      const object = config.create();
      update?.(object);
      return object;
    },
    ...(update === undefined
      ? {}
      : {
          updateRenderObject: (object: RenderObject) => {
            if (object instanceof ctor) update(object);
          },
        }),
    children: Object.freeze((config.children ?? []).slice()),
  };
  return Object.freeze(view);
}
