/**
 * packages/core/src/pipeline/pipelineOwner.ts — Frame orchestration.
 *
 * One frame: build scopes until no carried work remains, flush layout from
 * the root render node, paint the root, then publish the encoded display
 * list. Effects run after the frame. Layout is skipped while an element is
 * still dirty from a failed build; paint never reaches a node that needs
 * layout.
 *
 * Recoverable failures go through the configured ErrorRecovery:
 *   showErrorPlaceholder  build → error box (error sliver under a sliver parent);
 *                         layout/paint → placeholder
 *   useLastGoodFrame      frame output is the previous painted frame
 *   skipFrame             no output, another frame is requested
 *   panic                 TRELLIS_FRAME_PANIC
 * Cancellation always aborts the running phase; its error is then handled
 * like the others, with placeholders falling back to the last good frame.
 * Without a recovery configuration FrameErrors are rethrown.
 */

import {
  FrameError,
  TrellisError,
  describeThrown,
  invalidProps,
  protocolViolation,
} from "../errors.js";
import { type FrameLogger, createFrameLogger } from "../debug/frameLog.js";
import type { EnvSource } from "../env.js";
import { monotonicNowMs } from "../perf/perf.js";
import { type BoxConstraints, describeBoxConstraints } from "../render/boxConstraints.js";
import type { DisplayList } from "../render/displayList.js";
import { encodeDisplayList } from "../render/displayListCodec.js";
import { errorBox } from "../render/objects/box.js";
import { errorSliver } from "../render/objects/sliver.js";
import { type HitTestEntry, type NodeErrorAction, type RenderTree, createRenderTree } from "../render/renderTree.js";
import type { RenderProtocol } from "../render/types.js";
import { type BuildOwner, createBuildOwner } from "../runtime/buildOwner.js";
import type { TreeSnapshot } from "../runtime/elementTree.js";
import { type ElementId, type IdAllocator, type RenderId, createIdAllocator } from "../runtime/identity.js";
import { type View, canUpdate } from "../runtime/view.js";
import { type CancellationToken, createCancellationToken } from "./cancellation.js";
import {
  type PipelineConfig,
  type PresetName,
  type ResolvedPipelineConfig,
  pipelinePreset,
  resolvePipelineConfig,
} from "./config.js";
import { type ErrorRecord, type ErrorRecovery, type RecoveryPolicy, createErrorRecovery } from "./errorRecovery.js";
import { type HitTestCache, type HitTestCacheStats, createHitTestCache } from "./hitTestCache.js";
import { type FrameMetrics, type MetricsPhase, type MetricsSnapshot, createFrameMetrics } from "./metrics.js";
import { TripleBuffer } from "./tripleBuffer.js";

export type FrameOutcome = "painted" | "reused" | "skipped" | "idle";

export type FrameResult = Readonly<{
  outcome: FrameOutcome;
  /** Frame number; idle calls do not advance it. */
  frame: number;
  /** Painted or reused output; null when skipped or idle. */
  displayList: DisplayList | null;
  /** Recoverable errors handled during this frame. */
  errors: number;
}>;

export type PipelineOwnerOptions = Readonly<{
  /** Root box constraints (usually the surface size). */
  rootConstraints: BoxConstraints;
  config?: PipelineConfig | PresetName;
  ids?: IdAllocator;
  /** Milliseconds, monotonic. */
  now?: () => number;
  /** Called when the pipeline wants a frame it was not asked for yet. */
  onFrameRequested?: () => void;
  /** Effect and effect-cleanup failures; without a handler they are rethrown from drawFrame. */
  onEffectError?: (id: ElementId | null, err: unknown) => void;
  /** Frame log scope name. */
  name?: string;
  env?: EnvSource;
}>;

export type PipelineInspection = Readonly<{
  frame: number;
  attached: boolean;
  elements: TreeSnapshot;
  renderNodes: number;
  rootRenderId: RenderId | null;
  dirtyElements: number;
  pendingLayout: number;
  frameRequested: boolean;
  errorCount: number;
  errors: readonly ErrorRecord[];
  metrics: MetricsSnapshot | null;
  hitTestCache: HitTestCacheStats | null;
}>;

export type PipelineOwner = Readonly<{
  config: ResolvedPipelineConfig;
  attach: (view: View) => void;
  setRootConstraints: (constraints: BoxConstraints) => void;
  drawFrame: (timestampMs?: number) => FrameResult;
  hitTest: (x: number, y: number) => readonly HitTestEntry[];
  requestFrame: () => void;
  needsFrame: () => boolean;
  inspect: () => PipelineInspection;
  dispose: () => void;
  /** Present when the configuration asks for one. */
  frameBuffer: TripleBuffer | null;
  recovery: ErrorRecovery | null;
  metrics: () => MetricsSnapshot | null;
  lastGoodFrame: () => DisplayList | null;
  renderTree: RenderTree;
  buildOwner: BuildOwner;
}>;

/** What the frame does after a failure. */
type FrameFallback = "reuse" | "skip";

function panicError(err: FrameError, count: number): TrellisError {
  return new TrellisError(
    "TRELLIS_FRAME_PANIC",
    `frame panic after ${String(count)} error(s): ${err.message}`,
    { cause: err },
  );
}

export function createPipelineOwner(opts: PipelineOwnerOptions): PipelineOwner {
  const configInput = opts.config ?? {};
  const config = resolvePipelineConfig(
    typeof configInput === "string" ? pipelinePreset(configInput) : configInput,
    opts.env,
  );
  const now = opts.now ?? monotonicNowMs;
  const ids = opts.ids ?? createIdAllocator();
  const recovery = config.recovery === null ? null : createErrorRecovery(config.recovery);
  const metrics = config.metrics === null ? null : createFrameMetrics(config.metrics);
  const cache = config.hitTestCache === null ? null : createHitTestCache(config.hitTestCache);
  const frameBuffer = config.frameBuffer === null ? null : TripleBuffer.create(config.frameBuffer.slotCapacity);
  const log: FrameLogger = createFrameLogger({
    scope: opts.name ?? "pipeline",
    ...(config.frameLog === null
      ? { enabled: false }
      : config.frameLog === true
        ? { enabled: true }
        : { sink: config.frameLog }),
  });

  let rootConstraints = opts.rootConstraints;
  let frame = 0;
  let frameRequested = false;
  let drawing = false;
  let disposed = false;
  let token: CancellationToken | null = null;
  let fallback: FrameFallback | null = null;
  let frameErrors = 0;
  let lastGood: DisplayList | null = null;
  const reported = new WeakSet<FrameError>();

  function requestFrame(): void {
    if (frameRequested || disposed) return;
    frameRequested = true;
    opts.onFrameRequested?.();
  }

  /** Count `err` against the policy; throws on panic. */
  function decide(err: FrameError): RecoveryPolicy {
    if (recovery === null) throw err;
    reported.add(err);
    frameErrors++;
    const action = recovery.handle(err, frame);
    log.emit("phaseError", {
      frame,
      phase: err.phase,
      nodeId: err.nodeId,
      reason: err.reason,
      message: err.message,
    });
    log.emit("recovery", { frame, phase: err.phase, action, errorCount: recovery.errorCount() });
    if (action === "panic") throw panicError(err, recovery.errorCount());
    return action;
  }

  function fallBack(action: RecoveryPolicy): void {
    const next: FrameFallback = action === "skipFrame" ? "skip" : "reuse";
    if (fallback !== "skip") fallback = next;
  }

  const renderTree = createRenderTree({
    ids,
    debugOverflow: config.debugOverflow,
    isCancelled: () => token?.isCancelled() ?? false,
    onNodeError: (err): NodeErrorAction => {
      if (recovery === null) return "abort";
      const action = decide(err);
      if (action === "showErrorPlaceholder") return "placeholder";
      fallBack(action);
      return "abort";
    },
    onLayoutComplete: () => cache?.invalidate(),
    onPaintComplete: () => cache?.invalidate(),
  });

  const buildOwner = createBuildOwner({
    ids,
    renderTree,
    // Work scheduled while drawing is picked up by this frame or seen by needsFrame().
    onBuildScheduled: () => {
      if (!drawing) requestFrame();
    },
    ...(opts.onEffectError === undefined ? {} : { onEffectError: opts.onEffectError }),
    ...(recovery === null
      ? {}
      : {
          onBuildError: (id: ElementId, err: FrameError): View | null => {
            const action = decide(err);
            const el = buildOwner.tree.get(id);
            if (action === "showErrorPlaceholder" && el !== undefined && el.view.kind !== "render") {
              return childProtocolAt(el.parent) === "sliver" ? errorSliver(err.message) : errorBox(err.message);
            }
            fallBack(action);
            return null;
          },
        }),
  });
  const tree = buildOwner.tree;

  /** Protocol the nearest render ancestor of `parent` (inclusive) lays its children out with. */
  function childProtocolAt(parent: ElementId | null): RenderProtocol {
    let cur = parent === null ? undefined : tree.get(parent);
    while (cur !== undefined) {
      if (cur.view.kind === "render") return cur.view.childProtocol;
      cur = cur.parent === null ? undefined : tree.get(cur.parent);
    }
    return "box";
  }

  function checkLive(op: string): void {
    if (disposed) throw new TrellisError("TRELLIS_INVALID_STATE", `${op}: pipeline is disposed`);
  }

  function rootRenderId(): RenderId | null {
    const id = tree.renderRootId();
    if (id === null) return null;
    const node = renderTree.get(id);
    if (node === undefined) return null;
    if (node.protocol !== "box") {
      throw protocolViolation(`root render node ${node.object.debugName}#${String(id)} must use the box protocol`);
    }
    return id;
  }

  function needsFrame(): boolean {
    if (disposed) return false;
    if (frameRequested || buildOwner.hasDirtyElements() || renderTree.pendingLayoutCount() > 0) return true;
    const root = tree.renderRootId();
    return root !== null && renderTree.has(root) && renderTree.needsPaint(root);
  }

  function buildPhase(): boolean {
    let passes = 0;
    for (;;) {
      const res = buildOwner.buildScope();
      if (res.failed.length > 0) {
        if (fallback === null) fallback = "reuse";
        return false;
      }
      if (fallback !== null) return false;
      if (res.carried === 0) return true;
      passes++;
      if (passes > tree.maxDepth() + 2) {
        throw new TrellisError(
          "TRELLIS_BUILD_CYCLE",
          `build did not settle after ${String(passes)} scopes (${String(res.carried)} element(s) still re-dirtied)`,
        );
      }
    }
  }

  function timed<T>(phases: Partial<Record<MetricsPhase, number>>, phase: MetricsPhase, fn: () => T): T {
    const start = now();
    try {
      return fn();
    } finally {
      phases[phase] = (phases[phase] ?? 0) + (now() - start);
    }
  }

  /** A phase threw: fatal errors propagate, FrameErrors not yet counted go through the policy. */
  function handlePhaseError(e: unknown): void {
    if (!(e instanceof FrameError)) throw e;
    if (!reported.has(e)) fallBack(decide(e));
    if (fallback === null) fallback = "reuse";
  }

  function finish(outcome: FrameOutcome, displayList: DisplayList | null): FrameResult {
    return Object.freeze({ outcome, frame, displayList, errors: frameErrors });
  }

  function drawFrame(timestampMs?: number): FrameResult {
    checkLive("drawFrame");
    if (drawing) throw new TrellisError("TRELLIS_REENTRANT_CALL", "drawFrame is already running");
    if (!needsFrame()) return finish("idle", null);

    drawing = true;
    frame++;
    frameRequested = false;
    fallback = null;
    frameErrors = 0;
    const start = now();
    const phases: Partial<Record<MetricsPhase, number>> = {};
    token = config.cancellation === null ? null : createCancellationToken({ now, budgetMs: config.cancellation.budgetMs });
    log.emit("frameStart", { frame, timestampMs: timestampMs ?? start });

    let result: FrameResult;
    try {
      let painted: DisplayList | null = null;
      let built = false;
      try {
        built = timed(phases, "build", buildPhase);
      } catch (e) {
        handlePhaseError(e);
      }
      const root = built ? rootRenderId() : null;
      if (built && root === null) {
        painted = Object.freeze([]);
      } else if (built && root !== null) {
        try {
          timed(phases, "layout", () => renderTree.flushLayout(root, rootConstraints));
          painted = timed(phases, "paint", () => renderTree.paintRoot(root));
        } catch (e) {
          handlePhaseError(e);
          painted = null;
        }
      }

      if (painted !== null && fallback === null) {
        const list = painted;
        if (frameBuffer !== null) {
          timed(phases, "publish", () => frameBuffer.write(encodeDisplayList(list), frame));
        }
        lastGood = list;
        result = finish("painted", list);
      } else if (fallback === "reuse" && lastGood !== null) {
        result = finish("reused", lastGood);
        requestFrame();
      } else {
        result = finish("skipped", null);
        requestFrame();
      }

      const effectsStart = now();
      buildOwner.flushEffects();
      phases.build = (phases.build ?? 0) + (now() - effectsStart);
    } catch (e) {
      log.emit("fatal", { frame, message: describeThrown(e) });
      throw e;
    } finally {
      token = null;
      drawing = false;
    }

    const totalMs = now() - start;
    metrics?.recordFrame({ timestampMs: timestampMs ?? start, totalMs, phases });
    log.emit("frameEnd", { frame, outcome: result.outcome, totalMs, errors: result.errors });
    return result;
  }

  function attach(view: View): void {
    checkLive("attach");
    if (drawing || buildOwner.isBuilding()) {
      throw new TrellisError("TRELLIS_REENTRANT_CALL", "attach during a frame");
    }
    const current = tree.root();
    const rec = current === null ? undefined : tree.get(current);
    if (rec !== undefined && canUpdate(rec.view, view)) {
      tree.update(rec.id, view);
    } else {
      if (current !== null) {
        tree.unmount(current);
        buildOwner.finalizeTree();
      }
      tree.mount(view, null, 0);
    }
    requestFrame();
  }

  function setRootConstraints(c: BoxConstraints): void {
    checkLive("setRootConstraints");
    if (!Number.isFinite(c.maxWidth) || !Number.isFinite(c.maxHeight)) {
      throw invalidProps(`setRootConstraints: root constraints must be bounded (got ${describeBoxConstraints(c)})`);
    }
    rootConstraints = c;
    requestFrame();
  }

  function hitTest(x: number, y: number): readonly HitTestEntry[] {
    checkLive("hitTest");
    const root = tree.renderRootId();
    if (root === null || !renderTree.has(root)) return Object.freeze([]);
    if (cache !== null) {
      const cached = cache.get(x, y);
      metrics?.recordCacheLookup(cached !== undefined);
      if (cached !== undefined) return cached;
    }
    const path = renderTree.hitTest(root, { x, y });
    cache?.set(x, y, path);
    return path;
  }

  function inspect(): PipelineInspection {
    return Object.freeze({
      frame,
      attached: tree.root() !== null,
      elements: tree.snapshot(),
      renderNodes: renderTree.size(),
      rootRenderId: tree.renderRootId(),
      dirtyElements: tree.dirtyCount(),
      pendingLayout: renderTree.pendingLayoutCount(),
      frameRequested,
      errorCount: recovery?.errorCount() ?? 0,
      errors: recovery?.records() ?? Object.freeze([]),
      metrics: metrics?.snapshot() ?? null,
      hitTestCache: cache?.stats() ?? null,
    });
  }

  function dispose(): void {
    if (disposed) return;
    if (drawing) throw new TrellisError("TRELLIS_REENTRANT_CALL", "dispose during a frame");
    const root = tree.root();
    if (root !== null) tree.unmount(root);
    buildOwner.finalizeTree();
    disposed = true;
    frameRequested = false;
    lastGood = null;
  }

  if (!Number.isFinite(rootConstraints.maxWidth) || !Number.isFinite(rootConstraints.maxHeight)) {
    throw invalidProps(
      `createPipelineOwner: root constraints must be bounded (got ${describeBoxConstraints(rootConstraints)})`,
    );
  }

  return Object.freeze({
    config,
    attach,
    setRootConstraints,
    drawFrame,
    hitTest,
    requestFrame,
    needsFrame,
    inspect,
    dispose,
    frameBuffer,
    recovery,
    metrics: () => metrics?.snapshot() ?? null,
    lastGoodFrame: () => lastGood,
    renderTree,
    buildOwner,
  });
}
