/**
 * @trellis-ui/core
 *
 * Runtime-agnostic core of the trellis retained-mode UI framework: element
 * tree, reconciliation, render tree (box and sliver protocols), display list
 * and the frame pipeline.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export {
  TrellisError,
  type TrellisErrorCode,
  FrameError,
  type FramePhase,
  type FrameErrorReason,
  describeThrown,
  invalidProps,
  isTrellisError,
  protocolViolation,
  toFrameError,
} from "./errors.js";

export { type EnvFlag, type EnvSource, envFlag, processEnv } from "./env.js";

// =============================================================================
// Runtime: identity, views, elements, hooks
// =============================================================================

export {
  type ElementId,
  type RenderId,
  type IdAllocator,
  SHARED_ID_COUNTER_BYTES,
  createIdAllocator,
  createSharedIdCounter,
} from "./runtime/identity.js";

export {
  type BuildContext,
  type ComponentView,
  type GlobalKey,
  type Provider,
  type ProviderOptions,
  type ProviderView,
  type RenderView,
  type RenderViewConfig,
  type View,
  type ViewKey,
  type ViewType,
  canUpdate,
  createProvider,
  defineComponent,
  describeKey,
  globalKey,
  isGlobalKey,
  renderView,
  typeName,
} from "./runtime/view.js";

export type { EffectCleanup, HookContext, RefState, Signal } from "./runtime/hooks.js";

export {
  type PlannedChild,
  type PrevChild,
  type ReconcileChildrenResult,
  type ReconcileFatal,
  reconcileChildren,
} from "./runtime/reconcile.js";

export {
  type ElementLifecycle,
  type ElementRecord,
  type ElementSnapshot,
  type ElementTree,
  type TreeSnapshot,
  createElementTree,
} from "./runtime/elementTree.js";

export {
  type BuildOwner,
  type BuildOwnerOptions,
  type BuildScopeResult,
  createBuildOwner,
} from "./runtime/buildOwner.js";

// =============================================================================
// Render
// =============================================================================

export {
  type Arity,
  type BoxRenderObject,
  type LayoutContext,
  type Offset,
  type PaintContext,
  type Rect,
  type RenderObject,
  type RenderProtocol,
  type Size,
  type SliverRenderObject,
  LEAF,
  SINGLE,
  VARIABLE,
  ZERO_OFFSET,
  ZERO_SIZE,
  fixedArity,
  offset,
  size,
} from "./render/types.js";

export {
  type BoxConstraints,
  type EdgeInsets,
  UNCONSTRAINED,
  biggest,
  biggestFinite,
  boxConstraints,
  boxConstraintsEqual,
  constrain,
  deflate,
  describeBoxConstraints,
  enforce,
  expand,
  isSatisfiedBy,
  isTight,
  loose,
  loosen,
  smallest,
  tight,
  tightFor,
  tighten,
} from "./render/boxConstraints.js";

export {
  type Axis,
  type SliverConstraints,
  type SliverGeometry,
  ZERO_SLIVER_GEOMETRY,
  calculatePaintOffset,
  sliverConstraints,
  sliverGeometry,
} from "./render/sliverConstraints.js";

export {
  type Canvas,
  type DisplayList,
  type PaintCommand,
  type RecordingCanvas,
  createRecordingCanvas,
} from "./render/displayList.js";

export {
  DISPLAY_LIST_MAGIC,
  DISPLAY_LIST_VERSION,
  decodeDisplayList,
  encodeDisplayList,
} from "./render/displayListCodec.js";

export {
  type HitTestEntry,
  type NodeErrorAction,
  type RenderNodeView,
  type RenderTree,
  type RenderTreeOptions,
  createRenderTree,
} from "./render/renderTree.js";

export {
  type Alignment,
  type CrossAxisAlignment,
  type FlexDirection,
  type Flexible,
  type MainAxisAlignment,
  BOTTOM_RIGHT,
  CENTER,
  TOP_LEFT,
  RenderColoredBox,
  RenderConstrainedBox,
  RenderErrorBox,
  RenderFlex,
  RenderPadding,
  RenderSizedBox,
  RenderStack,
  coloredBox,
  column,
  constrainedBox,
  errorBox,
  flex,
  flexible,
  insetsAll,
  insetsSymmetric,
  padding,
  row,
  sizedBox,
  stack,
} from "./render/objects/box.js";

export {
  type SliverSequenceResult,
  RenderErrorSliver,
  RenderSliverExtent,
  RenderSliverFixedExtentList,
  RenderSliverGroup,
  RenderSliverToBoxAdapter,
  RenderViewport,
  errorSliver,
  layoutSliverSequence,
  sliverExtent,
  sliverFixedExtentList,
  sliverGroup,
  sliverToBoxAdapter,
  viewport,
} from "./render/objects/sliver.js";

// =============================================================================
// Pipeline
// =============================================================================

export {
  type FrameOutcome,
  type FrameResult,
  type PipelineInspection,
  type PipelineOwner,
  type PipelineOwnerOptions,
  createPipelineOwner,
} from "./pipeline/pipelineOwner.js";

export {
  type PipelineConfig,
  type PresetName,
  type ResolvedPipelineConfig,
  PRESET_NAMES,
  pipelinePreset,
  resolvePipelineConfig,
} from "./pipeline/config.js";

export {
  type ErrorRecord,
  type ErrorRecovery,
  type RecoveryPolicy,
  RECOVERY_POLICIES,
  createErrorRecovery,
} from "./pipeline/errorRecovery.js";

export { type CancellationToken, createCancellationToken } from "./pipeline/cancellation.js";
export { type HitTestCache, type HitTestCacheStats, createHitTestCache } from "./pipeline/hitTestCache.js";
export { type FrameMetrics, type MetricsSnapshot, createFrameMetrics } from "./pipeline/metrics.js";
export { TRIPLE_BUFFER_HEADER_BYTES, TripleBuffer } from "./pipeline/tripleBuffer.js";

// =============================================================================
// Scheduling
// =============================================================================

export {
  type VsyncCallback,
  type VsyncMode,
  type VsyncScheduler,
  type VsyncSchedulerOptions,
  type VsyncStats,
  atomicsSleep,
  createVsyncScheduler,
} from "./scheduler/vsync.js";

export {
  type FrameBudget,
  type FrameBudgetStats,
  type SkipPolicy,
  SKIP_NEVER,
  SKIP_ON_DEADLINE_MISS,
  createFrameBudget,
  skipOnConsecutiveMisses,
} from "./scheduler/frameBudget.js";

// =============================================================================
// Diagnostics
// =============================================================================

export { type PhaseRecorder, type PhaseStats, createPhaseRecorder, monotonicNowMs } from "./perf/perf.js";
export {
  type FrameLogStage,
  type FrameLogSink,
  type FrameLogger,
  createFrameLogger,
} from "./debug/frameLog.js";
