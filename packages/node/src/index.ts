/**
 * @trellis-ui/node
 *
 * Node.js host for the trellis pipeline: a timer-driven frame loop and a
 * worker-thread presenter that consumes published frames.
 */

export {
  type FrameLoop,
  type FrameLoopOptions,
  type FrameLoopStats,
  type ScheduleTimer,
  MAX_IDLE_DELAY_MS,
  createFrameLoop,
  nodeTimer,
  tickIntervalMs,
} from "./frameLoop.js";

export { type Presenter, type PresenterOptions, startPresenter } from "./presenter.js";

export {
  type PresenterStats,
  PRESENTER_CONTROL_BYTES,
  PRESENTER_STOP,
  checkTaggedFrame,
  tagColor,
  tagLabel,
} from "./worker/protocol.js";
