import {
  type PipelineOwner,
  createFrameBudget,
  createPipelineOwner,
  createVsyncScheduler,
  defineComponent,
  sizedBox,
  skipOnConsecutiveMisses,
  tight,
} from "@trellis-ui/core";
import { assert, describe, test } from "@trellis-ui/testkit";
import { type FrameLoopOptions, type ScheduleTimer, createFrameLoop, tickIntervalMs } from "../frameLoop.js";

type TimerEntry = { fn: () => void; ms: number; live: boolean };

/** Timer that only runs callbacks when the test fires them. */
function manualTimer() {
  const entries: TimerEntry[] = [];
  const timer: ScheduleTimer = (fn, ms) => {
    const entry: TimerEntry = { fn, ms, live: true };
    entries.push(entry);
    return () => {
      entry.live = false;
    };
  };
  return {
    timer,
    delays: () => entries.map((e) => e.ms),
    live: () => entries.filter((e) => e.live).length,
    fire: () => {
      const entry = entries.find((e) => e.live);
      if (entry === undefined) throw new Error("no timer pending");
      entry.live = false;
      entry.fn();
    },
  };
}

function pipeline(): PipelineOwner {
  return createPipelineOwner({ rootConstraints: tight({ width: 10, height: 10 }), env: {} });
}

function loopWith(p: PipelineOwner, extra: Partial<FrameLoopOptions> = {}) {
  const t = manualTimer();
  const loop = createFrameLoop({
    pipeline: p,
    scheduler: createVsyncScheduler({ mode: "off", now: () => 0 }),
    timer: t.timer,
    ...extra,
  });
  return { t, loop };
}

describe("frameLoop - ticking", () => {
  test("draws when needed, then backs off while idle", () => {
    const p = pipeline();
    p.attach(sizedBox({}));
    const outcomes: string[] = [];
    const { t, loop } = loopWith(p, { onFrame: (r) => outcomes.push(r.outcome) });

    loop.start();
    t.fire();
    t.fire();
    t.fire();
    assert.deepEqual(outcomes, ["painted"]);
    assert.deepEqual(t.delays(), [0, 16, 32, 64]);
    assert.deepEqual(loop.stats(), { ticks: 3, frames: 1, skipped: 0 });
  });

  test("idle backoff stops at eight refresh intervals", () => {
    const p = pipeline();
    const { t, loop } = loopWith(p);
    loop.start();
    for (let i = 0; i < 5; i++) t.fire();
    assert.deepEqual(t.delays(), [0, 16, 32, 64, 128, 128]);
  });

  test("idle backoff never exceeds 250 ms at slow refresh rates", () => {
    const p = pipeline();
    const { t, loop } = loopWith(p, {
      scheduler: createVsyncScheduler({ mode: "off", refreshRate: 10, now: () => 0 }),
    });
    loop.start();
    for (let i = 0; i < 3; i++) t.fire();
    assert.deepEqual(t.delays(), [0, 100, 200, 250]);
  });

  test("tick intervals are whole milliseconds of at least one", () => {
    assert.equal(tickIntervalMs(60), 16);
    assert.equal(tickIntervalMs(144), 6);
    assert.equal(tickIntervalMs(5000), 1);
  });

  test("keeps the refresh interval while frames are requested", () => {
    const p = pipeline();
    p.attach(sizedBox({}));
    const { t, loop } = loopWith(p, { onFrame: () => p.requestFrame() });
    loop.start();
    t.fire();
    t.fire();
    assert.deepEqual(t.delays(), [0, 16, 16]);
    assert.equal(loop.stats().frames, 2);
  });

  test("wake replaces the idle wait with an immediate tick", () => {
    const p = pipeline();
    const { t, loop } = loopWith(p);
    loop.start();
    t.fire();
    p.attach(sizedBox({}));
    loop.wake();
    assert.deepEqual(t.delays(), [0, 16, 0]);
    assert.equal(t.live(), 1);
    t.fire();
    assert.equal(loop.stats().frames, 1);
  });

  test("a manual tick draws only while started", () => {
    const p = pipeline();
    p.attach(sizedBox({}));
    const { loop } = loopWith(p);
    loop.tick();
    assert.deepEqual(loop.stats(), { ticks: 1, frames: 0, skipped: 0 });
    loop.start();
    loop.tick();
    assert.deepEqual(loop.stats(), { ticks: 2, frames: 1, skipped: 0 });
  });
});

describe("frameLoop - budget", () => {
  test("a missed deadline drops the next frame", () => {
    const clock = { t: 0 };
    const p = pipeline();
    p.attach(sizedBox({}));
    const budget = createFrameBudget({
      budgetMs: 10,
      skipPolicy: skipOnConsecutiveMisses(1),
      now: () => (clock.t += 20),
    });
    const { loop } = loopWith(p, { budget, onFrame: () => p.requestFrame() });
    loop.start();
    loop.tick();
    loop.tick();
    loop.tick();
    assert.deepEqual(loop.stats(), { ticks: 3, frames: 2, skipped: 1 });
    assert.equal(budget.stats().skipped, 1);
  });
});

describe("frameLoop - lifecycle", () => {
  test("stop cancels the pending tick and releases the scheduler", () => {
    const scheduler = createVsyncScheduler({ mode: "off" });
    const { t, loop } = loopWith(pipeline(), { scheduler });
    loop.start();
    loop.start();
    assert.equal(t.live(), 1);
    loop.stop();
    assert.equal(t.live(), 0);
    assert.equal(loop.isRunning(), false);
    assert.equal(scheduler.isActive(), false);
  });

  test("one scheduler drives one loop", () => {
    const scheduler = createVsyncScheduler({ mode: "off" });
    loopWith(pipeline(), { scheduler }).loop.start();
    assert.throws(() => loopWith(pipeline(), { scheduler }).loop.start(), {
      code: "TRELLIS_INVALID_STATE",
      message: "frameLoop: scheduler is already driving another loop",
    });
  });

  test("a fatal frame error stops the loop", () => {
    const Broken = defineComponent<Record<string, never>>("Broken", () => {
      throw new Error("boom");
    });
    const errors: unknown[] = [];
    const p = pipeline();
    p.attach(Broken({}));
    const { t, loop } = loopWith(p, { onError: (e) => errors.push(e) });
    loop.start();
    t.fire();
    assert.equal(loop.isRunning(), false);
    assert.equal(errors.length, 1);
    const [err] = errors;
    assert.ok(err instanceof Error);
    assert.equal(err.message, "build failed: Error: boom");
    assert.equal(t.live(), 0);
  });

  test("without onError the failure is rethrown from the tick", () => {
    const Broken = defineComponent<Record<string, never>>("Broken", () => {
      throw new Error("boom");
    });
    const p = pipeline();
    p.attach(Broken({}));
    const { t, loop } = loopWith(p);
    loop.start();
    assert.throws(() => t.fire(), { message: "build failed: Error: boom" });
    assert.equal(loop.isRunning(), false);
  });
});
