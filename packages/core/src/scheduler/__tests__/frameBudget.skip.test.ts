import { assert, describe, test } from "@trellis-ui/testkit";
import {
  SKIP_NEVER,
  SKIP_ON_DEADLINE_MISS,
  type SkipPolicy,
  createFrameBudget,
  skipOnConsecutiveMisses,
} from "../frameBudget.js";

function budgetWithClock(skipPolicy: SkipPolicy = SKIP_NEVER) {
  const clock = { t: 0 };
  const budget = createFrameBudget({ budgetMs: 10, skipPolicy, now: () => clock.t });
  /** One frame that takes `ms`. */
  const run = (ms: number): boolean => {
    budget.startFrame();
    clock.t += ms;
    return budget.finishFrame();
  };
  return { clock, budget, run };
}

describe("frameBudget - deadline", () => {
  test("near, missed and remaining time inside a frame", () => {
    const { clock, budget } = budgetWithClock();
    assert.equal(budget.remainingMs(), 10);
    assert.equal(budget.isDeadlineMissed(), false);

    budget.startFrame();
    assert.equal(budget.inFrame(), true);
    clock.t = 7;
    assert.equal(budget.remainingMs(), 3);
    assert.equal(budget.isDeadlineNear(), false);
    clock.t = 8;
    assert.equal(budget.isDeadlineNear(), true);
    assert.equal(budget.isDeadlineMissed(), false);
    clock.t = 12;
    assert.equal(budget.isDeadlineMissed(), true);
    assert.equal(budget.remainingMs(), 0);
    assert.equal(budget.finishFrame(), true);
    assert.equal(budget.inFrame(), false);
    assert.equal(budget.elapsedMs(), 0);
  });

  test("exactly on budget is not a miss", () => {
    const { run } = budgetWithClock();
    assert.equal(run(10), false);
  });

  test("frames must be started and finished in pairs", () => {
    const { budget } = budgetWithClock();
    assert.throws(() => budget.finishFrame(), {
      code: "TRELLIS_INVALID_STATE",
      message: "frameBudget: no frame started",
    });
    budget.startFrame();
    assert.throws(() => budget.startFrame(), { message: "frameBudget: frame already started" });
  });
});

describe("frameBudget - skip policies", () => {
  test("never skips", () => {
    const { budget, run } = budgetWithClock(SKIP_NEVER);
    run(50);
    run(50);
    assert.equal(budget.shouldSkip(), false);
  });

  test("onDeadlineMiss follows the last frame", () => {
    const { budget, run } = budgetWithClock(SKIP_ON_DEADLINE_MISS);
    run(11);
    assert.equal(budget.shouldSkip(), true);
    run(1);
    assert.equal(budget.shouldSkip(), false);
  });

  test("onConsecutiveMisses waits for a run of misses and resets on a skip", () => {
    const { budget, run } = budgetWithClock(skipOnConsecutiveMisses(2));
    run(11);
    assert.equal(budget.shouldSkip(), false);
    run(11);
    assert.equal(budget.shouldSkip(), true);
    budget.recordSkip();
    assert.equal(budget.shouldSkip(), false);
    assert.deepEqual(budget.stats(), {
      frames: 2,
      missed: 2,
      skipped: 1,
      consecutiveMisses: 0,
      skippedFrameRate: 1 / 3,
    });
  });

  test("a frame within budget breaks the run", () => {
    const { budget, run } = budgetWithClock(skipOnConsecutiveMisses(2));
    run(11);
    run(1);
    run(11);
    assert.equal(budget.shouldSkip(), false);
    assert.equal(budget.stats().consecutiveMisses, 1);
  });

  test("options are validated", () => {
    assert.throws(() => skipOnConsecutiveMisses(0), {
      code: "TRELLIS_INVALID_PROPS",
      message: "frameBudget: consecutive miss count must be a positive integer (got 0)",
    });
    assert.throws(() => createFrameBudget({ budgetMs: 0 }), {
      message: "frameBudget: budgetMs must be a finite positive number (got 0)",
    });
  });
});
