import { assert, describe, test } from "@trellis-ui/testkit";
import {
  UNCONSTRAINED,
  biggestFinite,
  boxConstraints,
  constrain,
  deflate,
  describeBoxConstraints,
  enforce,
  expand,
  isSatisfiedBy,
  isTight,
  loose,
  loosen,
  tight,
  tightFor,
  tighten,
} from "../boxConstraints.js";
import { insetsAll, insetsSymmetric } from "../objects/box.js";
import { calculatePaintOffset, sliverConstraints, sliverGeometry } from "../sliverConstraints.js";

describe("box constraints - validation", () => {
  test("min above max is a protocol violation", () => {
    assert.throws(() => boxConstraints(5, 1, 0, 0), {
      code: "TRELLIS_PROTOCOL_VIOLATION",
      message: "protocol violation: BoxConstraints width: expected 0 <= min <= max (got 5..1)",
    });
  });

  test("NaN and infinite minimums are rejected", () => {
    assert.throws(() => boxConstraints(0, 10, Number.NaN, 10), {
      message: "protocol violation: BoxConstraints height: NaN",
    });
    assert.throws(() => boxConstraints(Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY, 0, 0), {
      message: "protocol violation: BoxConstraints width: min must be finite (got Infinity)",
    });
  });

  test("unbounded maximums are allowed", () => {
    assert.equal(UNCONSTRAINED.maxWidth, Number.POSITIVE_INFINITY);
    assert.equal(
      describeBoxConstraints(boxConstraints(0, 10, 5, Number.POSITIVE_INFINITY)),
      "BoxConstraints(w 0..10, h 5..Infinity)",
    );
  });
});

describe("box constraints - helpers", () => {
  test("tight, tightFor, loose and loosen", () => {
    assert.equal(isTight(tight({ width: 10, height: 20 })), true);
    assert.deepEqual(tightFor(10), {
      minWidth: 10,
      maxWidth: 10,
      minHeight: 0,
      maxHeight: Number.POSITIVE_INFINITY,
    });
    assert.deepEqual(loose({ width: 10, height: 20 }), { minWidth: 0, maxWidth: 10, minHeight: 0, maxHeight: 20 });
    assert.deepEqual(loosen(tight({ width: 10, height: 20 })), {
      minWidth: 0,
      maxWidth: 10,
      minHeight: 0,
      maxHeight: 20,
    });
  });

  test("tighten clamps into the incoming range", () => {
    assert.deepEqual(tighten(loose({ width: 100, height: 100 }), 150), {
      minWidth: 100,
      maxWidth: 100,
      minHeight: 0,
      maxHeight: 100,
    });
  });

  test("enforce keeps additional constraints inside the outer ones", () => {
    const outer = loose({ width: 100, height: 100 });
    assert.deepEqual(enforce(boxConstraints(0, 50, 0, 30), outer), {
      minWidth: 0,
      maxWidth: 50,
      minHeight: 0,
      maxHeight: 30,
    });
    assert.deepEqual(enforce(boxConstraints(0, 50, 0, 30), tight({ width: 100, height: 100 })), {
      minWidth: 100,
      maxWidth: 100,
      minHeight: 100,
      maxHeight: 100,
    });
  });

  test("expand fills bounded axes only", () => {
    assert.deepEqual(expand(boxConstraints(0, Number.POSITIVE_INFINITY, 0, 40)), {
      minWidth: 0,
      maxWidth: Number.POSITIVE_INFINITY,
      minHeight: 40,
      maxHeight: 40,
    });
  });

  test("deflate never goes below zero", () => {
    assert.deepEqual(deflate(tight({ width: 100, height: 100 }), insetsAll(5)), {
      minWidth: 90,
      maxWidth: 90,
      minHeight: 90,
      maxHeight: 90,
    });
    assert.deepEqual(deflate(loose({ width: 10, height: 10 }), insetsSymmetric(20, 3)), {
      minWidth: 0,
      maxWidth: 0,
      minHeight: 0,
      maxHeight: 4,
    });
  });

  test("constrain, biggestFinite and isSatisfiedBy", () => {
    const c = boxConstraints(0, 50, 10, 20);
    assert.deepEqual(constrain(c, { width: 80, height: 5 }), { width: 50, height: 10 });
    assert.equal(isSatisfiedBy(c, { width: 50, height: 10 }), true);
    assert.equal(isSatisfiedBy(c, { width: 51, height: 10 }), false);
    assert.deepEqual(biggestFinite(tightFor(undefined, 30)), { width: 0, height: 30 });
  });
});

describe("sliver protocol values", () => {
  const base = {
    axis: "vertical",
    scrollOffset: 100,
    remainingPaintExtent: 600,
    crossAxisExtent: 300,
    viewportMainAxisExtent: 600,
    precedingScrollExtent: 0,
  } as const;

  test("negative scroll offsets are rejected", () => {
    assert.throws(() => sliverConstraints({ ...base, scrollOffset: -1 }), {
      code: "TRELLIS_PROTOCOL_VIOLATION",
      message: "protocol violation: SliverConstraints.scrollOffset: invalid value -1",
    });
  });

  test("geometry defaults follow the paint and scroll extents", () => {
    assert.deepEqual(sliverGeometry({ scrollExtent: 40, paintExtent: 10 }), {
      scrollExtent: 40,
      paintExtent: 10,
      paintOrigin: 0,
      layoutExtent: 10,
      maxPaintExtent: 40,
      hitTestExtent: 10,
      visible: true,
      hasVisualOverflow: false,
    });
    assert.throws(() => sliverGeometry({ scrollExtent: 10, paintExtent: 5, layoutExtent: 6 }), {
      message: "protocol violation: SliverGeometry: layoutExtent 6 exceeds paintExtent 5",
    });
  });

  test("calculatePaintOffset returns the visible part of a range", () => {
    const c = sliverConstraints(base);
    assert.equal(calculatePaintOffset(c, 0, 50), 0);
    assert.equal(calculatePaintOffset(c, 0, 200), 100);
    assert.equal(calculatePaintOffset(c, 650, 1000), 50);
  });
});
