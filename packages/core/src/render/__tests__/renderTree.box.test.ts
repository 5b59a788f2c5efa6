import { assert, describe, test } from "@trellis-ui/testkit";
import { FrameError } from "../../errors.js";
import { createIdAllocator } from "../../runtime/identity.js";
import { type BoxConstraints, UNCONSTRAINED, loose, tight } from "../boxConstraints.js";
import { CENTER, RenderColoredBox, RenderPadding, RenderSizedBox, RenderStack, insetsAll } from "../objects/box.js";
import { type NodeErrorAction, type RenderTreeOptions, createRenderTree } from "../renderTree.js";
import { sliverConstraints } from "../sliverConstraints.js";
import {
  type BoxRenderObject,
  type LayoutContext,
  type Offset,
  type PaintContext,
  type Size,
  LEAF,
  fixedArity,
} from "../types.js";

/** Leaf that reports a configurable size and counts its layouts and paints. */
class Probe implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = LEAF;
  readonly debugName = "Probe";
  layouts = 0;
  paints = 0;
  width = 10;
  height = 10;
  color = 1;
  layoutError: Error | null = null;
  paintError: Error | null = null;

  performLayout(_ctx: LayoutContext, _c: BoxConstraints): Size {
    this.layouts++;
    if (this.layoutError !== null) throw this.layoutError;
    return { width: this.width, height: this.height };
  }

  paint(ctx: PaintContext, at: Offset): void {
    this.paints++;
    ctx.canvas.rect(at.x, at.y, ctx.size.width, ctx.size.height, this.color);
    if (this.paintError !== null) throw this.paintError;
  }
}

/** Lays out its only child twice. */
class Twice implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = fixedArity(1);
  readonly debugName = "Twice";

  performLayout(ctx: LayoutContext, c: BoxConstraints): Size {
    ctx.layoutBox(0, c);
    return ctx.layoutBox(0, c);
  }

  paint(): void {}
}

class Pair implements BoxRenderObject {
  readonly protocol = "box";
  readonly arity = fixedArity(2);
  readonly debugName = "Pair";

  performLayout(_ctx: LayoutContext, c: BoxConstraints): Size {
    return { width: c.maxWidth, height: c.maxHeight };
  }

  paint(): void {}
}

function setup(opts: Omit<RenderTreeOptions, "ids"> = {}) {
  return createRenderTree({ ids: createIdAllocator(), ...opts });
}

const placeholder = (): NodeErrorAction => "placeholder";

describe("renderTree - box layout", () => {
  test("layout is cached per constraints until marked dirty", () => {
    const tree = setup();
    const probe = new Probe();
    const id = tree.insert(probe);

    assert.deepEqual(tree.layoutBox(id, loose({ width: 50, height: 50 })), { width: 10, height: 10 });
    tree.layoutBox(id, loose({ width: 50, height: 50 }));
    assert.equal(probe.layouts, 1);

    tree.layoutBox(id, loose({ width: 60, height: 50 }));
    assert.equal(probe.layouts, 2);

    tree.markNeedsLayout(id);
    assert.equal(tree.needsLayout(id), true);
    tree.layoutBox(id, loose({ width: 60, height: 50 }));
    assert.equal(probe.layouts, 3);
    assert.equal(tree.needsLayout(id), false);
  });

  test("results are clamped into the constraints and the excess is recorded", () => {
    const tree = setup();
    const probe = new Probe();
    probe.width = 150;
    probe.height = 40;
    const id = tree.insert(probe);

    assert.deepEqual(tree.layoutBox(id, loose({ width: 100, height: 100 })), { width: 100, height: 40 });
    assert.deepEqual(tree.get(id)?.overflow, { width: 50, height: 0 });
  });

  test("NaN and infinite sizes are protocol violations", () => {
    const tree = setup();
    const probe = new Probe();
    probe.width = Number.NaN;
    const id = tree.insert(probe);
    assert.throws(() => tree.layoutBox(id, loose({ width: 10, height: 10 })), {
      code: "TRELLIS_PROTOCOL_VIOLATION",
      message: `protocol violation: Probe#${String(id)} returned a NaN size`,
    });

    probe.width = Number.POSITIVE_INFINITY;
    assert.throws(() => tree.layoutBox(id, UNCONSTRAINED), { code: "TRELLIS_PROTOCOL_VIOLATION" });
  });

  test("a box node given sliver constraints is a protocol violation", () => {
    const tree = setup();
    const id = tree.insert(new Probe());
    const c = sliverConstraints({
      axis: "vertical",
      scrollOffset: 0,
      remainingPaintExtent: 10,
      crossAxisExtent: 10,
      viewportMainAxisExtent: 10,
      precedingScrollExtent: 0,
    });
    assert.throws(() => tree.layoutSliver(id, c), {
      message: `protocol violation: Probe#${String(id)} is a box but received sliver constraints`,
    });
  });

  test("laying out the same child twice in one pass is a protocol violation", () => {
    const tree = setup();
    const parent = tree.insert(new Twice());
    const child = tree.insert(new Probe());
    tree.setChildren(parent, [child]);
    assert.throws(() => tree.layoutBox(parent, loose({ width: 10, height: 10 })), {
      code: "TRELLIS_PROTOCOL_VIOLATION",
      message: `protocol violation: Twice#${String(parent)} laid out child 0 twice in one pass`,
    });
  });

  test("a fixed-arity node with the wrong child count fails layout", () => {
    const tree = setup();
    const parent = tree.insert(new Pair());
    tree.setChildren(parent, [tree.insert(new Probe())]);
    assert.throws(
      () => tree.layoutBox(parent, loose({ width: 10, height: 10 })),
      (e: unknown) =>
        e instanceof FrameError &&
        e.reason === "arity" &&
        e.message === `Pair#${String(parent)} expects 2 children, has 1`,
    );
  });

  test("a leaf given children is a protocol violation", () => {
    const tree = setup();
    const leaf = tree.insert(new RenderSizedBox());
    const other = tree.insert(new Probe());
    assert.throws(() => tree.setChildren(leaf, [other]), {
      message: `protocol violation: SizedBox#${String(leaf)} has arity leaf but was given 1 children`,
    });
  });

  test("layout failures abort without a handler and become placeholders with one", () => {
    const aborting = setup();
    const failing = new Probe();
    failing.layoutError = new Error("no room");
    const a = aborting.insert(failing);
    assert.throws(
      () => aborting.layoutBox(a, tight({ width: 80, height: 80 })),
      (e: unknown) => e instanceof FrameError && e.phase === "layout" && e.message === "layout failed: Error: no room",
    );

    const tree = setup({ onNodeError: placeholder });
    const pad = new RenderPadding();
    pad.insets = insetsAll(10);
    const root = tree.insert(pad);
    const child = tree.insert(failing);
    tree.setChildren(root, [child]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));

    assert.deepEqual(tree.get(child)?.size, { width: 80, height: 80 });
    assert.equal(tree.get(child)?.error?.reason, "threw");
    assert.deepEqual(tree.paintRoot(root), [
      { op: "errorPlaceholder", x: 10, y: 10, width: 80, height: 80, message: "layout failed: Error: no room" },
    ]);
  });

  test("an expired deadline aborts layout even with a placeholder handler", () => {
    let cancelled = false;
    const tree = setup({ onNodeError: placeholder, isCancelled: () => cancelled });
    const id = tree.insert(new Probe());
    cancelled = true;
    assert.throws(
      () => tree.layoutBox(id, loose({ width: 10, height: 10 })),
      (e: unknown) =>
        e instanceof FrameError &&
        e.reason === "cancelled" &&
        e.message === `layout cancelled at render node ${String(id)}: frame deadline expired`,
    );
    assert.equal(tree.needsLayout(id), true);
  });
});

describe("renderTree - flushLayout", () => {
  test("only dirty nodes are laid out again", () => {
    const tree = setup();
    const probe = new Probe();
    const root = tree.insert(new RenderColoredBox());
    const child = tree.insert(probe);
    tree.setChildren(root, [child]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));
    assert.equal(probe.layouts, 1);
    assert.equal(tree.pendingLayoutCount(), 0);

    tree.markNeedsLayout(child);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));
    assert.equal(probe.layouts, 2);
    assert.equal(tree.needsLayout(root), false);
    assert.equal(tree.pendingLayoutCount(), 0);
  });

  test("a child that changes size relays its parent", () => {
    const tree = setup();
    const stackObject = new RenderStack();
    stackObject.alignment = CENTER;
    const probe = new Probe();
    const root = tree.insert(stackObject);
    const child = tree.insert(probe);
    tree.setChildren(root, [child]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));
    assert.deepEqual(tree.get(root)?.childOffsets, [{ x: 45, y: 45 }]);

    probe.width = 20;
    tree.markNeedsLayout(child);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));
    assert.deepEqual(tree.get(root)?.childOffsets, [{ x: 40, y: 45 }]);
  });

  test("flushLayout requires a root", () => {
    const tree = setup();
    const root = tree.insert(new RenderColoredBox());
    const child = tree.insert(new Probe());
    tree.setChildren(root, [child]);
    assert.throws(() => tree.flushLayout(child, tight({ width: 1, height: 1 })), {
      message: `protocol violation: flushLayout: render node ${String(child)} is not a root`,
    });
  });

  test("releasing a child detaches it from its parent", () => {
    const tree = setup();
    const root = tree.insert(new RenderStack());
    const a = tree.insert(new Probe());
    const b = tree.insert(new Probe());
    tree.setChildren(root, [a, b]);
    tree.release(a);
    assert.deepEqual(tree.get(root)?.children, [b]);
    assert.equal(tree.size(), 2);
    assert.equal(tree.needsLayout(root), true);
  });
});

describe("renderTree - paint", () => {
  test("painting a node that needs layout is a protocol violation", () => {
    const tree = setup();
    const id = tree.insert(new RenderSizedBox());
    assert.throws(() => tree.paintRoot(id), {
      message: `protocol violation: SizedBox#${String(id)} painted while it needs layout`,
    });
  });

  test("children paint at their offsets", () => {
    const tree = setup();
    const stackObject = new RenderStack();
    stackObject.alignment = CENTER;
    const sized = new RenderSizedBox();
    sized.width = 20;
    sized.height = 10;
    sized.color = 3;
    const root = tree.insert(stackObject);
    tree.setChildren(root, [tree.insert(sized)]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));
    assert.deepEqual(tree.paintRoot(root), [{ op: "rect", x: 40, y: 45, width: 20, height: 10, color: 3 }]);
  });

  test("clean subtrees replay their cached commands", () => {
    const tree = setup();
    const probe = new Probe();
    const root = tree.insert(new RenderStack());
    const child = tree.insert(probe);
    tree.setChildren(root, [child]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));

    const first = tree.paintRoot(root);
    const second = tree.paintRoot(root);
    assert.equal(probe.paints, 1);
    assert.deepEqual(second, first);

    tree.markNeedsPaint(child);
    tree.paintRoot(root);
    assert.equal(probe.paints, 2);
  });

  test("a paint failure keeps the parent's output and replaces the node's", () => {
    const tree = setup({ onNodeError: placeholder });
    const colored = new RenderColoredBox();
    colored.color = 7;
    const probe = new Probe();
    probe.paintError = new Error("ink ran out");
    const root = tree.insert(colored);
    const child = tree.insert(probe);
    tree.setChildren(root, [child]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));

    assert.deepEqual(tree.paintRoot(root), [
      { op: "rect", x: 0, y: 0, width: 100, height: 100, color: 7 },
      { op: "errorPlaceholder", x: 0, y: 0, width: 100, height: 100, message: "paint failed: Error: ink ran out" },
    ]);
    assert.equal(tree.get(child)?.error?.phase, "paint");
  });

  test("debugOverflow marks nodes whose content did not fit", () => {
    const tree = setup({ debugOverflow: true });
    const probe = new Probe();
    probe.width = 150;
    probe.height = 150;
    const id = tree.insert(probe);
    tree.flushLayout(id, tight({ width: 100, height: 100 }));
    assert.deepEqual(tree.paintRoot(id), [
      { op: "rect", x: 0, y: 0, width: 100, height: 100, color: 1 },
      { op: "overflowIndicator", x: 0, y: 0, width: 100, height: 100 },
    ]);
  });

  test("zero-sized nodes paint nothing", () => {
    const tree = setup();
    const probe = new Probe();
    probe.width = 0;
    const id = tree.insert(probe);
    tree.flushLayout(id, loose({ width: 100, height: 100 }));
    assert.deepEqual(tree.paintRoot(id), []);
    assert.equal(probe.paints, 0);
  });
});
