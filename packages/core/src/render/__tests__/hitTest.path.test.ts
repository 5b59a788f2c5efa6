import { assert, describe, test } from "@trellis-ui/testkit";
import { createIdAllocator } from "../../runtime/identity.js";
import { createTestPipeline } from "../../testing/harness.js";
import { tight } from "../boxConstraints.js";
import { RenderPadding, RenderSizedBox, RenderStack, insetsAll, sizedBox, stack } from "../objects/box.js";
import { type RenderTree, createRenderTree } from "../renderTree.js";
import type { Offset } from "../types.js";

class TransparentStack extends RenderStack {
  hitTestSelf(_local: Offset): boolean {
    return false;
  }
}

function sized(width: number, height: number): RenderSizedBox {
  const o = new RenderSizedBox();
  o.width = width;
  o.height = height;
  return o;
}

function stackTree(root: RenderStack): { tree: RenderTree; root: number; big: number; small: number } {
  const tree = createRenderTree({ ids: createIdAllocator() });
  const rootId = tree.insert(root);
  const big = tree.insert(sized(50, 50));
  const small = tree.insert(sized(30, 30));
  tree.setChildren(rootId, [big, small]);
  tree.flushLayout(rootId, tight({ width: 100, height: 100 }));
  return { tree, root: rootId, big, small };
}

describe("hit testing", () => {
  test("the path runs from the deepest hit to the root", () => {
    const { tree, root, small } = stackTree(new RenderStack());
    assert.deepEqual(tree.hitTest(root, { x: 10, y: 10 }), [
      { id: small, local: { x: 10, y: 10 } },
      { id: root, local: { x: 10, y: 10 } },
    ]);
  });

  test("later siblings win and misses fall through to earlier ones", () => {
    const { tree, root, big } = stackTree(new RenderStack());
    assert.deepEqual(
      tree.hitTest(root, { x: 40, y: 40 }).map((e) => e.id),
      [big, root],
    );
    assert.deepEqual(
      tree.hitTest(root, { x: 70, y: 70 }).map((e) => e.id),
      [root],
    );
    assert.deepEqual(tree.hitTest(root, { x: 100, y: 5 }), []);
  });

  test("a node can decline hits on itself", () => {
    const { tree, root, small } = stackTree(new TransparentStack());
    assert.deepEqual(tree.hitTest(root, { x: 70, y: 70 }), []);
    assert.deepEqual(
      tree.hitTest(root, { x: 5, y: 5 }).map((e) => e.id),
      [small, root],
    );
  });

  test("local coordinates subtract child offsets", () => {
    const tree = createRenderTree({ ids: createIdAllocator() });
    const pad = new RenderPadding();
    pad.insets = insetsAll(10);
    const root = tree.insert(pad);
    const child = tree.insert(new RenderSizedBox());
    tree.setChildren(root, [child]);
    tree.flushLayout(root, tight({ width: 100, height: 100 }));
    assert.deepEqual(tree.hitTest(root, { x: 15, y: 20 }), [
      { id: child, local: { x: 5, y: 10 } },
      { id: root, local: { x: 15, y: 20 } },
    ]);
  });

  test("nodes waiting for layout are not hit", () => {
    const tree = createRenderTree({ ids: createIdAllocator() });
    const root = tree.insert(new RenderStack());
    assert.deepEqual(tree.hitTest(root, { x: 1, y: 1 }), []);
  });

  test("the pipeline resolves hits against the last laid-out frame", () => {
    const p = createTestPipeline();
    assert.deepEqual(p.hitTest(1, 1), []);
    p.attach(stack([sizedBox({ width: 10, height: 10 })]));
    p.frame();
    const rootId = p.pipeline.inspect().rootRenderId;
    assert.equal(p.hitTest(5, 5).length, 2);
    assert.equal(p.hitTest(50, 50)[0]?.id, rootId);
  });
});
