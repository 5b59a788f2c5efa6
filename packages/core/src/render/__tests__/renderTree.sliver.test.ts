import { assert, describe, test } from "@trellis-ui/testkit";
import { type TestPipeline, createTestPipeline } from "../../testing/harness.js";
import { sizedBox } from "../objects/box.js";
import {
  RenderViewport,
  sliverExtent,
  sliverFixedExtentList,
  sliverGroup,
  sliverToBoxAdapter,
  viewport,
} from "../objects/sliver.js";
import type { RenderNodeView } from "../renderTree.js";

function renderNode(p: TestPipeline, id: number | null | undefined): RenderNodeView {
  const node = id === null || id === undefined ? undefined : p.pipeline.renderTree.get(id);
  if (node === undefined) throw new Error(`render node ${String(id)} not found`);
  return node;
}

function rootNode(p: TestPipeline): RenderNodeView {
  return renderNode(p, p.pipeline.inspect().rootRenderId);
}

function maxScrollExtent(p: TestPipeline): number {
  const object = rootNode(p).object;
  if (!(object instanceof RenderViewport)) throw new Error("root is not a viewport");
  return object.maxScrollExtent;
}

const threeExtents = () => [
  sliverExtent({ extent: 50, color: 1 }),
  sliverExtent({ extent: 200, color: 2 }),
  sliverExtent({ extent: 400, color: 3 }),
];

describe("slivers - viewport layout", () => {
  test("each sliver sees the scroll offset left by the ones before it", () => {
    const p = createTestPipeline({ width: 300, height: 600 });
    p.attach(viewport({ scrollOffset: 100 }, threeExtents()));
    assert.equal(p.frame().outcome, "painted");

    const root = rootNode(p);
    const paintExtents = root.children.map((id) => renderNode(p, id).geometry?.paintExtent);
    assert.deepEqual(paintExtents, [0, 150, 400]);
    assert.deepEqual(root.childOffsets, [
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 0, y: 150 },
    ]);
    assert.equal(maxScrollExtent(p), 50);
    assert.deepEqual(p.displayList(), [
      { op: "pushClip", x: 0, y: 0, width: 300, height: 600 },
      { op: "rect", x: 0, y: 0, width: 300, height: 150, color: 2 },
      { op: "rect", x: 0, y: 150, width: 300, height: 400, color: 3 },
      { op: "popClip" },
    ]);
  });

  test("a group lays its slivers out as one", () => {
    const p = createTestPipeline({ width: 300, height: 600 });
    p.attach(viewport({ scrollOffset: 100 }, [sliverGroup(threeExtents())]));
    p.frame();

    const group = renderNode(p, rootNode(p).children[0]);
    assert.equal(group.geometry?.scrollExtent, 650);
    assert.equal(group.geometry?.paintExtent, 550);
    assert.equal(group.geometry?.maxPaintExtent, 650);
    assert.deepEqual(p.commands("rect"), [
      { op: "rect", x: 0, y: 0, width: 300, height: 150, color: 2 },
      { op: "rect", x: 0, y: 150, width: 300, height: 400, color: 3 },
    ]);
  });

  test("layout stops once the remaining paint extent is used up", () => {
    const p = createTestPipeline({ width: 100, height: 500 });
    p.attach(
      viewport({}, [
        sliverExtent({ extent: 300, color: 1 }),
        sliverExtent({ extent: 300, color: 2 }),
        sliverExtent({ extent: 300, color: 3 }),
      ]),
    );
    p.frame();

    const root = rootNode(p);
    assert.equal(renderNode(p, root.children[2]).geometry, null);
    assert.equal(maxScrollExtent(p), 100);
    assert.deepEqual(p.displayList(), [
      { op: "pushClip", x: 0, y: 0, width: 100, height: 500 },
      { op: "rect", x: 0, y: 0, width: 100, height: 300, color: 1 },
      { op: "rect", x: 0, y: 300, width: 100, height: 200, color: 2 },
      { op: "popClip" },
    ]);
  });

  test("a viewport with no main-axis extent lays out none of its slivers", () => {
    const p = createTestPipeline({ width: 100, height: 0 });
    p.attach(viewport({}, [sliverExtent({ extent: 300, color: 1 })]));
    assert.equal(p.frame().outcome, "painted");

    assert.equal(renderNode(p, rootNode(p).children[0]).geometry, null);
    assert.equal(maxScrollExtent(p), 0);
    assert.deepEqual(p.displayList(), [
      { op: "pushClip", x: 0, y: 0, width: 100, height: 0 },
      { op: "popClip" },
    ]);
  });

  test("horizontal viewports lay out along x", () => {
    const p = createTestPipeline({ width: 600, height: 300 });
    p.attach(viewport({ axis: "horizontal", scrollOffset: 100 }, threeExtents()));
    p.frame();
    assert.deepEqual(p.displayList(), [
      { op: "pushClip", x: 0, y: 0, width: 600, height: 300 },
      { op: "rect", x: 0, y: 0, width: 150, height: 300, color: 2 },
      { op: "rect", x: 150, y: 0, width: 400, height: 300, color: 3 },
      { op: "popClip" },
    ]);
  });

  test("a sliver root is rejected", () => {
    const p = createTestPipeline();
    p.attach(sliverExtent({ extent: 10 }));
    assert.throws(() => p.frame(), {
      code: "TRELLIS_PROTOCOL_VIOLATION",
      message: "protocol violation: root render node SliverExtent#1 must use the box protocol",
    });
  });
});

describe("slivers - fixed extent list", () => {
  const items = (n: number) => Array.from({ length: n }, (_, i) => sizedBox({ color: i }));

  test("only items inside the visible window are laid out", () => {
    const p = createTestPipeline({ width: 50, height: 30 });
    p.attach(viewport({ scrollOffset: 25 }, [sliverFixedExtentList({ itemExtent: 10 }, items(100))]));
    p.frame();

    assert.deepEqual(p.displayList(), [
      { op: "pushClip", x: 0, y: 0, width: 50, height: 30 },
      { op: "pushClip", x: 0, y: 0, width: 50, height: 30 },
      { op: "rect", x: 0, y: -5, width: 50, height: 10, color: 2 },
      { op: "rect", x: 0, y: 5, width: 50, height: 10, color: 3 },
      { op: "rect", x: 0, y: 15, width: 50, height: 10, color: 4 },
      { op: "rect", x: 0, y: 25, width: 50, height: 10, color: 5 },
      { op: "popClip" },
      { op: "popClip" },
    ]);

    const list = renderNode(p, rootNode(p).children[0]);
    assert.equal(list.geometry?.scrollExtent, 1000);
    assert.equal(renderNode(p, list.children[0]).size, null);
    assert.equal(renderNode(p, list.children[6]).size, null);
    assert.equal(maxScrollExtent(p), 970);
  });

  test("culled items do not keep the pipeline busy", () => {
    const p = createTestPipeline({ width: 50, height: 30 });
    p.attach(viewport({}, [sliverFixedExtentList({ itemExtent: 10 }, items(20))]));
    p.frame();
    assert.equal(p.pipeline.inspect().pendingLayout, 0);
    assert.equal(p.frame().outcome, "idle");
  });

  test("scrolling lays out newly visible items", () => {
    const p = createTestPipeline({ width: 50, height: 30 });
    p.attach(viewport({}, [sliverFixedExtentList({ itemExtent: 10 }, items(20))]));
    p.frame();
    assert.deepEqual(
      p.commands("rect").map((r) => r.color),
      [0, 1, 2],
    );

    p.attach(viewport({ scrollOffset: 25 }, [sliverFixedExtentList({ itemExtent: 10 }, items(20))]));
    assert.equal(p.frame().outcome, "painted");
    assert.deepEqual(
      p.commands("rect").map((r) => [r.y, r.color]),
      [
        [-5, 2],
        [5, 3],
        [15, 4],
        [25, 5],
      ],
    );
  });
});

describe("slivers - box adapter", () => {
  test("the box child scrolls with the sliver and is clipped to its visible part", () => {
    const p = createTestPipeline({ width: 100, height: 50 });
    p.attach(
      viewport({ scrollOffset: 10 }, [
        sliverToBoxAdapter(sizedBox({ height: 30, color: 1 })),
        sliverExtent({ extent: 100, color: 2 }),
      ]),
    );
    p.frame();
    assert.deepEqual(p.displayList(), [
      { op: "pushClip", x: 0, y: 0, width: 100, height: 50 },
      { op: "pushClip", x: 0, y: 0, width: 100, height: 20 },
      { op: "rect", x: 0, y: -10, width: 100, height: 30, color: 1 },
      { op: "popClip" },
      { op: "rect", x: 0, y: 20, width: 100, height: 30, color: 2 },
      { op: "popClip" },
    ]);
  });
});
