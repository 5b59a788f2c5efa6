import { assert, describe, test } from "@trellis-ui/testkit";
import { FrameError } from "../../errors.js";
import { RenderErrorBox, errorBox, sizedBox, stack } from "../../render/objects/box.js";
import { createRenderTree } from "../../render/renderTree.js";
import { type BuildOwnerOptions, createBuildOwner } from "../buildOwner.js";
import { createIdAllocator } from "../identity.js";
import { type BuildContext, defineComponent } from "../view.js";

function setup(extra: Pick<BuildOwnerOptions, "onBuildError"> = {}) {
  const ids = createIdAllocator();
  const renderTree = createRenderTree({ ids });
  const owner = createBuildOwner({ ids, renderTree, ...extra });
  return { owner, tree: owner.tree, renderTree };
}

function contexts() {
  const byName = new Map<string, BuildContext>();
  return {
    set: (name: string, ctx: BuildContext) => byName.set(name, ctx),
    get: (name: string): BuildContext => {
      const ctx = byName.get(name);
      if (ctx === undefined) throw new Error(`${name} has not built yet`);
      return ctx;
    },
  };
}

describe("buildOwner - build scopes", () => {
  test("rebuilds parents before children and each element once", () => {
    const log: string[] = [];
    const ctxs = contexts();
    const Child = defineComponent<{ n: number }>("Child", (_p, ctx) => {
      log.push("child");
      ctxs.set("child", ctx);
      return null;
    });
    const Parent = defineComponent<Record<string, never>>("Parent", (_p, ctx) => {
      log.push("parent");
      ctxs.set("parent", ctx);
      return Child({ n: 1 });
    });

    const { owner, tree } = setup();
    tree.mount(Parent({}), null, 0);
    assert.deepEqual(owner.buildScope(), { rebuilt: 2, failed: [], carried: 0 });
    assert.deepEqual(log, ["parent", "child"]);

    log.length = 0;
    ctxs.get("child").markNeedsBuild();
    ctxs.get("parent").markNeedsBuild();
    assert.deepEqual(owner.buildScope(), { rebuilt: 2, failed: [], carried: 0 });
    assert.deepEqual(log, ["parent", "child"]);
    assert.equal(owner.hasDirtyElements(), false);
  });

  test("an element re-dirtied after its rebuild is carried to the next scope", () => {
    const ctxs = contexts();
    let poked = false;
    const Child = defineComponent<Record<string, never>>("Child", () => {
      if (!poked) {
        poked = true;
        ctxs.get("parent").markNeedsBuild();
      }
      return null;
    });
    const Parent = defineComponent<Record<string, never>>("Parent", (_p, ctx) => {
      ctxs.set("parent", ctx);
      return Child({});
    });

    const { owner, tree } = setup();
    tree.mount(Parent({}), null, 0);
    assert.deepEqual(owner.buildScope(), { rebuilt: 2, failed: [], carried: 1 });
    assert.equal(owner.dirtyCount(), 1);
    assert.deepEqual(owner.buildScope(), { rebuilt: 2, failed: [], carried: 0 });
    assert.equal(owner.dirtyCount(), 0);
  });

  test("an element that dirties itself while building is a build cycle", () => {
    const Loop = defineComponent<Record<string, never>>("Loop", (_p, ctx) => {
      const [n, setN] = ctx.hooks.useState(0);
      setN(n + 1);
      return null;
    });
    const { owner, tree } = setup();
    tree.mount(Loop({}), null, 0);
    assert.throws(() => owner.buildScope(), { code: "TRELLIS_BUILD_CYCLE" });
  });

  test("a failed build without a handler throws and leaves the element dirty", () => {
    const Broken = defineComponent<Record<string, never>>("Broken", () => {
      throw new Error("boom");
    });
    const { owner, tree } = setup();
    const id = tree.mount(Broken({}), null, 0);
    assert.throws(
      () => owner.buildScope(),
      (e: unknown) =>
        e instanceof FrameError &&
        e.phase === "build" &&
        e.nodeId === id &&
        e.reason === "threw" &&
        e.message === "build failed: Error: boom",
    );
    assert.equal(tree.get(id)?.dirty, true);
    assert.equal(tree.get(id)?.lastError?.message, "build failed: Error: boom");
  });

  test("a handler returning null keeps the element dirty for the next scope", () => {
    let attempts = 0;
    let failing = true;
    const seen: string[] = [];
    const Flaky = defineComponent<Record<string, never>>("Flaky", () => {
      attempts++;
      if (failing) throw new Error("not yet");
      return sizedBox();
    });
    const { owner, tree } = setup({
      onBuildError: (id, err) => {
        seen.push(`${String(id)}:${err.message}`);
        return null;
      },
    });
    const id = tree.mount(Flaky({}), null, 0);

    assert.deepEqual(owner.buildScope(), { rebuilt: 0, failed: [id], carried: 0 });
    assert.deepEqual(seen, [`${String(id)}:build failed: Error: not yet`]);
    assert.equal(tree.get(id)?.dirty, true);

    failing = false;
    assert.deepEqual(owner.buildScope(), { rebuilt: 2, failed: [], carried: 0 });
    assert.equal(attempts, 2);
    assert.equal(tree.get(id)?.lastError, null);
    assert.equal(tree.get(id)?.children.length, 1);
  });

  test("a replacement view from the handler becomes the child", () => {
    const Broken = defineComponent<Record<string, never>>("Broken", () => {
      throw new Error("boom");
    });
    const { owner, tree } = setup({ onBuildError: (_id, err) => errorBox(err.message) });
    const id = tree.mount(Broken({}), null, 0);

    assert.deepEqual(owner.buildScope(), { rebuilt: 2, failed: [], carried: 0 });
    const child = tree.get(tree.get(id)?.children[0] ?? -1);
    assert.equal(child?.view.type, RenderErrorBox);
    assert.equal(tree.get(id)?.dirty, false);
    assert.equal(tree.get(id)?.lastError?.message, "build failed: Error: boom");
  });

  test("duplicate sibling keys fail the parent's build", () => {
    const Dup = defineComponent<Record<string, never>>("Dup", () =>
      stack([sizedBox({ key: "a" }), sizedBox({ key: "a" })]),
    );
    const { owner, tree } = setup();
    tree.mount(Dup({}), null, 0);
    assert.throws(
      () => owner.buildScope(),
      (e: unknown) => e instanceof FrameError && e.reason === "duplicateKey" && e.phase === "build",
    );
  });

  test("children dropped by a rebuild are unmounted with their render nodes", () => {
    const setters: ((v: boolean) => void)[] = [];
    const Toggle = defineComponent<Record<string, never>>("Toggle", (_p, ctx) => {
      const [show, setShow] = ctx.hooks.useState(true);
      setters.push(setShow);
      return show ? sizedBox() : null;
    });
    const { owner, tree, renderTree } = setup();
    const id = tree.mount(Toggle({}), null, 0);
    owner.buildScope();
    assert.equal(tree.size(), 2);
    assert.equal(renderTree.size(), 1);

    setters[0]?.(false);
    owner.buildScope();
    assert.equal(tree.size(), 1);
    assert.equal(renderTree.size(), 0);
    assert.deepEqual(tree.get(id)?.children, []);
  });

  test("buildScope is not re-entrant", () => {
    const { owner, tree } = setup();
    const Nested = defineComponent<Record<string, never>>("Nested", () => {
      owner.buildScope();
      return null;
    });
    tree.mount(Nested({}), null, 0);
    assert.throws(() => owner.buildScope(), { code: "TRELLIS_REENTRANT_CALL" });
    assert.equal(owner.isBuilding(), false);
  });
});
