import { describe, it } from "node:test";
import assert from "node:assert";

import {
  buildChildrenMap,
  callStackErrorToMessage,
  resolveCallStack,
} from "../../src/graph/callStack.js";
import type { CallStackResult, CallStackTree } from "../../src/graph/callStack.js";
import { ValidationError } from "../../src/model/errors.js";
import { buildModel, sampleCallGraph } from "../harness/model-builder.js";

const callStackModel = sampleCallGraph();

function treeOf(result: CallStackResult): CallStackTree {
  assert.ok(result.ok, "expected a call stack");
  return result.tree;
}

function summarize(tree: CallStackTree): string[] {
  return tree.entries.map(
    (e) =>
      `${e.id}<${e.parentId ?? "-"} d${e.depth} ${e.definition ? `${e.definition.filePath}:${e.definition.qualifiedName}` : e.calleeName} ${e.status} x${e.candidateCount}`,
  );
}

describe("resolveCallStack", () => {
  it("expands breadth-first from the enclosing definition", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 3, 5));

    assert.deepStrictEqual(summarize(tree), [
      "0<- d0 main.py:main expanded x1",
      "1<0 d1 main.py:setup expanded x1",
      "2<0 d1 main.py:run expanded x1",
      "3<0 d1 missing unresolved x0",
      "4<1 d2 lib.py:helper expanded x2",
      "5<1 d2 main.py:helper expanded x2",
      "6<2 d2 main.py:run cyclic x1",
      "7<4 d3 lib.py:leaf expanded x1",
    ]);
    assert.strictEqual(tree.truncated, false);
    assert.strictEqual(tree.maxDepth, 5);
    assert.strictEqual(tree.root, tree.entries[0]);
  });

  it("keeps the call site that led to each entry", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 1, 5));
    assert.strictEqual(tree.root.callSite, null);
    assert.deepStrictEqual(tree.entries[2].callSite, {
      callee: "run",
      expression: "run",
      line: 3,
      column: 4,
    });
    assert.strictEqual(tree.entries[6].callSite?.line, 12);
  });

  it("stops at the depth bound but still reports cycles", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 2, 2));

    assert.deepStrictEqual(summarize(tree), [
      "0<- d0 main.py:main expanded x1",
      "1<0 d1 main.py:setup expanded x1",
      "2<0 d1 main.py:run expanded x1",
      "3<0 d1 missing unresolved x0",
      "4<1 d2 lib.py:helper depth_limit x2",
      "5<1 d2 main.py:helper depth_limit x2",
      "6<2 d2 main.py:run cyclic x1",
    ]);
  });

  it("returns only the root at depth zero", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 8, 0));
    assert.deepStrictEqual(summarize(tree), ["0<- d0 main.py:setup depth_limit x1"]);
  });

  it("marks queued frames when the node cap is hit", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 3, 5, { maxNodes: 4 }));

    assert.strictEqual(tree.truncated, true);
    assert.deepStrictEqual(summarize(tree), [
      "0<- d0 main.py:main expanded x1",
      "1<0 d1 main.py:setup truncated x1",
      "2<0 d1 main.py:run truncated x1",
      "3<0 d1 missing unresolved x0",
    ]);
  });

  it("marks a frame the node cap cut off partway through its calls", () => {
    const model = buildModel({
      "app.py": {
        definitions: [
          { name: "main", start: 1, end: 5, calls: ["a", "b", "c"] },
          { name: "a", start: 7, end: 8 },
          { name: "b", start: 10, end: 11 },
          { name: "c", start: 13, end: 14 },
        ],
      },
    });
    const tree = treeOf(resolveCallStack(model, "app.py", 1, 3, { maxNodes: 3 }));

    assert.strictEqual(tree.truncated, true);
    assert.deepStrictEqual(summarize(tree), [
      "0<- d0 app.py:main truncated x1",
      "1<0 d1 app.py:a truncated x1",
      "2<0 d1 app.py:b truncated x1",
    ]);
  });

  it("does not resolve across languages", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 3, 1));
    assert.deepStrictEqual(
      tree.entries.filter((e) => e.calleeName === "setup").map((e) => e.definition?.filePath),
      ["main.py"],
    );
  });

  it("reports a line that no definition encloses", () => {
    const result = resolveCallStack(callStackModel, "./main.py", 6, 3);
    assert.deepStrictEqual(result, {
      ok: false,
      error: { type: "no_enclosing_definition", filePath: "main.py", line: 6 },
    });
    assert.ok(!result.ok);
    assert.strictEqual(callStackErrorToMessage(result.error), "No definition encloses main.py:6");

    assert.strictEqual(resolveCallStack(callStackModel, "nope.py", 1, 3).ok, false);
  });

  it("reports inherited object member names as unknown files", () => {
    assert.deepStrictEqual(resolveCallStack(callStackModel, "constructor", 1, 2), {
      ok: false,
      error: { type: "no_enclosing_definition", filePath: "constructor", line: 1 },
    });
    assert.strictEqual(resolveCallStack(callStackModel, "toString", 1, 2).ok, false);
  });

  it("starts from the module scope for top-level lines", () => {
    const model = buildModel({
      "app.py": {
        lineCount: 10,
        definitions: [
          { name: "<module>", kind: "module", start: 1, end: 10, calls: ["main"] },
          { name: "main", start: 4, end: 6 },
        ],
      },
    });
    const tree = treeOf(resolveCallStack(model, "app.py", 9, 3));
    assert.deepStrictEqual(summarize(tree), [
      "0<- d0 app.py:<module> expanded x1",
      "1<0 d1 app.py:main expanded x1",
    ]);
  });

  it("rejects depths outside 0..64", () => {
    for (const depth of [-1, 65, 1.5]) {
      assert.throws(
        () => resolveCallStack(callStackModel, "main.py", 3, depth),
        ValidationError,
      );
    }
    assert.throws(
      () => resolveCallStack(callStackModel, "main.py", 3, 2, { maxNodes: 0 }),
      ValidationError,
    );
  });
});

describe("buildChildrenMap", () => {
  it("groups entries under their parents in order", () => {
    const tree = treeOf(resolveCallStack(callStackModel, "main.py", 3, 5));
    const children = buildChildrenMap(tree);
    assert.deepStrictEqual(
      children.get(0)?.map((e) => e.id),
      [1, 2, 3],
    );
    assert.deepStrictEqual(
      children.get(1)?.map((e) => e.id),
      [4, 5],
    );
    assert.strictEqual(children.has(3), false);
  });
});
