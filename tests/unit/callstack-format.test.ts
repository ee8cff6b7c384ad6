import { describe, it } from "node:test";
import assert from "node:assert";

import { resolveCallStack } from "../../src/graph/callStack.js";
import type { CallStackTree } from "../../src/graph/callStack.js";
import { formatCallStack, toCallStackJson } from "../../src/graph/format.js";
import { sampleCallGraph } from "../harness/model-builder.js";

const model = sampleCallGraph();

function tree(maxDepth: number, maxNodes?: number): CallStackTree {
  const result = resolveCallStack(model, "main.py", 3, maxDepth, { maxNodes });
  assert.ok(result.ok);
  return result.tree;
}

describe("formatCallStack", () => {
  it("indents two spaces per level and marks statuses", () => {
    assert.strictEqual(
      formatCallStack(tree(2)),
      [
        "main (main.py:1-5)",
        "  setup (main.py:7-9) via setup at line 2",
        "    helper (lib.py:1-3) via helper at line 8 [depth limit] [ambiguous: 2 candidates]",
        "    helper (main.py:15-17) via helper at line 8 [depth limit] [ambiguous: 2 candidates]",
        "  run (main.py:11-13) via run at line 3",
        "    run (main.py:11-13) via run at line 12 [cyclic]",
        "  missing via missing at line 4 [unresolved]",
      ].join("\n"),
    );
  });

  it("ends a truncated tree with a note", () => {
    assert.strictEqual(
      formatCallStack(tree(5, 4)),
      [
        "main (main.py:1-5)",
        "  setup (main.py:7-9) via setup at line 2 [truncated]",
        "  run (main.py:11-13) via run at line 3 [truncated]",
        "  missing via missing at line 4 [unresolved]",
        "... truncated at 4 entries",
      ].join("\n"),
    );
  });

  it("prints the nested JSON form", () => {
    const t = tree(1);
    assert.deepStrictEqual(JSON.parse(formatCallStack(t, "json")), toCallStackJson(t));
  });
});

describe("toCallStackJson", () => {
  it("nests children and nulls out unresolved definitions", () => {
    const json = toCallStackJson(tree(1));

    assert.strictEqual(json.maxDepth, 1);
    assert.strictEqual(json.truncated, false);
    assert.strictEqual(json.root.qualifiedName, "main");
    assert.strictEqual(json.root.callSite, null);
    assert.deepStrictEqual(
      json.root.children.map((c) => [c.name, c.status]),
      [
        ["setup", "depth_limit"],
        ["run", "depth_limit"],
        ["missing", "unresolved"],
      ],
    );
    assert.deepStrictEqual(json.root.children[2], {
      name: "missing",
      qualifiedName: null,
      filePath: null,
      startLine: null,
      endLine: null,
      status: "unresolved",
      depth: 1,
      candidateCount: 0,
      callSite: { callee: "missing", expression: "missing", line: 4, column: 4 },
      children: [],
    });
  });
});
