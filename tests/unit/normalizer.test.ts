import { describe, it } from "node:test";
import assert from "node:assert";

import { innermostContaining, normalizeMatches } from "../../src/indexer/normalizer.js";
import type { RawCall, RawDefinition } from "../../src/indexer/treesitter/types.js";

function fn(name: string, startLine: number, endLine: number, className?: string): RawDefinition {
  return className
    ? { kind: "method", name, className, startLine, endLine }
    : { kind: "function", name, startLine, endLine };
}

function call(callee: string, line: number, column = 0): RawCall {
  return { callee, expression: callee, line, column };
}

describe("normalizeMatches", () => {
  it("clamps ranges to the file", () => {
    const defs = normalizeMatches("a.py", 10, {
      definitions: [fn("whole", 0, 50)],
      calls: [],
    });
    assert.deepStrictEqual(
      defs.map((d) => [d.name, d.startLine, d.endLine]),
      [["whole", 1, 10]],
    );
  });

  it("drops exact duplicates and partial overlaps", () => {
    const defs = normalizeMatches("a.py", 20, {
      definitions: [fn("a", 1, 5), fn("a", 1, 5), fn("straddle", 3, 8), fn("b", 10, 12)],
      calls: [],
    });
    assert.deepStrictEqual(
      defs.map((d) => d.name),
      ["a", "b"],
    );
  });

  it("orders outer definitions before the ones they contain", () => {
    const defs = normalizeMatches("a.py", 20, {
      definitions: [fn("inner", 3, 4, "Outer"), { kind: "class", name: "Outer", startLine: 1, endLine: 10 }],
      calls: [],
    });
    assert.deepStrictEqual(
      defs.map((d) => [d.qualifiedName, d.kind]),
      [
        ["Outer", "class"],
        ["Outer.inner", "method"],
      ],
    );
    assert.strictEqual(defs[1].className, "Outer");
    assert.strictEqual("className" in defs[0], false);
  });

  it("attaches each call to the innermost containing definition", () => {
    const defs = normalizeMatches("svc.py", 10, {
      definitions: [
        { kind: "class", name: "Service", startLine: 1, endLine: 8 },
        fn("run", 2, 5, "Service"),
      ],
      calls: [call("later", 4, 8), call("first", 4, 2), call("inClass", 7)],
    });

    const byName = new Map(defs.map((d) => [d.qualifiedName, d]));
    assert.deepStrictEqual(
      byName.get("Service.run")?.calls.map((c) => c.callee),
      ["first", "later"],
    );
    assert.deepStrictEqual(
      byName.get("Service")?.calls.map((c) => c.callee),
      ["inClass"],
    );
  });

  it("collects calls outside every definition into a module definition", () => {
    const defs = normalizeMatches("main.py", 12, {
      definitions: [fn("main", 1, 3)],
      calls: [call("main", 12), call("setup", 5)],
    });

    assert.deepStrictEqual(defs[0], {
      kind: "module",
      name: "<module>",
      qualifiedName: "<module>",
      filePath: "main.py",
      startLine: 1,
      endLine: 12,
      calls: [
        { callee: "setup", expression: "setup", line: 5, column: 0 },
        { callee: "main", expression: "main", line: 12, column: 0 },
      ],
    });
    assert.strictEqual(defs.length, 2);
  });

  it("adds no module definition when every call is inside a definition", () => {
    const defs = normalizeMatches("a.py", 3, {
      definitions: [fn("a", 1, 3)],
      calls: [call("b", 2)],
    });
    assert.deepStrictEqual(
      defs.map((d) => d.kind),
      ["function"],
    );
  });
});

describe("innermostContaining", () => {
  it("prefers the smallest range and the later one on a tie", () => {
    const ranges = [
      { id: "outer", startLine: 1, endLine: 10 },
      { id: "first", startLine: 2, endLine: 4 },
      { id: "second", startLine: 2, endLine: 4 },
    ];
    assert.strictEqual(innermostContaining(ranges, 3)?.id, "second");
    assert.strictEqual(innermostContaining(ranges, 9)?.id, "outer");
    assert.strictEqual(innermostContaining(ranges, 11), undefined);
  });
});
