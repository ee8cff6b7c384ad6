import { describe, it } from "node:test";
import assert from "node:assert";

import { CAdapter } from "../../src/indexer/adapter/c.js";

const SOURCE = [
  "#include <stdio.h>",
  "",
  "struct point {",
  "    int x;",
  "    int y;",
  "};",
  "",
  "static int square(int v) {",
  "    return v * v;",
  "}",
  "",
  "int *make_buffer(int size) {",
  "    return malloc(size * sizeof(int));",
  "}",
  "",
  "int main(void) {",
  "    struct point p = {1, 2};",
  '    printf("%d", square(p.x));',
  "    return 0;",
  "}",
  "",
].join("\n");

describe("C adapter", () => {
  const adapter = new CAdapter();
  const matches = adapter.extractMatches(adapter.parse(SOURCE, "main.c"), SOURCE, "main.c");

  it("finds functions behind pointer declarators and struct bodies", () => {
    assert.deepStrictEqual(
      matches.definitions.map((d) => [d.kind, d.name, d.startLine, d.endLine]),
      [
        ["class", "point", 3, 6],
        ["function", "square", 8, 10],
        ["function", "make_buffer", 12, 14],
        ["function", "main", 16, 20],
      ],
    );
  });

  it("records direct calls but not sizeof", () => {
    assert.deepStrictEqual(
      matches.calls
        .slice()
        .sort((a, b) => a.line - b.line || a.column - b.column)
        .map((c) => [c.line, c.callee]),
      [
        [13, "malloc"],
        [18, "printf"],
        [18, "square"],
      ],
    );
  });

  it("lists included headers without delimiters", () => {
    assert.deepStrictEqual(matches.imports, ["stdio.h"]);

    const source = ['#include "util/point.h"', "#include <stdlib.h>", "", "int f(void) { return 0; }", ""].join(
      "\n",
    );
    const other = adapter.extractMatches(adapter.parse(source, "f.c"), source, "f.c");
    assert.deepStrictEqual(other.imports, ["util/point.h", "stdlib.h"]);
  });
});
