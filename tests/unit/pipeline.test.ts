import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import { relative } from "node:path";
import { fileURLToPath } from "node:url";
import type { Tree } from "tree-sitter";

import { generate, resolveConcurrency } from "../../src/indexer/pipeline.js";
import type { GenerateProgress } from "../../src/indexer/pipeline.js";
import { registerAdapter, resetRegistry } from "../../src/indexer/adapter/registry.js";
import type { LanguageAdapter } from "../../src/indexer/adapter/LanguageAdapter.js";
import { FileWorkerPool, WorkerCrashError } from "../../src/indexer/workerPool.js";
import { ResourceExhaustedError, isResourceExhaustion } from "../../src/model/errors.js";
import type { SourceFile } from "../../src/model/types.js";

const FILES: SourceFile[] = [
  { path: "src/b.py", content: "def b():\n    pass\n" },
  { path: "src/a.py", content: "from b import b\n\ndef a():\n    b()\n" },
  { path: "README.md", content: "# readme\n" },
  { path: "./src/b.py", content: "" },
  { path: "broken.py", content: "def broken(:\n" },
];

const STUB_WORKER = fileURLToPath(
  new URL("../fixtures/workers/stub-worker.mjs", import.meta.url),
);

const THREE_FILES: SourceFile[] = [
  { path: "one.py", content: "def one():\n    two()\n" },
  { path: "two.py", content: "def two():\n    pass\n" },
  { path: "three.py", content: "def three():\n    pass\n" },
];

function throwingAdapter(error: Error): LanguageAdapter {
  return {
    languageId: "boom",
    fileExtensions: [".boom"],
    parse: (): Tree => {
      throw error;
    },
    extractMatches: () => ({ definitions: [], calls: [], imports: [] }),
  };
}

describe("resolveConcurrency", () => {
  it("stays between one and the file count", () => {
    assert.strictEqual(resolveConcurrency(undefined, 0), 1);
    assert.strictEqual(resolveConcurrency(4, 10), 4);
    assert.strictEqual(resolveConcurrency(8, 3), 3);
    assert.strictEqual(resolveConcurrency(0, 5), 1);
    assert.strictEqual(resolveConcurrency(100, 200), 32);
  });
});

describe("generate", () => {
  afterEach(() => {
    resetRegistry();
  });

  it("indexes supported files and reports the rest as failures", async () => {
    const result = await generate(FILES, { concurrency: 2 });

    assert.strictEqual(result.cancelled, false);
    assert.deepStrictEqual(Object.keys(result.model.files), ["src/a.py", "src/b.py"]);
    assert.deepStrictEqual(result.failures, [
      {
        path: "README.md",
        kind: "UnsupportedLanguage",
        message: "No adapter for extension: .md",
      },
      {
        path: "broken.py",
        kind: "ParseFailure",
        message: "Syntax error near line 1",
        line: 1,
      },
      { path: "src/b.py", kind: "ParseFailure", message: "duplicate path" },
    ]);

    const { durationMs, ...counts } = result.stats;
    assert.ok(durationMs >= 0);
    assert.deepStrictEqual(counts, {
      filesTotal: 5,
      filesIndexed: 2,
      filesUnsupported: 1,
      filesFailed: 2,
      filesCancelled: 0,
      definitions: 2,
    });

    const a = result.model.files["src/a.py"];
    assert.deepStrictEqual(a.definitions[0].calls, [
      { callee: "b", expression: "b", line: 4, column: 4 },
    ]);
  });

  it("freezes the model", async () => {
    const result = await generate(THREE_FILES);
    const file = result.model.files["one.py"];

    assert.ok(Object.isFrozen(result.model));
    assert.ok(Object.isFrozen(result.model.files));
    assert.ok(Object.isFrozen(file));
    assert.ok(Object.isFrozen(file.definitions[0]));
    assert.ok(Object.isFrozen(file.definitions[0].calls[0]));
  });

  it("builds the same model whatever the concurrency", async () => {
    const serial = await generate(THREE_FILES, { concurrency: 1 });
    const parallel = await generate([...THREE_FILES].reverse(), { concurrency: 3 });
    assert.deepStrictEqual(parallel.model, serial.model);
  });

  it("reports progress once per dispatched file", async () => {
    const progress: GenerateProgress[] = [];
    await generate(THREE_FILES, {
      concurrency: 1,
      onProgress: (p) => progress.push(p),
    });
    assert.deepStrictEqual(progress, [
      { current: 1, total: 3, path: "one.py" },
      { current: 2, total: 3, path: "two.py" },
      { current: 3, total: 3, path: "three.py" },
    ]);
  });

  it("dispatches nothing when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await generate(THREE_FILES, { signal: controller.signal });

    assert.strictEqual(result.cancelled, true);
    assert.deepStrictEqual(result.model.files, {});
    assert.strictEqual(result.stats.filesCancelled, 3);
    assert.deepStrictEqual(
      result.failures.map((f) => [f.path, f.kind]),
      [
        ["one.py", "Cancelled"],
        ["three.py", "Cancelled"],
        ["two.py", "Cancelled"],
      ],
    );
  });

  it("keeps finished files when aborted midway", async () => {
    const controller = new AbortController();
    const result = await generate(THREE_FILES, {
      concurrency: 1,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    assert.strictEqual(result.cancelled, true);
    assert.deepStrictEqual(Object.keys(result.model.files), ["one.py"]);
    assert.deepStrictEqual(result.failures, [
      {
        path: "three.py",
        kind: "Cancelled",
        message: "generation cancelled before this file was dispatched",
      },
      {
        path: "two.py",
        kind: "Cancelled",
        message: "generation cancelled before this file was dispatched",
      },
    ]);
  });

  it("records a failing adapter as a parse failure of that file", async () => {
    registerAdapter(".boom", "boom", () => throwingAdapter(new Error("grammar exploded")));

    const result = await generate([...THREE_FILES, { path: "x.boom", content: "x" }]);

    assert.strictEqual(result.stats.filesIndexed, 3);
    assert.deepStrictEqual(result.failures, [
      { path: "x.boom", kind: "ParseFailure", message: "grammar exploded" },
    ]);
  });

  it("aborts the whole run on resource exhaustion", async () => {
    registerAdapter(".boom", "boom", () =>
      throwingAdapter(new ResourceExhaustedError("parser out of memory")),
    );

    await assert.rejects(
      generate([...THREE_FILES, { path: "x.boom", content: "x" }], { concurrency: 2 }),
      (error: unknown) =>
        error instanceof ResourceExhaustedError && error.message === "parser out of memory",
    );
  });
});

describe("FileWorkerPool", () => {
  it("refuses to start without the compiled worker", () => {
    assert.throws(
      () => new FileWorkerPool(2, "/nonexistent/callmap/worker.js"),
      (error: unknown) =>
        error instanceof ResourceExhaustedError &&
        error.message ===
          "Worker pool cannot start: /nonexistent/callmap/worker.js not found (run the build first)",
    );
  });

  it("treats a worker reporting exhaustion as fatal", () => {
    assert.strictEqual(isResourceExhaustion(new WorkerCrashError("boom", "RESOURCE_EXHAUSTED")), true);
    assert.strictEqual(isResourceExhaustion(new WorkerCrashError("boom", "PARSE_FAILURE")), false);
  });

  it("runs tasks, replaces a crashed worker and refuses work after shutdown", async () => {
    const pool = new FileWorkerPool(1, STUB_WORKER);
    const results = await Promise.allSettled([
      pool.run({ path: "a.py", content: "x" }),
      pool.run({ path: "crash.py", content: "x" }),
      pool.run({ path: "b.py", content: "x" }),
    ]);
    await pool.shutdown();

    assert.deepStrictEqual(
      results.map((r) =>
        r.status === "fulfilled"
          ? r.value.ok && r.value.path
          : r.reason instanceof WorkerCrashError && r.reason.message,
      ),
      ["a.py", "Worker 0 exited with code 3", "b.py"],
    );
    await assert.rejects(pool.run({ path: "c.py", content: "x" }), /Worker pool is shut down/);
  });

  it("reports a worker that cannot be created as resource exhaustion", () => {
    const unanchored = relative(process.cwd(), STUB_WORKER);
    assert.throws(
      () => new FileWorkerPool(2, unanchored),
      (error: unknown) =>
        error instanceof ResourceExhaustedError &&
        error.message.startsWith("Worker pool cannot start: "),
    );
  });
});

describe("generate with worker threads", () => {
  it("merges worker results and isolates failing files", async () => {
    const files: SourceFile[] = ["a.py", "crash.py", "b.py", "throw.py"].map((path) => ({
      path,
      content: "x",
    }));
    const result = await generate(files, {
      workerThreads: true,
      workerScript: STUB_WORKER,
      concurrency: 2,
    });

    assert.strictEqual(result.cancelled, false);
    assert.deepStrictEqual(result.model.files, {
      "a.py": { language: "stub", lineCount: 1, definitions: [], imports: [] },
      "b.py": { language: "stub", lineCount: 1, definitions: [], imports: [] },
    });
    assert.deepStrictEqual(
      result.failures.map((f) => [f.path, f.kind]),
      [
        ["crash.py", "WorkerFailure"],
        ["throw.py", "WorkerFailure"],
      ],
    );
    assert.match(result.failures[0].message, /^Worker [01] exited with code 3$/);
    assert.strictEqual(result.failures[1].message, "adapter exploded");
    assert.strictEqual(result.stats.filesFailed, 2);
  });

  it("aborts when a worker reports resource exhaustion", async () => {
    await assert.rejects(
      generate(
        [
          { path: "a.py", content: "x" },
          { path: "fault.py", content: "x" },
        ],
        { workerThreads: true, workerScript: STUB_WORKER, concurrency: 2 },
      ),
      (error: unknown) =>
        error instanceof ResourceExhaustedError &&
        error.message === "Resource exhausted during generation" &&
        error.cause instanceof WorkerCrashError &&
        error.cause.message === "heap limit reached",
    );
  });
});
