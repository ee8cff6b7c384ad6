import { describe, it, before, after, beforeEach } from "node:test";
import assert from "node:assert";
import { SpanStatusCode } from "@opentelemetry/api";

import {
  SPAN_NAMES,
  getMemoryExporter,
  initTracing,
  isTracingEnabled,
  resetTracingForTest,
} from "../../src/util/tracing.js";
import { generate } from "../../src/indexer/pipeline.js";
import { resolveCallStack } from "../../src/graph/callStack.js";
import { refreshRepoModel } from "../../src/sync/refresh.js";
import { JsonModelStore } from "../../src/sync/modelStore.js";
import { FetchFailureError } from "../../src/model/errors.js";

describe("OpenTelemetry tracing", () => {
  before(async () => {
    await resetTracingForTest();
    initTracing({ enabled: true, exporterType: "memory", serviceName: "callmap-test" });
  });

  after(async () => {
    await resetTracingForTest();
  });

  beforeEach(() => {
    getMemoryExporter()?.reset();
  });

  it("keeps spans in memory when enabled", () => {
    assert.ok(isTracingEnabled());
    assert.ok(getMemoryExporter());
  });

  it("records a span per generation with file counts", async () => {
    await generate([
      { path: "a.py", content: "def f():\n    g()\n" },
      { path: "b.py", content: "def g():\n    pass\n" },
    ]);

    const spans = getMemoryExporter()?.getFinishedSpans() ?? [];
    const span = spans.find((s) => s.name === SPAN_NAMES.GENERATE);
    assert.ok(span);
    assert.strictEqual(span.attributes["callmap.files.total"], 2);
    assert.strictEqual(span.attributes["callmap.files.indexed"], 2);
    assert.strictEqual(span.attributes["callmap.definitions"], 2);
    assert.strictEqual(span.status.code, SpanStatusCode.OK);
  });

  it("records call stack resolution", async () => {
    const { model } = await generate([
      { path: "a.py", content: "def f():\n    g()\n" },
      { path: "b.py", content: "def g():\n    pass\n" },
    ]);
    resolveCallStack(model, "a.py", 1, 3);

    const span = getMemoryExporter()
      ?.getFinishedSpans()
      .find((s) => s.name === SPAN_NAMES.CALLSTACK_RESOLVE);
    assert.ok(span);
    assert.strictEqual(span.attributes["callmap.file"], "a.py");
    assert.strictEqual(span.attributes["callmap.max_depth"], 3);
    assert.strictEqual(span.attributes["callmap.callstack.entries"], 2);
  });

  it("marks a failed refresh span as an error", async () => {
    await assert.rejects(
      refreshRepoModel({
        repository: "remote",
        ref: "HEAD",
        outputPath: "unused.json",
        provider: {
          fetch: async (repository) => {
            throw new FetchFailureError("connection refused", repository);
          },
        },
        store: new JsonModelStore(),
      }),
      FetchFailureError,
    );

    const span = getMemoryExporter()
      ?.getFinishedSpans()
      .find((s) => s.name === SPAN_NAMES.REFRESH);
    assert.ok(span);
    assert.strictEqual(span.status.code, SpanStatusCode.ERROR);
    assert.strictEqual(span.status.message, "connection refused");
  });
});
