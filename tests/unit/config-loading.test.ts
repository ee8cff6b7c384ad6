import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, parseConfig } from "../../src/config/loadConfig.js";
import { ConfigError } from "../../src/model/errors.js";
import {
  DEFAULT_CALLSTACK_MAX_DEPTH,
  DEFAULT_CALLSTACK_MAX_NODES,
  DEFAULT_OUTPUT_PATH,
} from "../../src/config/constants.js";

describe("config loading", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "callmap-config-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("fills every section with defaults", () => {
    const config = parseConfig({});
    assert.strictEqual(config.logLevel, "info");
    assert.strictEqual(config.callStack.maxDepth, DEFAULT_CALLSTACK_MAX_DEPTH);
    assert.strictEqual(config.callStack.maxNodes, DEFAULT_CALLSTACK_MAX_NODES);
    assert.strictEqual(config.output.path, DEFAULT_OUTPUT_PATH);
    assert.strictEqual(config.indexing.workerThreads, false);
    assert.strictEqual(config.tracing.enabled, false);
  });

  it("lists every invalid path in the error", () => {
    assert.throws(
      () => parseConfig({ logLevel: "loud", callStack: { maxDepth: -1 } }, "test.json"),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message.includes("Config validation failed (test.json)") &&
        error.message.includes("  - logLevel:") &&
        error.message.includes("  - callStack.maxDepth:"),
    );
  });

  it("expands environment variables in strings", () => {
    process.env.CALLMAP_TEST_OUTPUT = "models/out.json";
    try {
      const config = parseConfig({ output: { path: "${CALLMAP_TEST_OUTPUT}" } });
      assert.strictEqual(config.output.path, "models/out.json");
    } finally {
      delete process.env.CALLMAP_TEST_OUTPUT;
    }
  });

  it("fails on an unset environment variable", () => {
    assert.throws(
      () => parseConfig({ output: { path: "${CALLMAP_TEST_UNSET}" } }),
      /Environment variable "CALLMAP_TEST_UNSET" is not set/,
    );
  });

  it("reads an explicit config file", () => {
    const path = join(dir, "explicit.json");
    writeFileSync(path, JSON.stringify({ logLevel: "debug", callStack: { maxDepth: 3 } }));
    const config = loadConfig(path);
    assert.strictEqual(config.logLevel, "debug");
    assert.strictEqual(config.callStack.maxDepth, 3);
  });

  it("rejects a missing explicit file", () => {
    assert.throws(() => loadConfig(join(dir, "missing.json")), ConfigError);
  });

  it("rejects invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    assert.throws(() => loadConfig(path), /Invalid JSON in config file/);
  });
});
