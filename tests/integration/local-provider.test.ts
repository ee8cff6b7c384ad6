import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

import {
  GitFingerprintProvider,
  LocalContentProvider,
} from "../../src/sync/localProvider.js";
import { withContentSnapshot } from "../../src/sync/types.js";
import { RefNotFoundError } from "../../src/model/errors.js";

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf8");
  }
}

describe("LocalContentProvider outside git", () => {
  let root: string;
  const provider = new LocalContentProvider({ maxFileBytes: 200 });

  before(async () => {
    root = await mkdtemp(join(tmpdir(), "callmap-local-"));
    await writeTree(root, {
      "src/app.py": "def main():\n    run()\n",
      "src/util.ts": "export function run() {}\n",
      "node_modules/dep/index.js": "module.exports = 1;\n",
      "README.md": "# readme\n",
      "big.py": "x = 1\n".repeat(100),
    });
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads supported files, skipping ignored and oversized ones", async () => {
    const paths = await withContentSnapshot(provider, root, "HEAD", async (snapshot) => {
      assert.strictEqual(snapshot.ref, "HEAD");
      return snapshot.files.map((f) => f.path);
    });
    assert.deepStrictEqual(paths, ["src/app.py", "src/util.ts"]);
  });

  it("fingerprints the content the same way for fetch and freshness checks", async () => {
    const snapshot = await provider.fetch(root, "HEAD");
    await snapshot.release();
    const fingerprint = await provider.getFingerprint(root, "HEAD");

    assert.match(fingerprint ?? "", /^[0-9a-f]{64}$/);
    assert.strictEqual(snapshot.fingerprint, fingerprint);
  });

  it("changes the fingerprint when a file changes", async () => {
    const before = await provider.getFingerprint(root, "HEAD");
    await writeFile(join(root, "src/util.ts"), "export function run() { return 1; }\n", "utf8");
    const after = await provider.getFingerprint(root, "HEAD");
    assert.notStrictEqual(after, before);
  });

  it("accepts only HEAD as the ref", async () => {
    await assert.rejects(
      provider.fetch(root, "main"),
      (error: unknown) => error instanceof RefNotFoundError && error.ref === "main",
    );
  });

  it("has no git fingerprint", async () => {
    assert.strictEqual(await new GitFingerprintProvider().getFingerprint(root, "HEAD"), undefined);
  });
});
