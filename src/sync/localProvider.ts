import { execFile } from "child_process";
import { promisify } from "util";
import { resolve } from "path";
import fastGlob from "fast-glob";
import type { SourceFile } from "../model/types.js";
import type { ContentProvider, ContentSnapshot, FingerprintProvider } from "./types.js";
import { FetchFailureError, RefNotFoundError } from "../model/errors.js";
import { getSupportedExtensions } from "../indexer/adapter/registry.js";
import { createAsyncFsOperations } from "../util/asyncFs.js";
import { hashFileSet } from "../util/hashing.js";
import { normalizePath } from "../util/paths.js";
import { logger } from "../util/logger.js";
import {
  DEFAULT_IGNORE_GLOBS,
  DEFAULT_READ_CONCURRENCY,
  MAX_FILE_BYTES,
} from "../config/constants.js";

const execFileAsync = promisify(execFile);

export interface LocalProviderOptions {
  ignore?: string[];
  maxFileBytes?: number;
  /** Extensions to pick up; defaults to every registered adapter's. */
  extensions?: string[];
  readConcurrency?: number;
}

interface GitState {
  commit: string;
  dirty: boolean;
}

async function git(cwd: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("git", args, { cwd, encoding: "utf8" });
  return stdout.trim();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Commit the ref points at, and whether the work tree has local changes.
 * Null when the directory is not inside a git work tree or git is not
 * installed.
 */
export async function readGitState(dir: string, ref: string): Promise<GitState | null> {
  let inside: string;
  try {
    inside = await git(dir, ["rev-parse", "--is-inside-work-tree"]);
  } catch (error) {
    logger.debug("Not a git work tree", { dir, error: errorMessage(error) });
    return null;
  }
  if (inside !== "true") {
    return null;
  }

  let commit: string;
  try {
    commit = await git(dir, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
  } catch (error) {
    logger.debug("Ref did not resolve", { dir, ref, error: errorMessage(error) });
    throw new RefNotFoundError(dir, ref);
  }

  try {
    const head = await git(dir, ["rev-parse", "HEAD"]);
    if (head !== commit) {
      throw new FetchFailureError(
        `Work tree of ${dir} is at ${head}, not at ${ref} (${commit})`,
        dir,
      );
    }
    const status = await git(dir, ["status", "--porcelain"]);
    return { commit, dirty: status.length > 0 };
  } catch (error) {
    if (error instanceof FetchFailureError) {
      throw error;
    }
    throw new FetchFailureError(`git failed in ${dir}: ${errorMessage(error)}`, dir, {
      cause: error,
    });
  }
}

/**
 * Fingerprints a clean git checkout by its commit; undefined outside git
 * or with local changes. Never scans the work tree.
 */
export class GitFingerprintProvider implements FingerprintProvider {
  async getFingerprint(repository: string, ref: string): Promise<string | undefined> {
    const state = await readGitState(resolve(repository), ref);
    if (!state || state.dirty) {
      return undefined;
    }
    return state.commit;
  }
}

/**
 * Reads source files from a directory on disk. The repository is the
 * directory path; the ref must be what the work tree has checked out
 * ("HEAD" outside git).
 */
export class LocalContentProvider implements ContentProvider, FingerprintProvider {
  private readonly ignore: string[];
  private readonly maxFileBytes: number;
  private readonly extensions: string[] | undefined;
  private readonly readConcurrency: number;

  constructor(options: LocalProviderOptions = {}) {
    this.ignore = options.ignore ?? DEFAULT_IGNORE_GLOBS;
    this.maxFileBytes = options.maxFileBytes ?? MAX_FILE_BYTES;
    this.extensions = options.extensions;
    this.readConcurrency = options.readConcurrency ?? DEFAULT_READ_CONCURRENCY;
  }

  async fetch(repository: string, ref: string): Promise<ContentSnapshot> {
    const root = resolve(repository);
    const state = await this.resolveRef(root, ref);
    const files = await this.scan(root);

    logger.info("Loaded local checkout", {
      root,
      ref,
      files: files.length,
      git: state !== null,
    });

    return {
      files,
      fingerprint: fingerprintOf(state, files),
      ref,
      release: async () => {
        logger.debug("Released local snapshot", { root, ref });
      },
    };
  }

  async getFingerprint(repository: string, ref: string): Promise<string | undefined> {
    const root = resolve(repository);
    const state = await this.resolveRef(root, ref);
    if (state && !state.dirty) {
      return state.commit;
    }
    return fingerprintOf(state, await this.scan(root));
  }

  private async resolveRef(root: string, ref: string): Promise<GitState | null> {
    const state = await readGitState(root, ref);
    if (!state && ref !== "HEAD") {
      throw new RefNotFoundError(root, ref);
    }
    return state;
  }

  private async scan(root: string): Promise<SourceFile[]> {
    const extensions = this.extensions ?? getSupportedExtensions();
    const patterns = extensions.map((ext) => `**/*${ext}`);

    let entries: fastGlob.Entry[];
    try {
      entries = await fastGlob(patterns, {
        cwd: root,
        ignore: this.ignore,
        onlyFiles: true,
        followSymbolicLinks: false,
        caseSensitiveMatch: false,
        stats: true,
      });
    } catch (error) {
      throw new FetchFailureError(`Cannot scan ${root}: ${errorMessage(error)}`, root, {
        cause: error,
      });
    }

    const accepted = entries.filter((entry) => {
      const size = entry.stats?.size ?? 0;
      if (size > this.maxFileBytes) {
        logger.warn("Skipping oversized file", { path: entry.path, size });
        return false;
      }
      return true;
    });

    const fs = createAsyncFsOperations({ maxConcurrentReads: this.readConcurrency });
    try {
      const files = await Promise.all(
        accepted.map(async (entry): Promise<SourceFile> => ({
          path: normalizePath(entry.path),
          content: await fs.readFile(resolve(root, entry.path)),
        })),
      );
      return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    } catch (error) {
      throw new FetchFailureError(`Cannot read ${root}: ${errorMessage(error)}`, root, {
        cause: error,
      });
    }
  }
}

function fingerprintOf(state: GitState | null, files: readonly SourceFile[]): string {
  if (!state) {
    return hashFileSet(files);
  }
  return state.dirty ? `${state.commit}+${hashFileSet(files)}` : state.commit;
}
