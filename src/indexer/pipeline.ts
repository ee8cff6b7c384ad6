import { setImmediate as yieldToEventLoop } from "timers/promises";
import type {
  FileFailure,
  FileModel,
  RepoModel,
  SourceFile,
} from "../model/types.js";
import { countDefinitions } from "../model/types.js";
import { ResourceExhaustedError, isResourceExhaustion } from "../model/errors.js";
import { processSourceFile } from "./fileProcessor.js";
import type { FileOutcome } from "./fileProcessor.js";
import { FileWorkerPool } from "./workerPool.js";
import { normalizePath } from "../util/paths.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpan } from "../util/tracing.js";
import {
  DEFAULT_INDEXING_CONCURRENCY,
  MAX_FILE_BYTES,
  MAX_INDEXING_CONCURRENCY,
} from "../config/constants.js";

export interface GenerateProgress {
  current: number;
  total: number;
  path: string;
}

export interface GenerateOptions {
  /** Files processed at once; defaults to one per spare core. */
  concurrency?: number;
  /** Run the file processor in worker threads (needs a build). */
  workerThreads?: boolean;
  /** Worker thread entry point; defaults to the built `indexer/worker.js`. */
  workerScript?: string;
  signal?: AbortSignal;
  maxFileBytes?: number;
  onProgress?: (progress: GenerateProgress) => void;
}

export interface GenerateStats {
  filesTotal: number;
  filesIndexed: number;
  filesUnsupported: number;
  filesFailed: number;
  filesCancelled: number;
  definitions: number;
  durationMs: number;
}

export interface GenerateResult {
  model: RepoModel;
  failures: FileFailure[];
  cancelled: boolean;
  stats: GenerateStats;
}

type FileRunner = (file: SourceFile) => Promise<FileOutcome>;

export function resolveConcurrency(requested: number | undefined, fileCount: number): number {
  const wanted = requested ?? DEFAULT_INDEXING_CONCURRENCY;
  return Math.max(1, Math.min(wanted, MAX_INDEXING_CONCURRENCY, fileCount || 1));
}

function freezeModel(files: Map<string, FileModel>): RepoModel {
  const sortedPaths = [...files.keys()].sort();
  const entries: Array<[string, FileModel]> = [];
  for (const path of sortedPaths) {
    const file = files.get(path);
    if (!file) continue;
    for (const def of file.definitions) {
      for (const call of def.calls) {
        Object.freeze(call);
      }
      Object.freeze(def.calls);
      Object.freeze(def);
    }
    Object.freeze(file.definitions);
    Object.freeze(file.imports);
    entries.push([path, Object.freeze(file)]);
  }
  return Object.freeze({ files: Object.freeze(Object.fromEntries(entries)) });
}

function logFailure(failure: FileFailure): void {
  const meta = {
    path: failure.path,
    message: failure.message,
    ...(failure.line !== undefined ? { line: failure.line } : {}),
  };
  if (failure.kind === "UnsupportedLanguage" || failure.kind === "Cancelled") {
    logger.debug(`Skipped file (${failure.kind})`, meta);
  } else {
    logger.warn(`Failed to index file (${failure.kind})`, meta);
  }
}

/**
 * Builds the entity model for a set of source files. Each file is handed
 * to exactly one worker; results are merged by path, so the model does
 * not depend on completion order. Per-file problems are collected as
 * failures. A shared-resource fault aborts the run.
 */
export async function generate(
  files: readonly SourceFile[],
  options: GenerateOptions = {},
): Promise<GenerateResult> {
  return withSpan(
    SPAN_NAMES.GENERATE,
    async (span) => {
      const result = await runPipeline(files, options);
      setSpanAttributes(span, {
        "callmap.files.indexed": result.stats.filesIndexed,
        "callmap.files.failed": result.stats.filesFailed,
        "callmap.definitions": result.stats.definitions,
        "callmap.cancelled": result.cancelled,
      });
      return result;
    },
    { "callmap.files.total": files.length },
  );
}

async function runPipeline(
  files: readonly SourceFile[],
  options: GenerateOptions,
): Promise<GenerateResult> {
  const startTime = Date.now();
  const { signal, onProgress } = options;
  const maxFileBytes = options.maxFileBytes ?? MAX_FILE_BYTES;

  const failures: FileFailure[] = [];
  const queue: SourceFile[] = [];
  const seenPaths = new Set<string>();
  for (const file of files) {
    const path = normalizePath(file.path);
    if (seenPaths.has(path)) {
      failures.push({ path, kind: "ParseFailure", message: "duplicate path" });
      continue;
    }
    seenPaths.add(path);
    queue.push(file);
  }

  const concurrency = resolveConcurrency(options.concurrency, queue.length);
  const merged = new Map<string, FileModel>();
  let nextIndex = 0;
  let completed = 0;
  let fatalError: unknown = null;

  const pool = options.workerThreads && queue.length > 0
    ? new FileWorkerPool(concurrency, options.workerScript)
    : null;
  const runFile: FileRunner = pool
    ? (file) => pool.run(file, { maxFileBytes })
    : async (file) => {
        // let abort listeners and other workers run between files
        await yieldToEventLoop();
        return processSourceFile(file, { maxFileBytes });
      };

  const runWorker = async (): Promise<void> => {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      if (fatalError !== null || signal?.aborted) {
        return;
      }
      const index = nextIndex++;
      if (index >= queue.length) {
        return;
      }

      const file = queue[index];
      const path = normalizePath(file.path);

      try {
        const outcome = await runFile(file);
        if (outcome.ok) {
          merged.set(outcome.path, {
            language: outcome.language,
            lineCount: outcome.lineCount,
            definitions: outcome.definitions,
            imports: outcome.imports,
          });
        } else {
          failures.push(outcome.failure);
        }
      } catch (error) {
        if (isResourceExhaustion(error)) {
          fatalError = error;
          return;
        }
        failures.push({
          path,
          kind: "WorkerFailure",
          message: error instanceof Error ? error.message : String(error),
        });
      }

      completed++;
      onProgress?.({ current: completed, total: queue.length, path });
    }
  };

  try {
    const workers = Array.from({ length: concurrency }, () => runWorker());
    await Promise.all(workers);
  } finally {
    await pool?.shutdown();
  }

  if (fatalError !== null) {
    throw fatalError instanceof ResourceExhaustedError
      ? fatalError
      : new ResourceExhaustedError("Resource exhausted during generation", {
          cause: fatalError,
        });
  }

  const cancelled = nextIndex < queue.length;
  if (cancelled) {
    for (const file of queue.slice(nextIndex)) {
      failures.push({
        path: normalizePath(file.path),
        kind: "Cancelled",
        message: "generation cancelled before this file was dispatched",
      });
    }
  }

  failures.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  failures.forEach(logFailure);

  const model = freezeModel(merged);
  const stats: GenerateStats = {
    filesTotal: files.length,
    filesIndexed: merged.size,
    filesUnsupported: failures.filter((f) => f.kind === "UnsupportedLanguage").length,
    filesFailed: failures.filter(
      (f) => f.kind === "ParseFailure" || f.kind === "WorkerFailure",
    ).length,
    filesCancelled: failures.filter((f) => f.kind === "Cancelled").length,
    definitions: countDefinitions(model),
    durationMs: Date.now() - startTime,
  };

  logger.info(cancelled ? "Generation cancelled" : "Generation complete", {
    ...stats,
    concurrency,
    workerThreads: pool !== null,
  });

  return { model, failures, cancelled, stats };
}
