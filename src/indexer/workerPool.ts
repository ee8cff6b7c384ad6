import { Worker } from "worker_threads";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { findPackageRoot } from "../util/findPackageRoot.js";
import { logger } from "../util/logger.js";
import {
  ResourceExhaustedError,
  isResourceExhaustion,
} from "../model/errors.js";
import type { SourceFile } from "../model/types.js";
import type { FileOutcome, ProcessFileOptions } from "./fileProcessor.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface WorkerRequest {
  taskId: number;
  file: SourceFile;
  options: ProcessFileOptions;
}

export type WorkerResponse =
  | { taskId: number; outcome: FileOutcome }
  | { taskId: number; error: string; code?: string };

/**
 * A worker thread died or answered with an error while processing a file.
 */
export class WorkerCrashError extends Error {
  readonly code?: string;
  constructor(message: string, code?: string) {
    super(message);
    this.name = "WorkerCrashError";
    this.code = code;
  }
}

interface QueuedTask {
  request: WorkerRequest;
  resolve: (outcome: FileOutcome) => void;
  reject: (error: Error) => void;
}

interface PoolWorker {
  worker: Worker;
  currentTask?: QueuedTask;
}

export function resolveWorkerScript(): string {
  // Worker threads require compiled JS files
  // Resolve against the package root so this works from both src/ and dist/ builds.
  const packageRoot = findPackageRoot(__dirname);
  return join(packageRoot, "dist", "indexer", "worker.js");
}

/**
 * Fixed-size pool of worker threads running the file processor. A worker
 * that dies is replaced; its task is rejected with the cause.
 */
export class FileWorkerPool {
  private workers: PoolWorker[] = [];
  private queue: QueuedTask[] = [];
  private nextTaskId = 0;
  private shuttingDown = false;
  private fatalError: Error | null = null;

  constructor(
    private readonly poolSize: number,
    private readonly workerScript: string = resolveWorkerScript(),
  ) {
    if (!existsSync(workerScript)) {
      throw new ResourceExhaustedError(
        `Worker pool cannot start: ${workerScript} not found (run the build first)`,
      );
    }
    try {
      for (let i = 0; i < poolSize; i++) {
        this.workers.push(this.createWorker(i));
      }
    } catch (error) {
      this.shuttingDown = true;
      for (const { worker } of this.workers.splice(0)) {
        void worker.terminate().catch((terminateError: unknown) => {
          logger.debug("Worker did not terminate cleanly", { error: terminateError });
        });
      }
      throw new ResourceExhaustedError(
        `Worker pool cannot start: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private createWorker(index: number): PoolWorker {
    const poolWorker: PoolWorker = { worker: new Worker(this.workerScript) };
    const { worker } = poolWorker;

    worker.on("message", (msg: WorkerResponse) => {
      const item = poolWorker.currentTask;
      if (!item || item.request.taskId !== msg.taskId) {
        return;
      }
      poolWorker.currentTask = undefined;

      if ("error" in msg) {
        item.reject(new WorkerCrashError(msg.error, msg.code));
      } else {
        item.resolve(msg.outcome);
      }
      this.processQueue();
    });

    worker.on("error", (error: Error) => {
      logger.warn(`Worker ${index} error`, { error });
      this.failWorker(poolWorker, error, index);
    });

    worker.on("exit", (exitCode: number) => {
      if (this.shuttingDown) {
        return;
      }
      this.failWorker(
        poolWorker,
        new WorkerCrashError(`Worker ${index} exited with code ${exitCode}`),
        index,
      );
    });

    return poolWorker;
  }

  private failWorker(poolWorker: PoolWorker, error: Error, index: number): void {
    const slot = this.workers.indexOf(poolWorker);
    if (slot === -1) {
      return;
    }

    const item = poolWorker.currentTask;
    poolWorker.currentTask = undefined;
    item?.reject(error);

    if (this.shuttingDown || this.fatalError) {
      return;
    }
    if (isResourceExhaustion(error)) {
      // a replacement would hit the same limit
      this.fatalError = error;
      for (const queued of this.queue.splice(0)) {
        queued.reject(error);
      }
      return;
    }
    this.workers[slot] = this.createWorker(index);
    void poolWorker.worker.terminate().catch((terminateError: unknown) => {
      logger.debug(`Worker ${index} did not terminate cleanly`, {
        error: terminateError,
      });
    });
    this.processQueue();
  }

  run(file: SourceFile, options: ProcessFileOptions = {}): Promise<FileOutcome> {
    if (this.fatalError) {
      return Promise.reject(this.fatalError);
    }
    if (this.shuttingDown) {
      return Promise.reject(new Error("Worker pool is shut down"));
    }
    return new Promise((resolve, reject) => {
      this.queue.push({
        request: { taskId: this.nextTaskId++, file, options },
        resolve,
        reject,
      });
      this.processQueue();
    });
  }

  private processQueue(): void {
    if (this.shuttingDown || this.fatalError) {
      return;
    }

    const available = this.workers.find((w) => !w.currentTask);
    if (!available || this.queue.length === 0) {
      return;
    }

    const item = this.queue.shift();
    if (!item) {
      return;
    }

    available.currentTask = item;
    available.worker.postMessage(item.request);

    this.processQueue();
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    for (const item of this.queue.splice(0)) {
      item.reject(new Error("Worker pool is shut down"));
    }
    await Promise.all(this.workers.map((w) => w.worker.terminate()));
  }

  getPoolSize(): number {
    return this.poolSize;
  }
}
