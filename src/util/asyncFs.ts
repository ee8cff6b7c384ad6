/**
 * File reads with a bound on how many are in flight, so that loading a
 * large checkout does not run out of file descriptors.
 */

import { readFile } from "fs/promises";
import { ConcurrencyLimiter } from "./concurrency.js";

export interface AsyncFsConfig {
  /**
   * Maximum concurrent file read operations.
   */
  maxConcurrentReads?: number;

  /**
   * Shared limiter; overrides maxConcurrentReads.
   */
  limiter?: ConcurrencyLimiter;
}

class AsyncFsOperations {
  private readLimiter: ConcurrencyLimiter;

  constructor(config: AsyncFsConfig = {}) {
    const { maxConcurrentReads = 10, limiter } = config;
    this.readLimiter =
      limiter ?? new ConcurrencyLimiter({ maxConcurrency: maxConcurrentReads });
  }

  async readFile(filePath: string, encoding: BufferEncoding = "utf-8"): Promise<string> {
    return this.readLimiter.run(() => readFile(filePath, encoding));
  }
}

export type { AsyncFsOperations };

export function createAsyncFsOperations(config?: AsyncFsConfig): AsyncFsOperations {
  return new AsyncFsOperations(config);
}
