/**
 * Semaphore-style limiter for bounding parallel async operations.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter({ maxConcurrency: 4 });
 * const contents = await limiter.map(paths, (p) => readFile(p, "utf-8"));
 * ```
 */

export interface ConcurrencyLimiterOptions {
  /**
   * Maximum number of concurrent operations allowed.
   */
  maxConcurrency: number;
}

interface QueuedTask {
  start: () => void;
}

export class ConcurrencyLimiter {
  private readonly maxConcurrency: number;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(options: ConcurrencyLimiterOptions) {
    if (options.maxConcurrency < 1) {
      throw new Error("maxConcurrency must be at least 1");
    }
    this.maxConcurrency = options.maxConcurrency;
  }

  /**
   * Runs a task once a slot is free.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.activeCount++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.activeCount--;
            this.next();
          });
      };

      if (this.activeCount < this.maxConcurrency) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  /**
   * Applies fn to every item with bounded parallelism, preserving order.
   */
  map<T, R>(items: readonly T[], fn: (item: T) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item) => this.run(() => fn(item))));
  }

  private next(): void {
    const item = this.queue.shift();
    if (item) {
      item.start();
      return;
    }
    if (this.activeCount === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  getStats(): { active: number; queued: number } {
    return {
      active: this.activeCount,
      queued: this.queue.length,
    };
  }

  /**
   * Resolves once no task is active or queued.
   */
  drain(): Promise<void> {
    if (this.activeCount === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }
}
