import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { HarnessConfigurationError, WorkerPoolShutdownError } from '../errors';
import { isPositiveInteger } from '../type-guards';

/**
 * Fixed number of async workers on top of `p-limit`. At most `size`
 * submitted tasks are in flight at once; the rest wait in FIFO order. With a
 * size of 1 each task runs to completion before the next one starts.
 *
 * ```typescript
 * const pool = new FixedWorkerPool(2);
 * const results = [1, 2, 3].map((n) => pool.submit(() => work(n)));
 * pool.shutdown();
 * await pool.awaitTermination();
 * ```
 */
export class FixedWorkerPool {
  private readonly size: number;
  private readonly limit: LimitFunction;
  private readonly inFlight = new Set<Promise<void>>();
  private running = 0;
  private peakActive = 0;
  private shutdownRequested = false;

  constructor(size: number) {
    if (!isPositiveInteger(size)) {
      throw new HarnessConfigurationError(
        `Worker pool size must be a positive integer, got ${size}`,
        { size },
      );
    }

    this.size = size;
    this.limit = pLimit(size);
  }

  /**
   * Queue a task. It starts on a later microtask, never synchronously.
   *
   * @throws {WorkerPoolShutdownError} After shutdown()
   */
  public submit<T>(task: () => T | PromiseLike<T>): Promise<T> {
    if (this.shutdownRequested) {
      throw new WorkerPoolShutdownError({ poolSize: this.size });
    }

    const result = this.limit(async () => {
      this.running++;
      this.peakActive = Math.max(this.peakActive, this.running);

      try {
        return await task();
      } finally {
        this.running--;
      }
    });

    const settled = result.then(
      () => undefined,
      () => undefined,
    );

    this.inFlight.add(settled);

    void settled.then(() => {
      this.inFlight.delete(settled);
    });

    return result;
  }

  /**
   * Stop accepting tasks. Queued and running tasks still complete.
   */
  public shutdown(): void {
    this.shutdownRequested = true;
  }

  public isTerminated(): boolean {
    return this.shutdownRequested && this.inFlight.size === 0;
  }

  /**
   * Resolves once every submitted task has settled
   */
  public async awaitTermination(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  public getPoolSize(): number {
    return this.size;
  }

  public getActiveCount(): number {
    return this.limit.activeCount;
  }

  public getQueuedCount(): number {
    return this.limit.pendingCount;
  }

  /** Highest number of tasks that ran at the same time */
  public getPeakActiveCount(): number {
    return this.peakActive;
  }
}
