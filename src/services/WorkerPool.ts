/**
 * Bounded pool of async workers draining a shared task queue.
 *
 * At most `concurrency` executors run at once: each worker holds one slot for
 * the lifetime of the task it took and releases it whether the task resolved or
 * threw. `run()` resolves only after every worker has exited, with one result
 * per input item in input order.
 */

export interface WorkerPoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  label?: string;
}

export type PoolResult<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; error: Error }
  | { item: T; status: 'skipped' };

export interface PoolStats {
  peakConcurrency: number;
  completed: number;
  failed: number;
  skipped: number;
}

export type PoolExecutor<T, R> = (item: T, workerId: number) => Promise<R>;

export class WorkerPool<T, R> {
  private readonly concurrency: number;
  private readonly signal?: AbortSignal;
  private readonly label: string;
  private activeTasks = 0;
  private stats: PoolStats = { peakConcurrency: 0, completed: 0, failed: 0, skipped: 0 };

  constructor(private readonly executor: PoolExecutor<T, R>, options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.concurrency = options.concurrency;
    this.signal = options.signal;
    this.label = options.label ?? 'Pool';
  }

  async run(items: readonly T[]): Promise<PoolResult<T, R>[]> {
    this.stats = { peakConcurrency: 0, completed: 0, failed: 0, skipped: 0 };
    const results = new Array<PoolResult<T, R> | undefined>(items.length);
    let cursor = 0;

    const worker = async (workerId: number): Promise<void> => {
      while (cursor < items.length) {
        if (this.signal?.aborted) {
          return;
        }

        const index = cursor++;
        const item = items[index];

        this.activeTasks++;
        if (this.activeTasks > this.stats.peakConcurrency) {
          this.stats.peakConcurrency = this.activeTasks;
        }

        try {
          const value = await this.executor(item, workerId);
          results[index] = { item, status: 'fulfilled', value };
          this.stats.completed++;
        } catch (error) {
          results[index] = {
            item,
            status: 'rejected',
            error: error instanceof Error ? error : new Error(String(error)),
          };
          this.stats.failed++;
        } finally {
          this.activeTasks--;
        }
      }
    };

    const workerCount = Math.min(this.concurrency, items.length);
    const workers: Promise<void>[] = [];
    for (let workerId = 0; workerId < workerCount; workerId++) {
      workers.push(worker(workerId));
    }
    await Promise.all(workers);

    const settled = results.map((result, index): PoolResult<T, R> => {
      if (result) {
        return result;
      }
      this.stats.skipped++;
      return { item: items[index], status: 'skipped' };
    });

    console.log(
      `[${this.label}] ${items.length} tasks: ${this.stats.completed} completed, ${this.stats.failed} failed, ` +
      `${this.stats.skipped} skipped (peak concurrency ${this.stats.peakConcurrency}/${this.concurrency})`
    );

    return settled;
  }

  getStats(): PoolStats {
    return { ...this.stats };
  }
}
