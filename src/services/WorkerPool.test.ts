import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WorkerPool } from './WorkerPool.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('WorkerPool', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should never run more tasks at once than its concurrency', async () => {
    let active = 0;
    let peak = 0;
    const pool = new WorkerPool<number, number>(
      async (n) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return n * 2;
      },
      { concurrency: 3 }
    );

    const results = await pool.run([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

    expect(peak).toBe(3);
    expect(results.map((result) => (result.status === 'fulfilled' ? result.value : null))).toEqual([
      2, 4, 6, 8, 10, 12, 14, 16, 18, 20,
    ]);
    expect(pool.getStats()).toEqual({ peakConcurrency: 3, completed: 10, failed: 0, skipped: 0 });
  });

  it('should keep results in input order when tasks finish out of order', async () => {
    const pool = new WorkerPool<number, string>(
      async (delay) => {
        await sleep(delay);
        return `done-${delay}`;
      },
      { concurrency: 4 }
    );

    const results = await pool.run([20, 1, 10, 5]);

    expect(results.map((result) => result.item)).toEqual([20, 1, 10, 5]);
    expect(results.map((result) => (result.status === 'fulfilled' ? result.value : ''))).toEqual([
      'done-20',
      'done-1',
      'done-10',
      'done-5',
    ]);
  });

  it('should record failures without stopping the remaining tasks', async () => {
    const pool = new WorkerPool<number, number>(
      async (n) => {
        if (n === 2) {
          throw new Error('boom 2');
        }
        if (n === 4) {
          throw 'plain failure';
        }
        return n;
      },
      { concurrency: 1 }
    );

    const results = await pool.run([1, 2, 3, 4, 5]);

    expect(results.map((result) => result.status)).toEqual([
      'fulfilled',
      'rejected',
      'fulfilled',
      'rejected',
      'fulfilled',
    ]);

    const second = results[1];
    expect(second.status === 'rejected' && second.error.message).toBe('boom 2');
    const fourth = results[3];
    expect(fourth.status === 'rejected' && fourth.error).toBeInstanceOf(Error);
    expect(fourth.status === 'rejected' && fourth.error.message).toBe('plain failure');

    expect(pool.getStats()).toEqual({ peakConcurrency: 1, completed: 3, failed: 2, skipped: 0 });
  });

  it('should skip tasks that were not started once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const pool = new WorkerPool<number, number>(
      async (n) => {
        started.push(n);
        if (n === 2) {
          controller.abort();
        }
        return n;
      },
      { concurrency: 1, signal: controller.signal }
    );

    const results = await pool.run([1, 2, 3, 4]);

    expect(started).toEqual([1, 2]);
    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled', 'skipped', 'skipped']);
    expect(pool.getStats().skipped).toBe(2);
  });

  it('should pass a stable worker id to the executor', async () => {
    const workerIds = new Set<number>();
    const pool = new WorkerPool<number, void>(
      async (_n, workerId) => {
        workerIds.add(workerId);
        await sleep(1);
      },
      { concurrency: 2 }
    );

    await pool.run([1, 2, 3, 4, 5, 6]);

    expect([...workerIds].sort()).toEqual([0, 1]);
  });

  it('should resolve with an empty list when there is nothing to do', async () => {
    const executor = vi.fn(async (n: number) => n);
    const pool = new WorkerPool<number, number>(executor, { concurrency: 5 });

    await expect(pool.run([])).resolves.toEqual([]);
    expect(executor).not.toHaveBeenCalled();
  });

  it('should reject a concurrency that is not a positive integer', () => {
    const executor = async (n: number) => n;
    expect(() => new WorkerPool<number, number>(executor, { concurrency: 0 })).toThrow(RangeError);
    expect(() => new WorkerPool<number, number>(executor, { concurrency: 2.5 })).toThrow(
      'Pool concurrency must be a positive integer, got 2.5'
    );
  });
});
