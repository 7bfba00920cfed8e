import { describe, expect, test } from 'vitest';
import { HarnessConfigurationError, WorkerPoolShutdownError } from '../errors';
import { sleep } from '../sleep';
import { FixedWorkerPool } from './worker-pool';

describe('FixedWorkerPool', () => {
  test('rejects sizes below one', () => {
    expect(() => new FixedWorkerPool(0)).toThrow(HarnessConfigurationError);
    expect(() => new FixedWorkerPool(1.5)).toThrow(
      'Worker pool size must be a positive integer, got 1.5',
    );
  });

  test('resolves each submission with its task result', async () => {
    const pool = new FixedWorkerPool(2);

    const results = await Promise.all([
      pool.submit(() => 1),
      pool.submit(async () => {
        await sleep(1);
        return 2;
      }),
    ]);

    expect(results).toEqual([1, 2]);
  });

  test('does not start tasks synchronously', () => {
    const pool = new FixedWorkerPool(1);
    let started = false;

    void pool.submit(() => {
      started = true;
    });

    expect(started).toBe(false);
    expect(pool.getQueuedCount()).toBe(1);
  });

  test('a size of one runs tasks one after another', async () => {
    const pool = new FixedWorkerPool(1);
    const timeline: string[] = [];

    const tasks = [1, 2, 3].map((n) =>
      pool.submit(async () => {
        timeline.push(`start ${n}`);
        await sleep(2);
        timeline.push(`end ${n}`);
      }),
    );

    await Promise.all(tasks);

    expect(timeline).toEqual([
      'start 1',
      'end 1',
      'start 2',
      'end 2',
      'start 3',
      'end 3',
    ]);
    expect(pool.getPeakActiveCount()).toBe(1);
  });

  test('never runs more than size tasks at once', async () => {
    const pool = new FixedWorkerPool(3);
    let running = 0;
    let maxRunning = 0;

    const tasks = Array.from({ length: 10 }, () =>
      pool.submit(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(2);
        running--;
      }),
    );

    await Promise.all(tasks);

    expect(maxRunning).toBe(3);
    expect(pool.getPeakActiveCount()).toBe(3);
  });

  test('task errors reject only that submission', async () => {
    const pool = new FixedWorkerPool(1);

    const failing = pool.submit(() => {
      throw new Error('task failed');
    });
    const passing = pool.submit(() => 'ok');

    await expect(failing).rejects.toThrow('task failed');
    await expect(passing).resolves.toBe('ok');
  });

  test('refuses submissions after shutdown but finishes queued work', async () => {
    const pool = new FixedWorkerPool(1);
    const done: number[] = [];

    void pool.submit(async () => {
      await sleep(2);
      done.push(1);
    });
    void pool.submit(() => {
      done.push(2);
    });

    pool.shutdown();

    expect(() => pool.submit(() => 3)).toThrow(WorkerPoolShutdownError);
    expect(pool.isTerminated()).toBe(false);

    await pool.awaitTermination();

    expect(done).toEqual([1, 2]);
    expect(pool.isTerminated()).toBe(true);
    expect(pool.getQueuedCount()).toBe(0);
  });

  test('reports running and waiting tasks', async () => {
    const pool = new FixedWorkerPool(2);

    const tasks = [1, 2, 3].map(() => pool.submit(() => sleep(20)));

    await sleep(5);

    expect(pool.getActiveCount()).toBe(2);
    expect(pool.getQueuedCount()).toBe(1);
    expect(pool.getPoolSize()).toBe(2);

    await Promise.all(tasks);
  });

  test('awaitTermination resolves at once for an idle shut down pool', async () => {
    const pool = new FixedWorkerPool(4);
    pool.shutdown();

    await expect(pool.awaitTermination()).resolves.toBeUndefined();
  });
});
