import { describe, it, expect } from 'vitest';
import { PipelineCancelledError } from '../src/pipeline/errors';
import { WorkerPool } from '../src/pipeline/pool';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise((r) => setTimeout(r, 5));

describe('WorkerPool', () => {
  it('should never run more tasks than its width', async () => {
    const pool = new WorkerPool(2);
    let running = 0;
    let peak = 0;
    const task = async (n: number) => {
      running++;
      peak = Math.max(peak, running);
      await tick();
      running--;
      return n * 2;
    };
    const out = await Promise.all([1, 2, 3, 4, 5].map((n) => pool.run(() => task(n))));
    expect(out).toEqual([2, 4, 6, 8, 10]);
    expect(peak).toBe(2);
    expect(pool.running).toBe(0);
  });

  it('should reject queued tasks once aborted', async () => {
    const controller = new AbortController();
    const pool = new WorkerPool(1, controller.signal);
    const gate = deferred();
    const first = pool.run(async () => {
      await gate.promise;
      return 'first';
    });
    let started = false;
    const second = pool.run(async () => {
      started = true;
      return 'second';
    });
    await tick();
    expect(pool.queued).toBe(1);
    controller.abort();
    await expect(second).rejects.toBeInstanceOf(PipelineCancelledError);
    gate.resolve();
    await expect(first).resolves.toBe('first');
    expect(started).toBe(false);
    await expect(pool.run(async () => 'late')).rejects.toBeInstanceOf(PipelineCancelledError);
  });

  it('should reject an invalid width', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow(RangeError);
  });
});
