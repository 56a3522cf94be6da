import { describe, it, expect } from 'vitest';
import { chunk, runWithConcurrency, sleep } from '../utils/concurrency.js';

describe('runWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const results = await runWithConcurrency(
      [30, 10, 20],
      async (delay, index) => {
        await sleep(delay);
        return `${index}:${delay}`;
      },
      { concurrency: 3 },
    );

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should never exceed the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency(
      Array.from({ length: 12 }, (_, i) => i),
      async () => {
        active += 1;
        peak = Math.max(peak, active);
        await sleep(2);
        active -= 1;
      },
      { concurrency: 4 },
    );

    expect(peak).toBe(4);
  });

  it('should stop starting work after the first failure', async () => {
    const started: number[] = [];
    const signals: AbortSignal[] = [];

    const run = runWithConcurrency(
      [1, 2, 3, 4, 5, 6],
      async (item, _index, signal) => {
        started.push(item);
        signals.push(signal);
        await sleep(1);
        if (item === 2) {
          throw new Error('boom');
        }
        return item;
      },
      { concurrency: 2 },
    );

    await expect(run).rejects.toThrow('boom');
    expect(started).toEqual([1, 2, 3]);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  it('should refuse to start when the caller already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    await expect(
      runWithConcurrency([1], async (item) => item, { concurrency: 1, signal: controller.signal }),
    ).rejects.toThrow('cancelled');
  });

  it('should handle an empty list', async () => {
    expect(await runWithConcurrency([], async () => 1, { concurrency: 5 })).toEqual([]);
  });
});

describe('chunk', () => {
  it('should split into fixed-size batches', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 100)).toEqual([]);
  });
});

describe('sleep', () => {
  it('should reject when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});
