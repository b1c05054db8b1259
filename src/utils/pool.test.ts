import { describe, expect, it } from 'vitest';

import { mapWithConcurrency } from './pool.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('keeps results in input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${String(index)}:${String(ms)}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('keeps undefined items in their slots', async () => {
    const results = await mapWithConcurrency([1, undefined, 3], 2, (item) => Promise.resolve(item ?? 0));

    expect(results).toEqual([1, 0, 3]);
  });

  it('returns an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, () => Promise.resolve(1))).resolves.toEqual([]);
  });

  it('rejects when a worker fails', async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, (n) => (n === 2 ? Promise.reject(new Error('worker 2')) : Promise.resolve(n))),
    ).rejects.toThrow('worker 2');
  });

  it('rejects a concurrency below one', async () => {
    await expect(mapWithConcurrency([1], 0, () => Promise.resolve(1))).rejects.toThrow(
      'concurrency must be a positive integer, got 0',
    );
  });
});
