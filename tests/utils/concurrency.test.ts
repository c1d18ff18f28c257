import { describe, expect, it } from 'vitest';

import { mapWithConcurrency, sleep } from '../../src/utils/concurrency.js';

describe('mapWithConcurrency', () => {
  it('keeps input order whatever the completion order', async () => {
    const delays = [30, 5, 15, 0];

    const results = await mapWithConcurrency(delays, 2, async (ms, i) => {
      await sleep(ms);
      return `${i}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('returns an empty array for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects a limit below 1', async () => {
    await expect(mapWithConcurrency([1], 0, async x => x)).rejects.toBeInstanceOf(RangeError);
  });

  it('rejects when a worker throws', async () => {
    const work = mapWithConcurrency([1, 2], 2, async x => {
      if (x === 2) throw new Error('boom');
      return x;
    });

    await expect(work).rejects.toThrow('boom');
  });
});
