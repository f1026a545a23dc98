import { describe, expect, it } from 'vitest';

import { mapUnits } from '@/utils/concurrency.js';

const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

describe('mapUnits', () => {
  it('returns results in input order when later tasks finish first', async () => {
    const options = { parallel: true, concurrency: 4 };

    const results = await mapUnits([30, 10, 20, 0], options, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40, 0]);
  });

  it('runs one task at a time when not parallel', async () => {
    const events: string[] = [];

    await mapUnits(['a', 'b', 'c'], { parallel: false, concurrency: 8 }, async (item) => {
      events.push(`start ${item}`);
      await delay(1);
      events.push(`end ${item}`);
    });

    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps at most `concurrency` tasks in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapUnits([1, 2, 3, 4, 5, 6, 7], { parallel: true, concurrency: 3 }, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(2);
      inFlight -= 1;
    });

    expect(peak).toBe(3);
  });

  it('passes each item with its index', async () => {
    const results = await mapUnits(['x', 'y'], { parallel: true, concurrency: 2 }, (item, index) =>
      Promise.resolve(`${item}${String(index)}`)
    );

    expect(results).toEqual(['x0', 'y1']);
  });

  it('rejects with the task error and starts nothing after it', async () => {
    const started: number[] = [];

    const run = mapUnits([1, 2, 3, 4], { parallel: true, concurrency: 1 }, async (item) => {
      started.push(item);
      await delay(1);
      if (item === 2) throw new Error('unit failed');
      return item;
    });

    await expect(run).rejects.toThrow('unit failed');
    expect(started).toEqual([1, 2]);
  });

  it('returns an empty list for no items', async () => {
    const results = await mapUnits([], { parallel: true, concurrency: 4 }, () =>
      Promise.resolve(1)
    );

    expect(results).toEqual([]);
  });
});
