import { describe, it, expect } from 'vitest';
import { mapPool } from '../core/pool.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('mapPool', () => {
  it('stores results at the index of their input', async () => {
    const results = await mapPool([30, 0, 15, 5], 4, async ms => {
      await delay(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 0, 30, 10]);
  });

  it('never runs more than the concurrency limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapPool(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('handles an empty list', async () => {
    expect(await mapPool<number, number>([], 4, async x => x)).toEqual([]);
  });

  it('stops starting new items once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const results = await mapPool([0, 1, 2, 3, 4], 1, async item => {
      started.push(item);
      if (item === 1) controller.abort();
      return item;
    }, controller.signal);

    expect(started).toEqual([0, 1]);
    expect(results).toEqual([0, 1, undefined, undefined, undefined]);
  });

  it('starts nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    const results = await mapPool([1, 2], 2, async item => {
      calls++;
      return item;
    }, controller.signal);

    expect(calls).toBe(0);
    expect(results).toEqual([undefined, undefined]);
  });
});
