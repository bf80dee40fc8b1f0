import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../concurrency';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 1));

describe('mapWithConcurrency', () => {
  it('never has more than `concurrency` calls in flight', async () => {
    let active = 0;
    let maxActive = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async item => {
      active++;
      maxActive = Math.max(maxActive, active);
      await tick();
      active--;
      return item;
    });

    expect(maxActive).toBe(2);
  });

  it('keeps input order', async () => {
    const delays = [5, 1, 3, 0];

    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:5', '1:1', '2:3', '3:0']);
  });

  it('starts no new items after a failure and throws the first error', async () => {
    const started: number[] = [];

    const promise = mapWithConcurrency([0, 1, 2, 3, 4], 1, async item => {
      started.push(item);
      if (item === 1) {
        throw new Error('item 1 failed');
      }
      return item;
    });

    await expect(promise).rejects.toThrow('item 1 failed');
    expect(started).toEqual([0, 1]);
  });
});
