import { describe, it, expect } from 'vitest';
import { chunk, runPool } from '../lib/worker-pool';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('chunk', () => {
  it('splits into fixed-size batches', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});

describe('runPool', () => {
  it('keeps input order and bounds concurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    const out = await runPool([30, 10, 20, 5, 15], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(ms);
      inFlight--;
      return `${i}:${ms}`;
    });
    expect(out).toEqual(['0:30', '1:10', '2:20', '3:5', '4:15']);
    expect(peak).toBe(2);
  });

  it('treats a size below one as one', async () => {
    let peak = 0;
    let inFlight = 0;
    await runPool([1, 2, 3], 0, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(1);
      inFlight--;
    });
    expect(peak).toBe(1);
  });

  it('rejects when a task rejects', async () => {
    await expect(
      runPool([1, 2], 2, async (x) => {
        if (x === 2) throw new Error('task failed');
        return x;
      })
    ).rejects.toThrow('task failed');
  });
});
