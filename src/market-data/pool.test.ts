import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from './pool.js';

/** A promise plus its resolve function. */
function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('mapWithConcurrency', () => {
  it('returns an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it('keeps results in input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (n) => {
      await new Promise((r) => setTimeout(r, n));
      return n * 2;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active -= 1;
    });

    expect(peak).toBe(3);
  });

  it('a slow item occupies only one slot', async () => {
    const slow = deferred<string>();
    const started: string[] = [];

    const run = mapWithConcurrency(['slow', 'a', 'b', 'c'], 2, async (item) => {
      started.push(item);
      return item === 'slow' ? slow.promise : item;
    });
    await new Promise((r) => setTimeout(r, 0));

    expect(started).toEqual(['slow', 'a', 'b', 'c']);
    slow.resolve('done');
    const results = await run;
    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : null))).toEqual(['done', 'a', 'b', 'c']);
  });

  it('isolates rejections', async () => {
    const results = await mapWithConcurrency([1, 2], 2, async (n) => {
      if (n === 1) throw new Error('boom');
      return n;
    });

    expect(results[0].status).toBe('rejected');
    expect(results[1]).toEqual({ status: 'fulfilled', value: 2 });
  });
});
