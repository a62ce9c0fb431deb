import { describe, expect, it } from 'vitest';
import { RequestThrottler } from '@/utils/throttler';

describe('RequestThrottler', () => {
  it('starts tasks in submission order', async () => {
    const throttler = new RequestThrottler();
    const started: string[] = [];

    const results = await Promise.all(
      ['a', 'b', 'c'].map((id) =>
        throttler.schedule(async () => {
          started.push(id);
          return id.toUpperCase();
        })
      )
    );

    expect(started).toEqual(['a', 'b', 'c']);
    expect(results).toEqual(['A', 'B', 'C']);
  });

  it('keeps running after a failed task', async () => {
    const throttler = new RequestThrottler();

    const failing = throttler.schedule(async () => {
      throw new Error('boom');
    });
    const next = throttler.schedule(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('spaces out task starts', async () => {
    const throttler = new RequestThrottler(20);
    const starts: number[] = [];

    await Promise.all(
      [1, 2].map(() =>
        throttler.schedule(async () => {
          starts.push(Date.now());
        })
      )
    );

    expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(19);
  });
});

describe('RequestThrottler stats', () => {
  it('counts completed and failed tasks', async () => {
    const throttler = new RequestThrottler();

    await throttler.schedule(async () => 1);
    await expect(
      throttler.schedule(async () => {
        throw new Error('nope');
      })
    ).rejects.toThrow('nope');

    expect(throttler.getStats()).toEqual({ scheduled: 2, completed: 1, failed: 1 });
  });
});
