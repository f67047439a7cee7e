import { describe, expect, it } from 'vitest';
import { RequestThrottler } from '@/utils/throttler';
import { makeClock } from '../helpers/fakes';

describe('RequestThrottler', () => {
  it('does not wait before the first call', async () => {
    const clock = makeClock(0);
    const throttler = new RequestThrottler(1000, clock);

    expect(throttler.getWaitMs()).toBe(0);
    await throttler.schedule(async () => 'first');
    expect(clock.sleeps).toEqual([]);
  });

  it('waits the remainder of the interval since the last completed call', async () => {
    const clock = makeClock(0);
    const throttler = new RequestThrottler(1000, clock);

    await throttler.schedule(async () => {
      throttler.markCompleted();
    });
    clock.advance(300);
    await throttler.schedule(async () => 'second');

    expect(clock.sleeps).toEqual([700]);
  });

  it('runs tasks in FIFO order', async () => {
    const clock = makeClock(0);
    const throttler = new RequestThrottler(0, clock);
    const order: string[] = [];

    await Promise.all([
      throttler.schedule(async () => order.push('a')),
      throttler.schedule(async () => order.push('b')),
      throttler.schedule(async () => order.push('c')),
    ]);

    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('keeps the chain running after a task rejects', async () => {
    const throttler = new RequestThrottler(0, makeClock(0));

    const failing = throttler.schedule(async () => {
      throw new Error('boom');
    });
    const next = throttler.schedule(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
