import { describe, it, expect } from 'vitest';
import { systemClock } from '../fetch/clock.js';
import { HostThrottle } from '../fetch/host-throttle.js';
import { FakeClock } from './test-helpers.js';

/** Wakes 1 ms before the requested time, like a timer firing early. */
class EarlyClock extends FakeClock {
  override sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return super.sleep(ms > 1 ? ms - 1 : ms, signal);
  }
}

describe('HostThrottle', () => {
  it('lets the first request through immediately', async () => {
    const clock = new FakeClock(1000);
    const throttle = new HostThrottle(clock);

    expect(await throttle.acquire('example.com', 500)).toBe(true);
    expect(throttle.lastRequest('example.com')).toBe(1000);
    expect(clock.sleeps).toEqual([]);
  });

  it('waits out the remainder of the delay', async () => {
    const clock = new FakeClock();
    const throttle = new HostThrottle(clock);

    await throttle.acquire('example.com', 500);
    await clock.sleep(200);
    await throttle.acquire('example.com', 500);

    expect(clock.sleeps).toEqual([200, 300]);
    expect(throttle.lastRequest('example.com')).toBe(500);
  });

  it('serializes concurrent callers for one host', async () => {
    const clock = new FakeClock();
    const throttle = new HostThrottle(clock);

    const results = await Promise.all([1, 2, 3].map(() => throttle.acquire('example.com', 100)));

    expect(results).toEqual([true, true, true]);
    expect(clock.sleeps).toEqual([100, 100]);
    expect(throttle.lastRequest('example.com')).toBe(200);
  });

  it('keeps waiting when the clock wakes early', async () => {
    const clock = new EarlyClock();
    const throttle = new HostThrottle(clock);

    await throttle.acquire('example.com', 100);
    await throttle.acquire('example.com', 100);

    expect(clock.sleeps).toEqual([99, 1]);
    expect(throttle.lastRequest('example.com')).toBe(100);
  });

  it('never starts two requests closer than the delay on the system clock', async () => {
    const throttle = new HostThrottle(systemClock);
    const starts: number[] = [];

    for (let i = 0; i < 150; i++) {
      await throttle.acquire('example.com', 3);
      starts.push(throttle.lastRequest('example.com') ?? Number.NaN);
    }

    const gaps = starts.slice(1).map((start, i) => start - starts[i]);
    expect(Math.min(...gaps)).toBeGreaterThanOrEqual(3);
  });

  it('tracks hosts independently', async () => {
    const clock = new FakeClock();
    const throttle = new HostThrottle(clock);

    await throttle.acquire('a.test', 100);
    await throttle.acquire('b.test', 100);

    expect(throttle.lastRequest('a.test')).toBe(0);
    expect(throttle.lastRequest('b.test')).toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('returns false without recording when aborted', async () => {
    const clock = new FakeClock();
    const throttle = new HostThrottle(clock);
    const controller = new AbortController();

    await throttle.acquire('example.com', 100);
    controller.abort();

    expect(await throttle.acquire('example.com', 100, controller.signal)).toBe(false);
    expect(throttle.lastRequest('example.com')).toBe(0);
  });

  it('lets later callers proceed after an aborted one', async () => {
    const clock = new FakeClock();
    const throttle = new HostThrottle(clock);
    const controller = new AbortController();
    controller.abort();

    await throttle.acquire('example.com', 100);
    const [aborted, next] = await Promise.all([
      throttle.acquire('example.com', 100, controller.signal),
      throttle.acquire('example.com', 100),
    ]);

    expect(aborted).toBe(false);
    expect(next).toBe(true);
    expect(throttle.lastRequest('example.com')).toBe(100);
  });
});
