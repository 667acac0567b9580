import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../src/core/rate-limiter.js';

function fakeTime() {
  const state = { now: 0, sleeps: [] as number[] };
  return {
    state,
    clock: () => state.now,
    sleep: async (ms: number) => {
      state.sleeps.push(ms);
      state.now += ms;
    },
  };
}

describe('RateLimiter', () => {
  it('allows a burst up to the per-second limit', () => {
    const t = fakeTime();
    const limiter = new RateLimiter(3, t.clock, t.sleep);
    expect([limiter.tryAcquire(), limiter.tryAcquire(), limiter.tryAcquire()]).toEqual([true, true, true]);
    expect(limiter.tryAcquire()).toBe(false);
  });

  it('waits for the next token when the bucket is empty', async () => {
    const t = fakeTime();
    const limiter = new RateLimiter(2, t.clock, t.sleep);

    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.waitTime()).toBe(500);

    await limiter.acquire();
    expect(t.state.sleeps[0]).toBe(500);
    expect(t.state.now).toBeGreaterThanOrEqual(500);
  });

  it('does not sleep while tokens remain', async () => {
    const t = fakeTime();
    const limiter = new RateLimiter(10, t.clock, t.sleep);
    for (let i = 0; i < 10; i++) await limiter.acquire();
    expect(t.state.sleeps).toEqual([]);
  });

  it('refills over time without exceeding the burst size', () => {
    const t = fakeTime();
    const limiter = new RateLimiter(2, t.clock, t.sleep);
    limiter.tryAcquire();
    limiter.tryAcquire();

    t.state.now += 10_000;
    expect([limiter.tryAcquire(), limiter.tryAcquire(), limiter.tryAcquire()]).toEqual([true, true, false]);
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RateLimiter(0)).toThrow(RangeError);
  });
});
