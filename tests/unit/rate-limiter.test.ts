import { describe, expect, it, vi } from 'vitest';
import { DomainRateLimiter } from '../../src/modules/rate-limiter';
import { CancelledError } from '../../src/utils/errors';

describe('DomainRateLimiter', () => {
  it('spaces reservations for one domain at the configured rate', () => {
    let now = 0;
    const limiter = new DomainRateLimiter({ ratePerSecond: 2, burst: 1, now: () => now });

    expect(limiter.reserve('a.com')).toBe(0);
    expect(limiter.reserve('a.com')).toBe(500);
    expect(limiter.reserve('A.COM')).toBe(1000);

    now = 1000;
    expect(limiter.reserve('a.com')).toBe(500);
  });

  it('keeps separate buckets per domain', () => {
    const limiter = new DomainRateLimiter({ ratePerSecond: 1, now: () => 0 });

    expect(limiter.reserve('a.com')).toBe(0);
    expect(limiter.reserve('b.com')).toBe(0);
    expect(limiter.reserve('a.com')).toBe(1000);
  });

  it('allows a burst before waiting', () => {
    const limiter = new DomainRateLimiter({ ratePerSecond: 1, burst: 3, now: () => 0 });

    expect([1, 2, 3, 4].map(() => limiter.reserve('a.com'))).toEqual([0, 0, 0, 1000]);
  });

  it('never waits when disabled', () => {
    const limiter = new DomainRateLimiter({ ratePerSecond: 0 });

    expect(limiter.enabled).toBe(false);
    expect(limiter.reserve('a.com')).toBe(0);
    expect(limiter.reserve('a.com')).toBe(0);
  });

  it('sleeps for its own reservation on acquire', async () => {
    const wait = vi.fn(async () => {});
    const limiter = new DomainRateLimiter({ ratePerSecond: 4, now: () => 0, wait });

    await limiter.acquire('a.com');
    await limiter.acquire('a.com');

    expect(wait).toHaveBeenCalledTimes(1);
    expect(wait).toHaveBeenCalledWith(250, undefined);
  });

  it('rejects instead of granting a token when the wait is cancelled', async () => {
    const controller = new AbortController();
    const limiter = new DomainRateLimiter({ ratePerSecond: 1, burst: 1, now: () => 0 });

    await limiter.acquire('a.com', controller.signal);
    const waiting = limiter.acquire('a.com', controller.signal);
    setTimeout(() => controller.abort(), 10);

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });

  it('reserves nothing for an already cancelled caller', async () => {
    const controller = new AbortController();
    controller.abort();
    const limiter = new DomainRateLimiter({ ratePerSecond: 1, burst: 1, now: () => 0 });

    await expect(limiter.acquire('a.com', controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.reserve('a.com')).toBe(0);
  });
});
