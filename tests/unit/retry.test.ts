import { describe, expect, it, vi } from 'vitest';
import { TransientNetworkError } from '../../src/utils/errors';
import { backoffDelay, isTransient, RetryOptions, sleep, withRetry, withTimeout } from '../../src/utils/retry';

const fast: RetryOptions = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0, retryCondition: isTransient };

describe('backoffDelay', () => {
  const options: RetryOptions = { attempts: 5, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 };

  it('grows exponentially up to the cap', () => {
    expect(backoffDelay(0, options)).toBe(100);
    expect(backoffDelay(3, options)).toBe(800);
    expect(backoffDelay(5, options)).toBe(1000);
  });

  it('adds jitter on top', () => {
    expect(backoffDelay(0, { ...options, jitterMs: 100, random: () => 0.5 })).toBe(150);
  });
});

describe('withRetry', () => {
  it('retries transient failures until one succeeds', async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls++;
      if (calls < 3) throw new TransientNetworkError('timed out', 'ETIMEDOUT');
      return 'ok';
    }, fast);

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('does not retry errors outside the retry condition', async () => {
    const fn = vi.fn(async () => {
      throw new Error('boom');
    });

    await expect(withRetry(fn, fast)).rejects.toThrow('boom');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured attempts with the last error', async () => {
    let calls = 0;
    const run = withRetry(async () => {
      calls++;
      throw new TransientNetworkError(`attempt ${calls}`, 'ECONNRESET');
    }, { ...fast, attempts: 2 });

    await expect(run).rejects.toThrow('attempt 2');
    expect(calls).toBe(2);
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    let calls = 0;
    await withRetry(async () => {
      calls++;
      if (calls === 1) throw new TransientNetworkError('reset', 'ECONNRESET');
      return calls;
    }, { ...fast, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][1]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(0);
  });
});

describe('isTransient', () => {
  it('recognizes socket error codes', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    expect(isTransient(refused)).toBe(true);
    expect(isTransient(new Error('550 no such user'))).toBe(false);
  });
});

describe('withTimeout', () => {
  it('rejects with a timeout error when the promise hangs', async () => {
    const hanging = new Promise<never>(() => {});
    const error = await withTimeout(hanging, 20, 'DNS MX example.test').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientNetworkError);
    if (!(error instanceof TransientNetworkError)) return;
    expect(error.errno).toBe('ETIMEDOUT');
    expect(error.message).toBe('DNS MX example.test timed out after 20ms');
  });

  it('passes through a settled value', async () => {
    await expect(withTimeout(Promise.resolve(7), 20, 'x')).resolves.toBe(7);
  });
});

describe('sleep', () => {
  it('ends early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
