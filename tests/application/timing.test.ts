import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_BACKOFF, calculateBackoff, sleep, withTimeout } from '../../src/application/timing.js';
import { OperationTimeoutError } from '../../src/domain/errors.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('calculateBackoff', () => {
  it('doubles from the initial delay', () => {
    expect([1, 2, 3, 4].map((attempt) => calculateBackoff(attempt, DEFAULT_BACKOFF))).toEqual([100, 200, 400, 800]);
  });

  it('caps at maxMs', () => {
    expect(calculateBackoff(20, DEFAULT_BACKOFF)).toBe(10_000);
  });

  it('treats attempt 0 like the first attempt', () => {
    expect(calculateBackoff(0, DEFAULT_BACKOFF)).toBe(100);
  });

  it('picks a delay in [0, computed] with full jitter', () => {
    const policy = { ...DEFAULT_BACKOFF, jitter: 'full' as const };

    expect(calculateBackoff(3, policy, () => 0)).toBe(0);
    expect(calculateBackoff(3, policy, () => 0.5)).toBe(200);
    expect(calculateBackoff(3, policy, () => 0.999_999)).toBe(400);
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(50).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(49);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early on abort', async () => {
    const ac = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, ac.signal);
    ac.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1_000);
  });
});

describe('withTimeout', () => {
  it('passes the result through', async () => {
    await expect(withTimeout(Promise.resolve(7), 100, 'op')).resolves.toBe(7);
  });

  it('rejects with OperationTimeoutError when the promise is too slow', async () => {
    vi.useFakeTimers();
    const slow = new Promise<number>(() => undefined);
    const bounded = withTimeout(slow, 100, 'PUB orders');
    const assertion = expect(bounded).rejects.toThrow(new OperationTimeoutError('PUB orders', 100));

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('does not bound the promise when the timeout is 0', async () => {
    await expect(withTimeout(Promise.resolve('x'), 0, 'op')).resolves.toBe('x');
  });
});
