/**
 * Tests for fetch-retry backoff policy
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_RETRY_CONFIG,
  RetryAbortedError,
  calculateBackoffDelay,
  decideErrorRetry,
  decideResponseRetry,
  isRetryableStatus,
  mergeConfig,
  parseRetryAfter,
  sleep,
  MAX_DELAY_MS,
} from '../src/config.mjs';

describe('calculateBackoffDelay', () => {
  it('should double from one second and cap at thirty', () => {
    const delays = [1, 2, 3, 4, 5, 6, 7].map((attempt) => calculateBackoffDelay(attempt));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
  });

  it('should honour custom base and cap', () => {
    expect(calculateBackoffDelay(3, { baseDelayMs: 100, maxDelayMs: 250 })).toBe(250);
    expect(calculateBackoffDelay(2, { baseDelayMs: 100 })).toBe(200);
  });

  it('should treat attempt 0 like the first attempt', () => {
    expect(calculateBackoffDelay(0)).toBe(1000);
  });
});

describe('parseRetryAfter', () => {
  it.each([
    ['', 1000],
    ['5', 5000],
    ['0', 0],
    [' 7 ', 7000],
    ['invalid', 1000],
    ['-3', 1000],
    ['1.5', 1000],
    ['Wed, 21 Oct 2015 07:28:00 GMT', 1000],
  ])('should parse %j as %i ms', (value, expected) => {
    expect(parseRetryAfter(value)).toBe(expected);
  });

  it('should fall back for missing values', () => {
    expect(parseRetryAfter(undefined)).toBe(1000);
    expect(parseRetryAfter(null, 60000)).toBe(60000);
  });

  it('should cap waits at the longest timer delay', () => {
    expect(parseRetryAfter('2147484')).toBe(MAX_DELAY_MS);
    expect(parseRetryAfter('99999999999')).toBe(2_147_483_647);
    expect(parseRetryAfter('2147483')).toBe(2_147_483_000);
  });
});

describe('isRetryableStatus', () => {
  it('should retry 429 and 5xx only', () => {
    expect([200, 400, 401, 404, 428, 429, 499, 500, 503].map(isRetryableStatus)).toEqual([
      false, false, false, false, false, true, false, true, true,
    ]);
  });
});

describe('decideResponseRetry', () => {
  it('should not retry client errors', () => {
    expect(decideResponseRetry(404, undefined, 1)).toEqual({ retry: false });
  });

  it('should wait for Retry-After on 429', () => {
    expect(decideResponseRetry(429, '2', 3)).toEqual({
      retry: true,
      delayMs: 2000,
      reason: 'rate-limit',
      status: 429,
    });
  });

  it('should use the configured default when Retry-After is unusable', () => {
    expect(decideResponseRetry(429, 'soon', 1, { defaultRetryAfterMs: 500 })).toMatchObject({
      delayMs: 500,
    });
  });

  it('should back off on server errors', () => {
    expect(decideResponseRetry(502, '9', 2)).toEqual({
      retry: true,
      delayMs: 2000,
      reason: 'server-error',
      status: 502,
    });
  });
});

describe('decideErrorRetry', () => {
  it('should back off network failures', () => {
    expect(decideErrorRetry(3)).toEqual({ retry: true, delayMs: 4000, reason: 'network' });
  });
});

describe('mergeConfig', () => {
  it('should fill defaults', () => {
    expect(mergeConfig()).toEqual(DEFAULT_RETRY_CONFIG);
    expect(mergeConfig({ maxRetries: 0 }).maxRetries).toBe(0);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should reject immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(RetryAbortedError);
  });

  it('should reject as soon as the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(30000, controller.signal);
    const assertion = expect(pending).rejects.toThrow('Retry aborted');

    await vi.advanceTimersByTimeAsync(10);
    controller.abort(new Error('stop'));

    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });
});
