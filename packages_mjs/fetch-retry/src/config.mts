/**
 * Backoff policy and retry decisions for fetch-retry
 */

import type { RetryConfig, RetryDecision } from './types.mjs';

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  defaultRetryAfterMs: 1000,
};

/**
 * Status code that is retried after the server's Retry-After wait
 */
export const RATE_LIMIT_STATUS = 429;

/**
 * Longest wait a Node.js timer can hold; larger delays fire immediately
 */
export const MAX_DELAY_MS = 2_147_483_647;

export const NO_RETRY: RetryDecision = Object.freeze({ retry: false });

/**
 * Thrown when a retry sequence is cancelled through its abort signal
 */
export class RetryAbortedError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Retry aborted', options);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Calculate exponential backoff delay
 *
 * delay = min(maxDelay, baseDelay * 2^(attempt - 1))
 *
 * With the defaults, attempts 1..7 wait 1s, 2s, 4s, 8s, 16s, 30s, 30s.
 *
 * @param attempt - The attempt that just failed (1-based)
 * @param config - Retry configuration
 * @returns Delay in milliseconds
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig = {}): number {
  const {
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
  } = config;

  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, exponent));
}

/**
 * Parse Retry-After header value
 *
 * Only the delay-seconds form is understood. Anything else, including an
 * absent header, yields the default. Waits are capped at MAX_DELAY_MS.
 *
 * @param value - Retry-After header value
 * @param defaultMs - Wait to use when the header is missing or not a number
 * @returns Wait time in milliseconds
 */
export function parseRetryAfter(
  value: string | null | undefined,
  defaultMs: number = DEFAULT_RETRY_CONFIG.defaultRetryAfterMs
): number {
  if (!value) {
    return defaultMs;
  }

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return defaultMs;
  }

  return Math.min(MAX_DELAY_MS, parseInt(trimmed, 10) * 1000);
}

/**
 * Check if an HTTP status code should trigger a retry
 */
export function isRetryableStatus(status: number): boolean {
  return status === RATE_LIMIT_STATUS || status >= 500;
}

/**
 * Decide whether an HTTP response should be retried
 *
 * 429 waits for the server's Retry-After; 5xx waits the computed backoff.
 *
 * @param status - Response status code
 * @param retryAfter - Retry-After header value, if any
 * @param attempt - The attempt that produced the response (1-based)
 * @param config - Retry configuration
 */
export function decideResponseRetry(
  status: number,
  retryAfter: string | undefined,
  attempt: number,
  config: RetryConfig = {}
): RetryDecision {
  if (!isRetryableStatus(status)) {
    return NO_RETRY;
  }

  if (status === RATE_LIMIT_STATUS) {
    return {
      retry: true,
      delayMs: parseRetryAfter(retryAfter, config.defaultRetryAfterMs),
      reason: 'rate-limit',
      status,
    };
  }

  return {
    retry: true,
    delayMs: calculateBackoffDelay(attempt, config),
    reason: 'server-error',
    status,
  };
}

/**
 * Decide how long to wait after a network-level failure
 */
export function decideErrorRetry(attempt: number, config: RetryConfig = {}): RetryDecision {
  return {
    retry: true,
    delayMs: calculateBackoffDelay(attempt, config),
    reason: 'network',
  };
}

/**
 * Merge configurations with defaults
 *
 * @param config - User-provided configuration
 * @returns Complete configuration with defaults
 */
export function mergeConfig(config: RetryConfig = {}): Required<RetryConfig> {
  return {
    maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    defaultRetryAfterMs: config.defaultRetryAfterMs ?? DEFAULT_RETRY_CONFIG.defaultRetryAfterMs,
  };
}

/**
 * Sleep for a specified duration
 *
 * @param ms - Duration in milliseconds
 * @param signal - Optional abort signal
 * @returns Promise that resolves after the delay, or rejects with
 *   RetryAbortedError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError({ cause: signal.reason }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new RetryAbortedError({ cause: signal?.reason }));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
