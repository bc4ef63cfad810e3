/**
 * Type definitions for fetch-retry
 */

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt. Default: 3 */
  maxRetries?: number;
  /** Delay before the first retry (ms); doubles per attempt. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum backoff delay (ms). Default: 30000 */
  maxDelayMs?: number;
  /** Wait used when a 429 carries no usable Retry-After (ms). Default: 1000 */
  defaultRetryAfterMs?: number;
}

/**
 * Why an attempt is being retried
 */
export type RetryReason = 'network' | 'rate-limit' | 'server-error';

/**
 * Outcome of a retry policy check
 */
export type RetryDecision =
  | { retry: false }
  | { retry: true; delayMs: number; reason: RetryReason; status?: number };

/**
 * Options for individual retry operations
 */
export interface RetryOptions<T> {
  /** Override max retries for this operation */
  maxRetries?: number;
  /** Signal for cancellation; aborts pending waits immediately */
  signal?: AbortSignal;
  /** Metadata for logging/debugging */
  metadata?: Record<string, unknown>;
  /** Decide whether a resolved attempt should be retried. Default: never */
  retryOnResult?: (result: T, attempt: number) => RetryDecision;
  /** Decide whether a failed attempt should be retried. Default: network backoff */
  retryOnError?: (error: Error, attempt: number) => RetryDecision;
}

/**
 * Result of a retried operation
 */
export interface RetryResult<T> {
  /** The result of the final attempt */
  result: T;
  /** Number of attempts made (1 if the first attempt was final) */
  attempts: number;
  /** Total time spent including retries (ms) */
  totalTimeMs: number;
  /** Time spent in backoff delays (ms) */
  delayTimeMs: number;
}

/**
 * Events emitted by the retry executor. Attempts are 1-based.
 */
export type RetryEvent =
  | { type: 'attempt:start'; attempt: number; metadata?: Record<string, unknown> }
  | { type: 'attempt:success'; attempt: number; durationMs: number; metadata?: Record<string, unknown> }
  | { type: 'attempt:fail'; attempt: number; error: Error; willRetry: boolean; metadata?: Record<string, unknown> }
  | {
      type: 'retry:wait';
      attempt: number;
      maxRetries: number;
      delayMs: number;
      reason: RetryReason;
      status?: number;
      error?: Error;
      metadata?: Record<string, unknown>;
    }
  | { type: 'retry:abort'; attempt: number; reason: string; metadata?: Record<string, unknown> };

/**
 * Event listener type
 */
export type RetryEventListener = (event: RetryEvent) => void;
