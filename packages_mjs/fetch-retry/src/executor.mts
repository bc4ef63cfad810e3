/**
 * Main retry executor implementation
 */

import type {
  RetryConfig,
  RetryDecision,
  RetryOptions,
  RetryResult,
  RetryEvent,
  RetryEventListener,
} from './types.mjs';
import {
  NO_RETRY,
  RetryAbortedError,
  decideErrorRetry,
  mergeConfig,
  sleep,
} from './config.mjs';

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Retry Executor
 *
 * Runs an operation as a bounded, strictly sequential sequence of attempts:
 * - At most maxRetries + 1 attempts, never concurrently
 * - Per-outcome retry decisions for resolved results and thrown errors
 * - Abort signal support, including during backoff waits
 * - Event emission for observability
 */
export class RetryExecutor {
  private readonly config: Required<RetryConfig>;
  private readonly listeners: Set<RetryEventListener> = new Set();

  /**
   * Create a new RetryExecutor
   *
   * @param config - Retry executor configuration
   */
  constructor(config: RetryConfig = {}) {
    this.config = mergeConfig(config);
  }

  private emit(event: RetryEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /**
   * Execute a function with retry logic
   *
   * @param fn - Async function to execute, given the 1-based attempt number
   * @param options - Retry options for this execution
   * @returns Promise resolving to the final result with retry metadata
   *
   * @example
   * const executor = new RetryExecutor({ maxRetries: 3 });
   * const { result } = await executor.execute(
   *   () => transport.send(request),
   *   { retryOnResult: (res, attempt) => decideResponseRetry(res.status, res.headers['retry-after'], attempt) }
   * );
   */
  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions<T> = {}
  ): Promise<RetryResult<T>> {
    const {
      maxRetries = this.config.maxRetries,
      signal,
      metadata,
      retryOnResult,
      retryOnError = (_error: Error, attempt: number) => decideErrorRetry(attempt, this.config),
    } = options;
    const startTime = Date.now();
    let delayTime = 0;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        this.emit({ type: 'retry:abort', attempt, reason: 'Aborted by signal', metadata });
        throw new RetryAbortedError({ cause: signal.reason });
      }

      this.emit({ type: 'attempt:start', attempt, metadata });

      const attemptStart = Date.now();
      const canRetry = attempt <= maxRetries;
      let decision: RetryDecision;
      let failure: Error | undefined;
      let result: T | undefined;

      try {
        result = await fn(attempt);
        decision = canRetry && retryOnResult ? retryOnResult(result, attempt) : NO_RETRY;

        if (!decision.retry) {
          this.emit({
            type: 'attempt:success',
            attempt,
            durationMs: Date.now() - attemptStart,
            metadata,
          });

          return {
            result,
            attempts: attempt,
            totalTimeMs: Date.now() - startTime,
            delayTimeMs: delayTime,
          };
        }
      } catch (error) {
        failure = toError(error);
        decision = canRetry ? retryOnError(failure, attempt) : NO_RETRY;

        this.emit({
          type: 'attempt:fail',
          attempt,
          error: failure,
          willRetry: decision.retry,
          metadata,
        });

        if (!decision.retry) {
          throw failure;
        }
      }

      delayTime += decision.delayMs;

      this.emit({
        type: 'retry:wait',
        attempt,
        maxRetries,
        delayMs: decision.delayMs,
        reason: decision.reason,
        status: decision.status,
        error: failure,
        metadata,
      });

      try {
        await sleep(decision.delayMs, signal);
      } catch (error) {
        this.emit({ type: 'retry:abort', attempt, reason: 'Aborted during backoff', metadata });
        throw error;
      }
    }
  }

  /**
   * Add an event listener
   *
   * @param listener - Event listener function
   * @returns Function to remove the listener
   */
  on(listener: RetryEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove an event listener
   */
  off(listener: RetryEventListener): void {
    this.listeners.delete(listener);
  }
}
