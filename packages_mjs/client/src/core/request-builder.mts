/**
 * Request builder utilities for @webextract/client
 */
import type { ResolvedConfig } from '../config.mjs';
import type { QueryValue } from '../types.mjs';

/**
 * Build the full URL from base and path. Undefined query values are dropped.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, QueryValue>
): string {
  const url = new URL(baseUrl + path);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
  }

  return url.toString();
}

/**
 * Headers sent on every attempt
 */
export function buildHeaders(config: ResolvedConfig): Record<string, string> {
  return {
    authorization: `Bearer ${config.apiKey}`,
    'content-type': 'application/json',
    accept: 'application/json',
    'user-agent': config.userAgent,
  };
}

export function serializeBody(body: unknown): string | undefined {
  return body === undefined ? undefined : JSON.stringify(body);
}

/**
 * Per-attempt abort scope
 */
export interface AttemptSignal {
  signal: AbortSignal;
  /** True once the attempt's own deadline fired */
  timedOut(): boolean;
  /** Clear the timer and detach from the parent signal */
  release(): void;
}

/**
 * Create a signal that aborts when the parent aborts or the timeout elapses
 */
export function createAttemptSignal(timeoutMs: number, parent?: AbortSignal): AttemptSignal {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    release: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
