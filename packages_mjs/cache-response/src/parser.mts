/**
 * Cache-Control header parsing and cache entry utilities
 */

import type { CacheControlDirectives, CacheEntry, CacheFreshness } from './types.mjs';

const INTEGER_PATTERN = /^\d+$/;

/**
 * Current time as a Unix timestamp in seconds
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || !INTEGER_PATTERN.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Parse Cache-Control header into directives
 *
 * Tokens are matched case-insensitively. Unknown directives and malformed
 * values are ignored.
 */
export function parseCacheControl(header: string | undefined | null): CacheControlDirectives {
  let noStore = false;
  let noCache = false;
  let isPrivate = false;
  let maxAge: number | undefined;
  let staleWhileRevalidate: number | undefined;

  if (header) {
    const parts = header.toLowerCase().split(',').map((p) => p.trim());

    for (const part of parts) {
      const separator = part.indexOf('=');
      const key = separator === -1 ? part : part.slice(0, separator).trim();
      const value = separator === -1 ? undefined : part.slice(separator + 1).trim();

      switch (key) {
        case 'no-store':
          noStore = true;
          break;
        case 'no-cache':
          noCache = true;
          break;
        case 'private':
          isPrivate = true;
          break;
        case 'max-age': {
          const seconds = parseSeconds(value);
          if (seconds !== undefined) maxAge = seconds;
          break;
        }
        case 'stale-while-revalidate': {
          const seconds = parseSeconds(value);
          if (seconds !== undefined) staleWhileRevalidate = seconds;
          break;
        }
      }
    }
  }

  const directives: CacheControlDirectives = {
    noStore,
    noCache,
    private: isPrivate,
    ...(maxAge !== undefined ? { maxAge } : {}),
    ...(staleWhileRevalidate !== undefined ? { staleWhileRevalidate } : {}),
  };

  return Object.freeze(directives);
}

/**
 * Build Cache-Control header from directives
 */
export function buildCacheControl(directives: CacheControlDirectives): string {
  const parts: string[] = [];

  if (directives.noStore) parts.push('no-store');
  if (directives.noCache) parts.push('no-cache');
  if (directives.private) parts.push('private');
  if (directives.maxAge !== undefined) parts.push(`max-age=${directives.maxAge}`);
  if (directives.staleWhileRevalidate !== undefined) {
    parts.push(`stale-while-revalidate=${directives.staleWhileRevalidate}`);
  }

  return parts.join(', ');
}

/**
 * Create a cache entry from a response payload and its Cache-Control header.
 *
 * Returns null when the response must not be cached: `no-store` is set, or
 * the server gave no explicit `max-age`.
 */
export function createCacheEntry<T>(
  value: T,
  cacheControlHeader: string | undefined | null,
  now: number = nowSeconds()
): CacheEntry<T> | null {
  const directives = parseCacheControl(cacheControlHeader);

  if (directives.noStore || directives.maxAge === undefined) {
    return null;
  }

  return {
    value,
    expiresAt: now + directives.maxAge,
    directives,
  };
}

/**
 * Determine freshness status of a cached entry
 */
export function determineFreshness(entry: CacheEntry, now: number = nowSeconds()): CacheFreshness {
  if (now <= entry.expiresAt) {
    return 'fresh';
  }

  const { staleWhileRevalidate } = entry.directives;
  if (staleWhileRevalidate !== undefined && now < entry.expiresAt + staleWhileRevalidate) {
    return 'stale';
  }

  return 'expired';
}
