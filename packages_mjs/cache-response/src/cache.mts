/**
 * Response cache manager
 */

import type {
  CacheStore,
  CacheEntry,
  CacheLookupResult,
  CacheResponseEvent,
  CacheResponseEventListener,
} from './types.mjs';
import { createCacheEntry, determineFreshness, nowSeconds } from './parser.mjs';
import { MemoryCacheStore } from './stores/memory.mjs';

/**
 * Generate the cache key for a request.
 *
 * The credential hash keeps responses fetched with one API key from being
 * served to another client sharing the same store.
 */
export function generateCacheKey(method: string, url: string, authHash?: string): string {
  const parts = [method.toUpperCase(), url];
  if (authHash) {
    parts.push(authHash);
  }
  return parts.join(':');
}

/**
 * Options for the response cache
 */
export interface ResponseCacheOptions {
  /** Backing store. Default: MemoryCacheStore with 100 entries */
  store?: CacheStore;
  /** Clock returning Unix seconds. Default: wall clock */
  now?: () => number;
}

/**
 * ResponseCache - stores decoded payloads under Cache-Control rules
 *
 * Payloads are copied on the way in and on every hit, so callers never hold
 * a reference to a stored value.
 *
 * Only responses with an explicit `max-age` and no `no-store` are stored.
 * Entries past their freshness lifetime are still returned while inside a
 * `stale-while-revalidate` window; nothing revalidates them in the
 * background.
 *
 * @example
 * const cache = new ResponseCache();
 * const key = generateCacheKey('GET', url, authHash);
 *
 * const lookup = await cache.lookup(key);
 * if (lookup.found) {
 *   return lookup.entry.value;
 * }
 *
 * const payload = await fetchPayload(url);
 * await cache.store(key, payload, headers['cache-control']);
 */
export class ResponseCache {
  private readonly backing: CacheStore;
  private readonly now: () => number;
  private readonly listeners: Set<CacheResponseEventListener> = new Set();

  constructor(options: ResponseCacheOptions = {}) {
    this.now = options.now ?? nowSeconds;
    this.backing = options.store ?? new MemoryCacheStore({ now: this.now });
  }

  /**
   * Look up a cached entry
   */
  async lookup(key: string): Promise<CacheLookupResult> {
    const entry = await this.backing.get(key);

    if (!entry) {
      this.emit({ type: 'cache:miss', key, timestamp: Date.now() });
      return { found: false };
    }

    // Custom stores may hand back entries they have not expired themselves
    const freshness = determineFreshness(entry, this.now());

    if (freshness === 'expired') {
      await this.backing.delete(key);
      this.emit({ type: 'cache:miss', key, timestamp: Date.now(), metadata: { expired: true } });
      return { found: false };
    }

    this.emit({
      type: freshness === 'fresh' ? 'cache:hit' : 'cache:stale-serve',
      key,
      timestamp: Date.now(),
      metadata: { expiresAt: entry.expiresAt },
    });

    return { found: true, entry: { ...entry, value: structuredClone(entry.value) }, freshness };
  }

  /**
   * Store a payload if its Cache-Control header allows it
   *
   * @returns The stored entry, or null when the response is not cacheable
   */
  async store<T>(
    key: string,
    value: T,
    cacheControlHeader: string | undefined | null
  ): Promise<CacheEntry<T> | null> {
    const entry = createCacheEntry(structuredClone(value), cacheControlHeader, this.now());

    if (!entry) {
      this.emit({
        type: 'cache:bypass',
        key,
        timestamp: Date.now(),
        metadata: { cacheControl: cacheControlHeader ?? null },
      });
      return null;
    }

    await this.backing.set(key, entry);

    this.emit({
      type: 'cache:store',
      key,
      timestamp: Date.now(),
      metadata: { expiresAt: entry.expiresAt },
    });

    return { ...entry, value };
  }

  /**
   * Remove a cached entry
   */
  async invalidate(key: string): Promise<boolean> {
    return this.backing.delete(key);
  }

  /**
   * Add event listener
   *
   * @returns Function to remove the listener
   */
  on(listener: CacheResponseEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: CacheResponseEventListener): void {
    this.listeners.delete(listener);
  }

  private emit(event: CacheResponseEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

/**
 * Create a response cache instance
 */
export function createResponseCache(options?: ResponseCacheOptions): ResponseCache {
  return new ResponseCache(options);
}
