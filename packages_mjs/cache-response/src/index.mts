/**
 * @webextract/cache-response
 *
 * Cache-Control aware response caching:
 * - Directive parsing (no-store, no-cache, private, max-age, stale-while-revalidate)
 * - Entries only for responses with an explicit freshness window
 * - Stale-while-revalidate grace window on reads
 * - Pluggable storage behind the CacheStore interface
 * - Bounded in-memory FIFO store
 *
 * @example
 * ```typescript
 * import { ResponseCache, MemoryCacheStore, generateCacheKey } from '@webextract/cache-response';
 *
 * const cache = new ResponseCache({ store: new MemoryCacheStore({ maxEntries: 500 }) });
 * const key = generateCacheKey('GET', 'https://api.example.com/users', authHash);
 *
 * const lookup = await cache.lookup(key);
 * if (lookup.found) {
 *   return lookup.entry.value;
 * }
 *
 * const response = await fetch('https://api.example.com/users');
 * const payload = await response.json();
 * await cache.store(key, payload, response.headers.get('cache-control'));
 * ```
 */

// Types
export type {
  CacheControlDirectives,
  CacheEntry,
  CacheFreshness,
  CacheStore,
  CacheLookupResult,
  CacheResponseEventType,
  CacheResponseEvent,
  CacheResponseEventListener,
} from './types.mjs';

// Parser utilities
export {
  nowSeconds,
  parseCacheControl,
  buildCacheControl,
  createCacheEntry,
  determineFreshness,
} from './parser.mjs';

// Cache manager
export {
  ResponseCache,
  createResponseCache,
  generateCacheKey,
  type ResponseCacheOptions,
} from './cache.mjs';

// Stores
export {
  MemoryCacheStore,
  createMemoryCacheStore,
  DEFAULT_MAX_ENTRIES,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './stores/index.mjs';
