/**
 * Types for Cache-Control aware response caching
 */

/**
 * Parsed Cache-Control directives
 */
export interface CacheControlDirectives {
  /** Response must not be stored */
  readonly noStore: boolean;
  /** Response must be revalidated before use */
  readonly noCache: boolean;
  /** Response is private (user-specific) */
  readonly private: boolean;
  /** Freshness lifetime in seconds */
  readonly maxAge?: number;
  /** Grace window in seconds during which an expired entry may still be served */
  readonly staleWhileRevalidate?: number;
}

/**
 * Cached response payload
 */
export interface CacheEntry<T = unknown> {
  /** Decoded response payload */
  value: T;
  /** When the entry expires (Unix timestamp, seconds) */
  expiresAt: number;
  /** Directives the entry was created from */
  directives: CacheControlDirectives;
}

/**
 * Cache freshness status
 */
export type CacheFreshness = 'fresh' | 'stale' | 'expired';

/**
 * Cache store interface
 *
 * The minimal capability a response cache needs. Implementations may be
 * remote (Redis, memcached), so every operation is asynchronous.
 */
export interface CacheStore {
  /**
   * Get a usable entry by key, or null when absent or fully expired
   */
  get(key: string): Promise<CacheEntry | null>;

  /**
   * Store an entry
   */
  set(key: string, entry: CacheEntry): Promise<void>;

  /**
   * Delete an entry
   */
  delete(key: string): Promise<boolean>;
}

/**
 * Result of a cache lookup
 */
export type CacheLookupResult =
  | { found: true; entry: CacheEntry; freshness: Exclude<CacheFreshness, 'expired'> }
  | { found: false };

/**
 * Event types for cache operations
 */
export type CacheResponseEventType =
  | 'cache:hit'
  | 'cache:stale-serve'
  | 'cache:miss'
  | 'cache:store'
  | 'cache:bypass';

/**
 * Cache event
 */
export interface CacheResponseEvent {
  type: CacheResponseEventType;
  key: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

/**
 * Event listener type
 */
export type CacheResponseEventListener = (event: CacheResponseEvent) => void;
