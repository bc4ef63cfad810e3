/**
 * In-memory cache store with FIFO eviction
 */

import type { CacheStore, CacheEntry } from '../types.mjs';
import { determineFreshness, nowSeconds } from '../parser.mjs';

/**
 * Options for memory cache store
 */
export interface MemoryCacheStoreOptions {
  /** Maximum number of entries. Default: 100 */
  maxEntries?: number;
  /** Clock returning Unix seconds. Default: wall clock */
  now?: () => number;
}

/**
 * Memory cache statistics
 */
export interface MemoryCacheStats {
  entries: number;
  maxEntries: number;
  evictions: number;
  expirations: number;
}

export const DEFAULT_MAX_ENTRIES = 100;

/**
 * In-memory cache store bounded by entry count.
 *
 * Eviction is first-in-first-out: when a new key is inserted at capacity the
 * oldest inserted key goes first. Reads never promote an entry, and
 * overwriting a key keeps its original position.
 *
 * No operation awaits before touching the map, so each one completes
 * atomically on the event loop even with many requests in flight.
 */
export class MemoryCacheStore implements CacheStore {
  // Map iteration order is insertion order, which is the eviction queue.
  private readonly cache: Map<string, CacheEntry> = new Map();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private evictions = 0;
  private expirations = 0;

  constructor(options: MemoryCacheStoreOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    this.now = options.now ?? nowSeconds;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    // Stale entries inside their grace window are served as-is, never refreshed
    if (determineFreshness(entry, this.now()) === 'expired') {
      this.cache.delete(key);
      this.expirations++;
      return null;
    }

    return entry;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    if (entry.directives.noStore) {
      return;
    }

    if (!this.cache.has(key)) {
      while (this.cache.size >= this.maxEntries) {
        const oldestKey = this.cache.keys().next().value;
        if (oldestKey === undefined) break;
        this.cache.delete(oldestKey);
        this.evictions++;
      }
    }

    this.cache.set(key, entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  async size(): Promise<number> {
    return this.cache.size;
  }

  /**
   * Keys in eviction order, oldest first
   */
  async keys(): Promise<string[]> {
    return Array.from(this.cache.keys());
  }

  /**
   * Get cache statistics
   */
  getStats(): MemoryCacheStats {
    return {
      entries: this.cache.size,
      maxEntries: this.maxEntries,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }
}

/**
 * Create a memory cache store
 */
export function createMemoryCacheStore(
  options?: MemoryCacheStoreOptions
): MemoryCacheStore {
  return new MemoryCacheStore(options);
}
