/**
 * Cache store implementations
 */

export {
  MemoryCacheStore,
  createMemoryCacheStore,
  DEFAULT_MAX_ENTRIES,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './memory.mjs';
