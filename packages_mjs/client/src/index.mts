/**
 * @webextract/client
 * Typed client for the WebExtract web-extraction API
 * Pure ESM module
 */

// Client
export { WebExtractClient, createClient } from './client.mjs';
export { BaseClient } from './core/base-client.mjs';

// Types
export type * from './types.mjs';

// Configuration
export {
  SDK_VERSION,
  MIN_API_VERSION,
  MAX_KNOWN_API_VERSION,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_CACHE_MAX_ENTRIES,
  buildUserAgent,
  hashApiKey,
  resolveConfig,
  loadConfigFromEnv,
  type ResolvedConfig,
} from './config.mjs';

// Errors
export * from './errors.mjs';

// Version checks
export * from './version.mjs';

// Logging
export { noopLogger, createPinoLogger, maskHeaders } from './logger.mjs';

// Transport
export { UndiciTransport, normalizeResponseHeaders } from './transport/undici-transport.mjs';

// Models
export * from './schemas.mjs';

// Services
export { JobsService, type ListJobsOptions, type JobResultsOptions } from './services/jobs.mjs';
export { SchemasService } from './services/schemas.mjs';
export { SitesService } from './services/sites.mjs';
export { KeysService } from './services/keys.mjs';
export { LlmService } from './services/llm.mjs';

// Building blocks re-exported for custom stores and policies
export { MemoryCacheStore, type CacheStore, type CacheEntry } from '@webextract/cache-response';
export { calculateBackoffDelay, parseRetryAfter } from '@webextract/fetch-retry';
