/**
 * @webextract/fetch-retry
 * Exponential backoff policy, Retry-After parsing and a bounded retry loop
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';

// Policy exports
export * from './config.mjs';

// Executor exports
export * from './executor.mjs';
