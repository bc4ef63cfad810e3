/**
 * Logger adapters for @webextract/client
 */
import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import type { Logger } from './types.mjs';

const SENSITIVE_HEADERS = new Set(['authorization', 'x-api-key']);

/**
 * Discards everything. Default when no logger is configured.
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Wrap a pino instance in the Logger interface.
 * Metadata becomes the merging object, the message stays the message.
 */
export function createPinoLogger(instance: PinoLogger = pino({ name: 'webextract' })): Logger {
  return {
    debug: (message, meta) => instance.debug(meta ?? {}, message),
    info: (message, meta) => instance.info(meta ?? {}, message),
    warn: (message, meta) => instance.warn(meta ?? {}, message),
    error: (message, meta) => instance.error(meta ?? {}, message),
  };
}

/**
 * Mask auth header values for safe logging
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked = { ...headers };
  for (const key of Object.keys(masked)) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      const value = masked[key];
      if (value.length > 10) {
        masked[key] = value.slice(0, 10) + '*'.repeat(value.length - 10);
      } else {
        masked[key] = '*'.repeat(value.length);
      }
    }
  }
  return masked;
}
