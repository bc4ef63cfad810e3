/**
 * Configuration utilities for @webextract/client
 */
import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { ClientOptions } from './types.mjs';

export const SDK_VERSION = '0.1.0';

/** Oldest server API version this SDK can talk to */
export const MIN_API_VERSION = '1.0.0';

/** Newest server API version this SDK was built against */
export const MAX_KNOWN_API_VERSION = '2.0.0';

export const DEFAULT_BASE_URL = 'https://api.webextract.dev';
export const DEFAULT_TIMEOUT_MS = 30000;
/** setTimeout ceiling */
export const MAX_TIMEOUT_MS = 2_147_483_647;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_CACHE_MAX_ENTRIES = 100;

const versionString = z.string().regex(/^\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?$/, 'must be major.minor.patch');

const ClientOptionsSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  cacheEnabled: z.boolean().default(true),
  cacheMaxEntries: z.number().int().positive().default(DEFAULT_CACHE_MAX_ENTRIES),
  userAgentSuffix: z.string().optional(),
  minApiVersion: versionString.default(MIN_API_VERSION),
  maxKnownApiVersion: versionString.default(MAX_KNOWN_API_VERSION),
});

/**
 * Scalar configuration after validation and defaults
 */
export interface ResolvedConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  cacheEnabled: boolean;
  cacheMaxEntries: number;
  userAgent: string;
  authHash: string;
  minApiVersion: string;
  maxKnownApiVersion: string;
}

/**
 * Build the product User-Agent
 *
 * @example
 * buildUserAgent('my-app/1.2')
 * // 'WebExtract-SDK-TypeScript/0.1.0 (Node/20.11.1; linux/x64) my-app/1.2'
 */
export function buildUserAgent(suffix?: string): string {
  const nodeVersion = process.versions.node;
  const ua = `WebExtract-SDK-TypeScript/${SDK_VERSION} (Node/${nodeVersion}; ${process.platform}/${process.arch})`;
  return suffix ? `${ua} ${suffix}` : ua;
}

/**
 * Derive the credential fingerprint used in cache keys.
 * Never reversible to the key itself.
 */
export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex').slice(0, 16);
}

/**
 * Validate client options and apply defaults
 */
export function resolveConfig(options: ClientOptions): ResolvedConfig {
  const parsed = ClientOptionsSchema.safeParse({
    apiKey: options.apiKey,
    baseUrl: options.baseUrl,
    timeoutMs: options.timeoutMs,
    maxRetries: options.maxRetries,
    cacheEnabled: options.cacheEnabled,
    cacheMaxEntries: options.cacheMaxEntries,
    userAgentSuffix: options.userAgentSuffix,
    minApiVersion: options.minApiVersion,
    maxKnownApiVersion: options.maxKnownApiVersion,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid client configuration: ${issues}`);
  }

  const { userAgentSuffix, ...config } = parsed.data;

  return {
    ...config,
    baseUrl: config.baseUrl.replace(/\/+$/, ''),
    userAgent: buildUserAgent(userAgentSuffix),
    authHash: hashApiKey(config.apiKey),
  };
}

const intFromEnv = z.coerce.number().int();

/**
 * Read client options from the environment
 *
 * Recognized: WEBEXTRACT_API_KEY, WEBEXTRACT_BASE_URL,
 * WEBEXTRACT_TIMEOUT_MS, WEBEXTRACT_MAX_RETRIES
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): Partial<ClientOptions> {
  const options: Partial<ClientOptions> = {};

  if (env.WEBEXTRACT_API_KEY) {
    options.apiKey = env.WEBEXTRACT_API_KEY;
  }
  if (env.WEBEXTRACT_BASE_URL) {
    options.baseUrl = env.WEBEXTRACT_BASE_URL;
  }
  if (env.WEBEXTRACT_TIMEOUT_MS) {
    options.timeoutMs = intFromEnv.parse(env.WEBEXTRACT_TIMEOUT_MS);
  }
  if (env.WEBEXTRACT_MAX_RETRIES) {
    options.maxRetries = intFromEnv.parse(env.WEBEXTRACT_MAX_RETRIES);
  }

  return options;
}
