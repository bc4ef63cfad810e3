/**
 * Type definitions for @webextract/client
 */
import type { Dispatcher } from 'undici';
import type { CacheStore } from '@webextract/cache-response';

/**
 * HTTP methods used by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Structured log sink. Implementations must tolerate concurrent calls.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * A single HTTP attempt as handed to the transport
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

/**
 * Response from the transport. Header names are lower-case.
 */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends one HTTP attempt. Rejects on network failure or abort.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Turns a parsed JSON payload into the caller's type, throwing when it does not fit
 */
export type Decoder<T> = (payload: unknown) => T;

export type QueryValue = string | number | boolean | undefined;

/**
 * Options for a single pipeline call
 */
export interface RequestOptions<T> {
  body?: unknown;
  query?: Record<string, QueryValue>;
  decode: Decoder<T>;
  /** Skip the cache read for this GET; the response may still be stored */
  skipCache?: boolean;
  signal?: AbortSignal;
}

/**
 * Options for per-call convenience methods
 */
export interface CallOptions {
  signal?: AbortSignal;
  skipCache?: boolean;
}

/**
 * Client construction options
 */
export interface ClientOptions {
  apiKey: string;
  /** Default: https://api.webextract.dev */
  baseUrl?: string;
  /** Per-attempt timeout (ms). Default: 30000 */
  timeoutMs?: number;
  /** Retries after the first attempt. Default: 3 */
  maxRetries?: number;
  /** Default: true */
  cacheEnabled?: boolean;
  /** Capacity of the default memory cache. Default: 100 */
  cacheMaxEntries?: number;
  cache?: CacheStore;
  transport?: Transport;
  /** Dispatcher for the default undici transport (proxy, TLS, MockAgent) */
  dispatcher?: Dispatcher;
  logger?: Logger;
  /** Appended to the User-Agent after a space */
  userAgentSuffix?: string;
  /** Oldest supported server API version. Default: MIN_API_VERSION */
  minApiVersion?: string;
  /** Newest server API version this SDK was built against. Default: MAX_KNOWN_API_VERSION */
  maxKnownApiVersion?: string;
}

/**
 * The request pipeline as seen by the service wrappers
 */
export interface RequestExecutor {
  execute<T>(method: HttpMethod, path: string, options: RequestOptions<T>): Promise<T>;
}
