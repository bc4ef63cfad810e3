/**
 * Request pipeline: cache, retrying transport, version check, error mapping
 */
import {
  MemoryCacheStore,
  ResponseCache,
  generateCacheKey,
} from '@webextract/cache-response';
import type { CacheResponseEvent } from '@webextract/cache-response';
import {
  NO_RETRY,
  RetryAbortedError,
  RetryExecutor,
  decideErrorRetry,
  decideResponseRetry,
} from '@webextract/fetch-retry';
import type { RetryConfig, RetryEvent, RetryReason } from '@webextract/fetch-retry';
import { resolveConfig, type ResolvedConfig } from '../config.mjs';
import { ApiError, NetworkError, classifyError } from '../errors.mjs';
import { maskHeaders, noopLogger } from '../logger.mjs';
import { UndiciTransport } from '../transport/undici-transport.mjs';
import { VersionGate } from '../version.mjs';
import type {
  ClientOptions,
  Decoder,
  HttpMethod,
  Logger,
  RequestExecutor,
  RequestOptions,
  Transport,
  TransportResponse,
} from '../types.mjs';
import {
  buildHeaders,
  buildUrl,
  createAttemptSignal,
  serializeBody,
} from './request-builder.mjs';

const RETRY_MESSAGES: Record<RetryReason, string> = {
  network: 'Network error, retrying',
  'rate-limit': 'Rate limited, retrying',
  'server-error': 'Server error, retrying',
};

interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

type CacheRead<T> = { hit: true; value: T } | { hit: false };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base HTTP client. Every API call goes through {@link BaseClient.execute}.
 */
export class BaseClient implements RequestExecutor {
  protected readonly config: ResolvedConfig;
  protected readonly logger: Logger;
  protected readonly transport: Transport;
  protected readonly cache: ResponseCache;
  protected readonly versionGate: VersionGate;
  private readonly retryExecutor: RetryExecutor;
  private readonly retryConfig: RetryConfig;

  constructor(options: ClientOptions) {
    this.config = resolveConfig(options);
    this.logger = options.logger ?? noopLogger;
    this.transport = options.transport ?? new UndiciTransport(options.dispatcher);
    this.cache = new ResponseCache({
      store: options.cache ?? new MemoryCacheStore({ maxEntries: this.config.cacheMaxEntries }),
    });
    this.versionGate = new VersionGate(this.logger, {
      minVersion: this.config.minApiVersion,
      maxKnownVersion: this.config.maxKnownApiVersion,
    });
    this.retryConfig = { maxRetries: this.config.maxRetries };
    this.retryExecutor = new RetryExecutor(this.retryConfig);

    this.retryExecutor.on((event) => this.logRetryEvent(event));
    this.cache.on((event) => this.logCacheEvent(event));

    if (!this.config.baseUrl.startsWith('https://')) {
      this.logger.warn('API base URL is not using HTTPS; credentials will be sent in clear text', {
        baseUrl: this.config.baseUrl,
      });
    }
  }

  /**
   * Run one logical API call
   *
   * GETs are served from the cache when a fresh (or stale-while-revalidate)
   * entry exists. Otherwise the request is sent with retries, the server API
   * version is checked once per client, failures are mapped to typed errors
   * and storable GET payloads are cached.
   *
   * @throws WebExtractError subclasses
   */
  async execute<T>(method: HttpMethod, path: string, options: RequestOptions<T>): Promise<T> {
    const url = buildUrl(this.config.baseUrl, path, options.query);
    const cacheKey = generateCacheKey(method, url, this.config.authHash);
    const cacheable = method === 'GET' && this.config.cacheEnabled;

    if (cacheable && !options.skipCache) {
      const cached = await this.readCache(cacheKey, options.decode);
      if (cached.hit) {
        return cached.value;
      }
    }

    const response = await this.send(
      {
        method,
        url,
        headers: buildHeaders(this.config),
        body: serializeBody(options.body),
      },
      options.signal
    );

    await this.versionGate.checkOnce(response.headers['x-api-version']);

    if (response.status >= 400) {
      throw classifyError(response.status, response.headers, response.body);
    }

    const payload = this.parseBody(response);
    let value: T;
    try {
      value = options.decode(payload);
    } catch (error) {
      throw new ApiError('Failed to parse response', { status: response.status, cause: error });
    }

    if (cacheable) {
      await this.writeCache(cacheKey, payload, response.headers['cache-control']);
    }

    return value;
  }

  private parseBody(response: TransportResponse): unknown {
    if (!response.body) {
      return undefined;
    }
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new ApiError('Failed to parse response', { status: response.status, cause: error });
    }
  }

  private async readCache<T>(key: string, decode: Decoder<T>): Promise<CacheRead<T>> {
    try {
      const lookup = await this.cache.lookup(key);
      if (!lookup.found) {
        return { hit: false };
      }
      return { hit: true, value: decode(lookup.entry.value) };
    } catch (error) {
      this.logger.warn('Cache read failed, fetching from API', { key, error: describeError(error) });
      return { hit: false };
    }
  }

  private async writeCache(key: string, payload: unknown, cacheControl?: string): Promise<void> {
    try {
      await this.cache.store(key, payload, cacheControl);
    } catch (error) {
      this.logger.warn('Cache write failed', { key, error: describeError(error) });
    }
  }

  /**
   * Send with retries. Network errors, 429 and >= 500 are retried; the last
   * response is returned once retries are exhausted.
   */
  private async send(request: PreparedRequest, signal?: AbortSignal): Promise<TransportResponse> {
    try {
      const { result } = await this.retryExecutor.execute(
        (attempt) => this.sendAttempt(request, attempt, signal),
        {
          signal,
          metadata: { method: request.method, url: request.url },
          retryOnResult: (response, attempt) =>
            decideResponseRetry(response.status, response.headers['retry-after'], attempt, this.retryConfig),
          retryOnError: (error, attempt) =>
            error instanceof NetworkError && error.cancelled
              ? NO_RETRY
              : decideErrorRetry(attempt, this.retryConfig),
        }
      );
      return result;
    } catch (error) {
      if (error instanceof RetryAbortedError) {
        throw new NetworkError('Request cancelled', { cause: error, cancelled: true });
      }
      throw error;
    }
  }

  private async sendAttempt(
    request: PreparedRequest,
    attempt: number,
    signal?: AbortSignal
  ): Promise<TransportResponse> {
    const scope = createAttemptSignal(this.config.timeoutMs, signal);

    this.logger.debug(`Request: ${request.method} ${request.url}`, {
      attempt,
      headers: maskHeaders(request.headers),
    });

    try {
      const response = await this.transport.send({ ...request, signal: scope.signal });
      this.logger.debug(`Response: ${response.status}`, { attempt, url: request.url });
      return response;
    } catch (error) {
      if (scope.timedOut()) {
        throw new NetworkError(`Request timed out after ${this.config.timeoutMs}ms`, {
          cause: error,
          timedOut: true,
        });
      }
      if (signal?.aborted) {
        throw new NetworkError('Request cancelled', { cause: error, cancelled: true });
      }
      throw new NetworkError(`Network error: ${describeError(error)}`, { cause: error });
    } finally {
      scope.release();
    }
  }

  private logRetryEvent(event: RetryEvent): void {
    if (event.type !== 'retry:wait') {
      return;
    }
    this.logger.warn(RETRY_MESSAGES[event.reason], {
      ...event.metadata,
      attempt: event.attempt,
      maxRetries: event.maxRetries,
      delayMs: event.delayMs,
      ...(event.status !== undefined ? { status: event.status } : {}),
      ...(event.error ? { error: event.error.message } : {}),
    });
  }

  private logCacheEvent(event: CacheResponseEvent): void {
    this.logger.debug(`Cache ${event.type.slice('cache:'.length)}`, { key: event.key, ...event.metadata });
  }
}
