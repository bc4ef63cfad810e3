/**
 * Typed errors for @webextract/client
 */
import { STATUS_CODES } from 'node:http';
import { z } from 'zod';

export type WebExtractErrorCode =
  | 'VALIDATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'NETWORK_ERROR'
  | 'API_ERROR'
  | 'UNSUPPORTED_API_VERSION';

/** Reporting default when a 429 carries no usable Retry-After (seconds) */
export const DEFAULT_RATE_LIMIT_RETRY_AFTER = 60;

/**
 * Root of every error the client raises
 */
export abstract class WebExtractError extends Error {
  abstract readonly code: WebExtractErrorCode;
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.status = options?.status;
  }
}

export class ValidationError extends WebExtractError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly fields: Readonly<Record<string, string>> = {}
  ) {
    super(message, { status: 400 });
  }
}

export class AuthenticationError extends WebExtractError {
  readonly code = 'AUTHENTICATION_ERROR';

  constructor(message: string) {
    super(message, { status: 401 });
  }
}

export class ForbiddenError extends WebExtractError {
  readonly code = 'FORBIDDEN';

  constructor(message: string) {
    super(message, { status: 403 });
  }
}

export class NotFoundError extends WebExtractError {
  readonly code = 'NOT_FOUND';

  constructor(message: string) {
    super(message, { status: 404 });
  }
}

export class RateLimitError extends WebExtractError {
  readonly code = 'RATE_LIMITED';

  /**
   * @param retryAfter - Seconds the server asked callers to wait
   */
  constructor(
    message: string,
    readonly retryAfter: number = DEFAULT_RATE_LIMIT_RETRY_AFTER
  ) {
    super(message, { status: 429 });
  }
}

/**
 * Transport failure after retries were exhausted, a timeout, or a caller cancellation
 */
export class NetworkError extends WebExtractError {
  readonly code = 'NETWORK_ERROR';
  readonly cancelled: boolean;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; cancelled?: boolean; timedOut?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.cancelled = options.cancelled ?? false;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Any other failed response
 */
export class ApiError extends WebExtractError {
  readonly code = 'API_ERROR';
  readonly detail?: string;

  constructor(
    message: string,
    options: { status?: number; detail?: string; cause?: unknown } = {}
  ) {
    super(message, options);
    this.detail = options.detail;
  }
}

export class UnsupportedApiVersionError extends WebExtractError {
  readonly code = 'UNSUPPORTED_API_VERSION';

  constructor(
    readonly serverVersion: string,
    readonly minVersion: string
  ) {
    super(
      `API version ${serverVersion} is not supported; this SDK requires at least ${minVersion}. ` +
        'Upgrade the server or use an older SDK release.'
    );
  }
}

export function isWebExtractError(value: unknown): value is WebExtractError {
  return value instanceof WebExtractError;
}

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  detail: z.string().optional(),
  errors: z.record(z.string()).optional(),
});

type ErrorBody = z.infer<typeof ErrorBodySchema>;

function parseErrorBody(body: string): ErrorBody {
  if (!body) {
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    // Non-JSON bodies (proxies, HTML error pages) carry nothing structured
    return {};
  }

  const parsed = ErrorBodySchema.safeParse(json);
  return parsed.success ? parsed.data : {};
}

function parseRetryAfterSeconds(value: string | undefined): number {
  const trimmed = value?.trim();
  if (!trimmed || !/^\d+$/.test(trimmed)) {
    return DEFAULT_RATE_LIMIT_RETRY_AFTER;
  }
  return parseInt(trimmed, 10);
}

/**
 * Map a failed HTTP response to a typed error
 *
 * @param status - HTTP status (>= 400)
 * @param headers - Response headers with lower-case names
 * @param body - Raw response body
 */
export function classifyError(
  status: number,
  headers: Record<string, string>,
  body: string
): WebExtractError {
  const payload = parseErrorBody(body);
  const message = payload.error || STATUS_CODES[status] || `HTTP ${status}`;

  switch (status) {
    case 400:
      return new ValidationError(message, payload.errors);
    case 401:
      return new AuthenticationError(message);
    case 403:
      return new ForbiddenError(message);
    case 404:
      return new NotFoundError(message);
    case 429:
      return new RateLimitError(message, parseRetryAfterSeconds(headers['retry-after']));
    default:
      return new ApiError(message, { status, detail: payload.detail });
  }
}
