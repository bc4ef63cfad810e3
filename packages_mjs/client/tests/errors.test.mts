/**
 * Tests for errors.mts
 */
import { describe, it, expect } from 'vitest';
import {
  ApiError,
  AuthenticationError,
  ForbiddenError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  UnsupportedApiVersionError,
  ValidationError,
  WebExtractError,
  classifyError,
  isWebExtractError,
} from '../src/errors.mjs';

describe('classifyError', () => {
  it('should map 400 to ValidationError with field errors', () => {
    const error = classifyError(
      400,
      {},
      JSON.stringify({ error: 'Invalid request', errors: { url: 'required' } })
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Invalid request');
    expect(error.status).toBe(400);
    expect(error instanceof ValidationError && error.fields).toEqual({ url: 'required' });
  });

  it('should default fields to an empty mapping', () => {
    const error = classifyError(400, {}, '');
    expect(error instanceof ValidationError && error.fields).toEqual({});
  });

  it.each([
    [401, AuthenticationError, 'AUTHENTICATION_ERROR'],
    [403, ForbiddenError, 'FORBIDDEN'],
    [404, NotFoundError, 'NOT_FOUND'],
  ])('should map %i to its error class', (status, ErrorClass, code) => {
    const error = classifyError(status, {}, '{"error":"nope"}');
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.code).toBe(code);
    expect(error.status).toBe(status);
  });

  it('should read Retry-After seconds on 429', () => {
    const error = classifyError(429, { 'retry-after': '12' }, '{"error":"Slow down"}');
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfter).toBe(12);
  });

  it('should default Retry-After to 60 seconds for reporting', () => {
    const missing = classifyError(429, {}, '');
    const invalid = classifyError(429, { 'retry-after': 'later' }, '');
    expect(missing instanceof RateLimitError && missing.retryAfter).toBe(60);
    expect(invalid instanceof RateLimitError && invalid.retryAfter).toBe(60);
  });

  it('should map other statuses to ApiError with detail', () => {
    const error = classifyError(502, {}, JSON.stringify({ error: 'Upstream failed', detail: 'fetch timeout' }));
    expect(error).toBeInstanceOf(ApiError);
    expect(error.status).toBe(502);
    expect(error instanceof ApiError && error.detail).toBe('fetch timeout');
  });

  it('should fall back to the HTTP status text', () => {
    expect(classifyError(404, {}, '').message).toBe('Not Found');
    expect(classifyError(500, {}, '<html>oops</html>').message).toBe('Internal Server Error');
    expect(classifyError(422, {}, '{"error": 42}').message).toBe('Unprocessable Entity');
  });

  it('should fall back to a generic message for unknown statuses', () => {
    expect(classifyError(599, {}, '').message).toBe('HTTP 599');
  });
});

describe('error classes', () => {
  it('should share the WebExtractError root', () => {
    const errors = [
      new ValidationError('v'),
      new AuthenticationError('a'),
      new NetworkError('n'),
      new UnsupportedApiVersionError('0.5.0', '1.0.0'),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(WebExtractError);
      expect(error).toBeInstanceOf(Error);
      expect(isWebExtractError(error)).toBe(true);
    }
    expect(isWebExtractError(new Error('plain'))).toBe(false);
  });

  it('should name errors after their class', () => {
    expect(new NotFoundError('x').name).toBe('NotFoundError');
  });

  it('should carry network error flags and cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new NetworkError('Network error: ECONNRESET', { cause, timedOut: true });
    expect(error.cause).toBe(cause);
    expect(error.timedOut).toBe(true);
    expect(error.cancelled).toBe(false);
  });

  it('should describe unsupported versions', () => {
    const error = new UnsupportedApiVersionError('0.5.0', '1.0.0');
    expect(error.message).toContain('API version 0.5.0 is not supported');
    expect(error.serverVersion).toBe('0.5.0');
    expect(error.minVersion).toBe('1.0.0');
  });
});
