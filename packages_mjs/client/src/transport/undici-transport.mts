/**
 * Default transport using undici
 */
import { request } from 'undici';
import type { Dispatcher } from 'undici';
import type { Transport, TransportRequest, TransportResponse } from '../types.mjs';

/**
 * Flatten undici's header map: lower-case names, multi-values joined with ', '
 */
export function normalizeResponseHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

export class UndiciTransport implements Transport {
  constructor(private readonly dispatcher?: Dispatcher) {}

  async send(req: TransportRequest): Promise<TransportResponse> {
    const response = await request(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: req.signal,
      dispatcher: this.dispatcher,
    });

    return {
      status: response.statusCode,
      headers: normalizeResponseHeaders(response.headers),
      body: await response.body.text(),
    };
  }
}
