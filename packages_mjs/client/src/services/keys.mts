/**
 * API key management
 */
import type { CallOptions, RequestExecutor } from '../types.mjs';
import {
  ApiKeyCreatedSchema,
  ApiKeyListSchema,
  decodeWith,
  ignoreBody,
  type ApiKeyCreated,
  type ApiKeyList,
} from '../schemas.mjs';

const decodeKeyList = decodeWith(ApiKeyListSchema);
const decodeKeyCreated = decodeWith(ApiKeyCreatedSchema);

export class KeysService {
  constructor(private readonly client: RequestExecutor) {}

  async list(options: CallOptions = {}): Promise<ApiKeyList> {
    return this.client.execute('GET', '/api/v1/keys', { ...options, decode: decodeKeyList });
  }

  /**
   * Create a key. The secret is only present in this response.
   */
  async create(name: string, options: CallOptions = {}): Promise<ApiKeyCreated> {
    return this.client.execute('POST', '/api/v1/keys', {
      ...options,
      body: { name },
      decode: decodeKeyCreated,
    });
  }

  async revoke(id: string, options: CallOptions = {}): Promise<void> {
    return this.client.execute('DELETE', `/api/v1/keys/${encodeURIComponent(id)}`, {
      ...options,
      decode: ignoreBody,
    });
  }
}
