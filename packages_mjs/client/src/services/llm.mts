/**
 * Bring-your-own-key LLM providers and the fallback chain
 */
import type { CallOptions, RequestExecutor } from '../types.mjs';
import {
  LlmChainSchema,
  LlmKeyListSchema,
  LlmKeySchema,
  ModelListSchema,
  ProvidersSchema,
  decodeWith,
  ignoreBody,
  type LlmChain,
  type LlmChainEntry,
  type LlmKey,
  type LlmKeyList,
  type ModelList,
  type Providers,
  type UpsertLlmKeyRequest,
} from '../schemas.mjs';

const decodeProviders = decodeWith(ProvidersSchema);
const decodeModels = decodeWith(ModelListSchema);
const decodeKeyList = decodeWith(LlmKeyListSchema);
const decodeKey = decodeWith(LlmKeySchema);
const decodeChain = decodeWith(LlmChainSchema);

export class LlmService {
  constructor(private readonly client: RequestExecutor) {}

  async listProviders(options: CallOptions = {}): Promise<Providers> {
    return this.client.execute('GET', '/api/v1/llm/providers', { ...options, decode: decodeProviders });
  }

  async listModels(provider: string, options: CallOptions = {}): Promise<ModelList> {
    return this.client.execute('GET', `/api/v1/llm/models/${encodeURIComponent(provider)}`, {
      ...options,
      decode: decodeModels,
    });
  }

  async listKeys(options: CallOptions = {}): Promise<LlmKeyList> {
    return this.client.execute('GET', '/api/v1/llm/keys', { ...options, decode: decodeKeyList });
  }

  /**
   * Add or replace the key for a provider
   */
  async upsertKey(input: UpsertLlmKeyRequest, options: CallOptions = {}): Promise<LlmKey> {
    return this.client.execute('PUT', '/api/v1/llm/keys', { ...options, body: input, decode: decodeKey });
  }

  async deleteKey(id: string, options: CallOptions = {}): Promise<void> {
    return this.client.execute('DELETE', `/api/v1/llm/keys/${encodeURIComponent(id)}`, {
      ...options,
      decode: ignoreBody,
    });
  }

  async getChain(options: CallOptions = {}): Promise<LlmChain> {
    return this.client.execute('GET', '/api/v1/llm/chain', { ...options, decode: decodeChain });
  }

  /**
   * Replace the fallback chain. Order of entries is the order providers are tried.
   */
  async setChain(entries: LlmChainEntry[], options: CallOptions = {}): Promise<void> {
    return this.client.execute('PUT', '/api/v1/llm/chain', {
      ...options,
      body: { chain: entries },
      decode: ignoreBody,
    });
  }
}
