/**
 * Saved extraction schemas
 */
import type { CallOptions, RequestExecutor } from '../types.mjs';
import {
  SchemaListSchema,
  SchemaSchema,
  decodeWith,
  ignoreBody,
  type CreateSchemaRequest,
  type Schema,
  type SchemaList,
} from '../schemas.mjs';

const decodeSchemaList = decodeWith(SchemaListSchema);
const decodeSchema = decodeWith(SchemaSchema);

export class SchemasService {
  constructor(private readonly client: RequestExecutor) {}

  async list(options: CallOptions = {}): Promise<SchemaList> {
    return this.client.execute('GET', '/api/v1/schemas', { ...options, decode: decodeSchemaList });
  }

  async get(id: string, options: CallOptions = {}): Promise<Schema> {
    return this.client.execute('GET', `/api/v1/schemas/${encodeURIComponent(id)}`, {
      ...options,
      decode: decodeSchema,
    });
  }

  async create(input: CreateSchemaRequest, options: CallOptions = {}): Promise<Schema> {
    return this.client.execute('POST', '/api/v1/schemas', {
      ...options,
      body: input,
      decode: decodeSchema,
    });
  }

  async update(id: string, input: CreateSchemaRequest, options: CallOptions = {}): Promise<Schema> {
    return this.client.execute('PUT', `/api/v1/schemas/${encodeURIComponent(id)}`, {
      ...options,
      body: input,
      decode: decodeSchema,
    });
  }

  async delete(id: string, options: CallOptions = {}): Promise<void> {
    return this.client.execute('DELETE', `/api/v1/schemas/${encodeURIComponent(id)}`, {
      ...options,
      decode: ignoreBody,
    });
  }
}
