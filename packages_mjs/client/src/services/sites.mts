/**
 * Saved sites with default crawl settings
 */
import type { CallOptions, RequestExecutor } from '../types.mjs';
import {
  SiteListSchema,
  SiteSchema,
  decodeWith,
  ignoreBody,
  type CreateSiteRequest,
  type Site,
  type SiteList,
} from '../schemas.mjs';

const decodeSiteList = decodeWith(SiteListSchema);
const decodeSite = decodeWith(SiteSchema);

export class SitesService {
  constructor(private readonly client: RequestExecutor) {}

  async list(options: CallOptions = {}): Promise<SiteList> {
    return this.client.execute('GET', '/api/v1/sites', { ...options, decode: decodeSiteList });
  }

  async get(id: string, options: CallOptions = {}): Promise<Site> {
    return this.client.execute('GET', `/api/v1/sites/${encodeURIComponent(id)}`, {
      ...options,
      decode: decodeSite,
    });
  }

  async create(input: CreateSiteRequest, options: CallOptions = {}): Promise<Site> {
    return this.client.execute('POST', '/api/v1/sites', { ...options, body: input, decode: decodeSite });
  }

  async update(id: string, input: CreateSiteRequest, options: CallOptions = {}): Promise<Site> {
    return this.client.execute('PUT', `/api/v1/sites/${encodeURIComponent(id)}`, {
      ...options,
      body: input,
      decode: decodeSite,
    });
  }

  async delete(id: string, options: CallOptions = {}): Promise<void> {
    return this.client.execute('DELETE', `/api/v1/sites/${encodeURIComponent(id)}`, {
      ...options,
      decode: ignoreBody,
    });
  }
}
