/**
 * WebExtract API client
 */
import { BaseClient } from './core/base-client.mjs';
import { loadConfigFromEnv } from './config.mjs';
import {
  AnalyzeResponseSchema,
  CrawlJobCreatedSchema,
  ExtractResponseSchema,
  UsageSchema,
  decodeWith,
  type AnalyzeRequest,
  type AnalyzeResponse,
  type CrawlJobCreated,
  type CrawlRequest,
  type ExtractRequest,
  type ExtractResponse,
  type Usage,
} from './schemas.mjs';
import { JobsService } from './services/jobs.mjs';
import { KeysService } from './services/keys.mjs';
import { LlmService } from './services/llm.mjs';
import { SchemasService } from './services/schemas.mjs';
import { SitesService } from './services/sites.mjs';
import type { CallOptions, ClientOptions } from './types.mjs';

const decodeExtract = decodeWith(ExtractResponseSchema);
const decodeCrawl = decodeWith(CrawlJobCreatedSchema);
const decodeAnalyze = decodeWith(AnalyzeResponseSchema);
const decodeUsage = decodeWith(UsageSchema);

/**
 * Client for the WebExtract API
 *
 * @example
 * const client = new WebExtractClient({ apiKey: process.env.WEBEXTRACT_API_KEY ?? '' });
 *
 * const result = await client.extract({
 *   url: 'https://example.com/product',
 *   schema: { name: 'string', price: 'number' },
 * });
 * console.log(result.data);
 */
export class WebExtractClient extends BaseClient {
  readonly jobs: JobsService;
  readonly schemas: SchemasService;
  readonly sites: SitesService;
  readonly keys: KeysService;
  readonly llm: LlmService;

  constructor(options: ClientOptions) {
    super(options);
    this.jobs = new JobsService(this);
    this.schemas = new SchemasService(this);
    this.sites = new SitesService(this);
    this.keys = new KeysService(this);
    this.llm = new LlmService(this);
  }

  /**
   * Extract structured data from a single page
   */
  async extract(request: ExtractRequest, options: CallOptions = {}): Promise<ExtractResponse> {
    return this.execute('POST', '/api/v1/extract', { ...options, body: request, decode: decodeExtract });
  }

  /**
   * Start an asynchronous crawl job; poll it through `jobs.get`
   */
  async crawl(request: CrawlRequest, options: CallOptions = {}): Promise<CrawlJobCreated> {
    return this.execute('POST', '/api/v1/crawl', { ...options, body: request, decode: decodeCrawl });
  }

  /**
   * Inspect a site and suggest a schema and follow patterns
   */
  async analyze(request: AnalyzeRequest, options: CallOptions = {}): Promise<AnalyzeResponse> {
    return this.execute('POST', '/api/v1/analyze', { ...options, body: request, decode: decodeAnalyze });
  }

  /**
   * Usage for the current billing period
   */
  async getUsage(options: CallOptions = {}): Promise<Usage> {
    return this.execute('GET', '/api/v1/usage', { ...options, decode: decodeUsage });
  }
}

/**
 * Create a client, filling unset options from WEBEXTRACT_* environment variables
 */
export function createClient(
  options: Partial<ClientOptions> = {},
  env: Record<string, string | undefined> = process.env
): WebExtractClient {
  const fromEnv = loadConfigFromEnv(env);
  return new WebExtractClient({
    ...fromEnv,
    ...options,
    apiKey: options.apiKey ?? fromEnv.apiKey ?? '',
  });
}
