/**
 * Request and response models for the WebExtract API.
 * Responses are validated with zod before they reach the caller.
 */
import { z } from 'zod';
import type { Decoder } from './types.mjs';

/**
 * Build a decoder that validates a payload against a schema
 */
export function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Decoder<T> {
  return (payload) => schema.parse(payload);
}

/** For endpoints whose response body is ignored */
export const ignoreBody: Decoder<void> = () => undefined;

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const JobStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export type FetchMode = 'auto' | 'static' | 'dynamic';

export interface LlmConfig {
  provider?: string;
  apiKey?: string;
  baseUrl?: string;
  model?: string;
}

export const CrawlOptionsSchema = z.object({
  followSelector: z.string().optional(),
  followPattern: z.string().optional(),
  maxDepth: z.number().int().optional(),
  nextSelector: z.string().optional(),
  maxPages: z.number().int().optional(),
  maxUrls: z.number().int().optional(),
  /** Delay between requests, e.g. "500ms" */
  delay: z.string().optional(),
  concurrency: z.number().int().optional(),
  sameDomainOnly: z.boolean().optional(),
  extractFromSeeds: z.boolean().optional(),
});
export type CrawlOptions = z.infer<typeof CrawlOptionsSchema>;

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export interface ExtractRequest {
  url: string;
  schema: Record<string, unknown>;
  fetchMode?: FetchMode;
  llmConfig?: LlmConfig;
}

export const TokenUsageSchema = z.object({
  inputTokens: z.number().int(),
  outputTokens: z.number().int(),
  costUsd: z.number(),
  llmCostUsd: z.number(),
  isByok: z.boolean(),
});
export type TokenUsage = z.infer<typeof TokenUsageSchema>;

export const ExtractionMetadataSchema = z.object({
  fetchDurationMs: z.number().int(),
  extractDurationMs: z.number().int(),
  model: z.string(),
  provider: z.string(),
});
export type ExtractionMetadata = z.infer<typeof ExtractionMetadataSchema>;

export const ExtractResponseSchema = z.object({
  data: z.record(z.unknown()),
  url: z.string(),
  fetchedAt: z.string(),
  usage: TokenUsageSchema.optional(),
  metadata: ExtractionMetadataSchema.optional(),
});
export type ExtractResponse = z.infer<typeof ExtractResponseSchema>;

export interface CrawlRequest {
  url: string;
  schema: Record<string, unknown>;
  options?: CrawlOptions;
  webhookUrl?: string;
  llmConfig?: LlmConfig;
}

export const CrawlJobCreatedSchema = z.object({
  jobId: z.string(),
  status: JobStatusSchema,
  statusUrl: z.string(),
});
export type CrawlJobCreated = z.infer<typeof CrawlJobCreatedSchema>;

export interface AnalyzeRequest {
  url: string;
  depth?: number;
}

export const AnalyzeResponseSchema = z.object({
  url: z.string(),
  suggestedSchema: z.record(z.unknown()),
  followPatterns: z.array(z.string()),
});
export type AnalyzeResponse = z.infer<typeof AnalyzeResponseSchema>;

export const UsageSchema = z.object({
  tier: z.string(),
  creditsUsed: z.number(),
  creditsLimit: z.number(),
  creditsRemaining: z.number(),
  periodStart: z.string(),
  periodEnd: z.string(),
});
export type Usage = z.infer<typeof UsageSchema>;

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export const JobSchema = z.object({
  id: z.string(),
  type: z.string(),
  status: JobStatusSchema,
  url: z.string(),
  pageCount: z.number().int(),
  tokenUsageInput: z.number().int(),
  tokenUsageOutput: z.number().int(),
  costCredits: z.number(),
  errorMessage: z.string().optional(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  createdAt: z.string(),
});
export type Job = z.infer<typeof JobSchema>;

export const JobListSchema = z.object({ jobs: z.array(JobSchema) });
export type JobList = z.infer<typeof JobListSchema>;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const SchemaSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  schemaYaml: z.string(),
  category: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type Schema = z.infer<typeof SchemaSchema>;

export const SchemaListSchema = z.object({ schemas: z.array(SchemaSchema) });
export type SchemaList = z.infer<typeof SchemaListSchema>;

export interface CreateSchemaRequest {
  name: string;
  schemaYaml: string;
  description?: string;
  category?: string;
}

// ---------------------------------------------------------------------------
// Sites
// ---------------------------------------------------------------------------

export const SiteSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string(),
  schemaId: z.string().optional(),
  crawlOptions: CrawlOptionsSchema.optional(),
  createdAt: z.string(),
});
export type Site = z.infer<typeof SiteSchema>;

export const SiteListSchema = z.object({ sites: z.array(SiteSchema) });
export type SiteList = z.infer<typeof SiteListSchema>;

export interface CreateSiteRequest {
  name: string;
  url: string;
  schemaId?: string;
  crawlOptions?: CrawlOptions;
}

// ---------------------------------------------------------------------------
// API keys
// ---------------------------------------------------------------------------

export const ApiKeySchema = z.object({
  id: z.string(),
  name: z.string(),
  prefix: z.string(),
  createdAt: z.string(),
  lastUsedAt: z.string().optional(),
});
export type ApiKey = z.infer<typeof ApiKeySchema>;

export const ApiKeyListSchema = z.object({ keys: z.array(ApiKeySchema) });
export type ApiKeyList = z.infer<typeof ApiKeyListSchema>;

/** `key` is only ever returned once, at creation */
export const ApiKeyCreatedSchema = z.object({
  id: z.string(),
  name: z.string(),
  key: z.string(),
});
export type ApiKeyCreated = z.infer<typeof ApiKeyCreatedSchema>;

// ---------------------------------------------------------------------------
// LLM configuration
// ---------------------------------------------------------------------------

export const ProvidersSchema = z.object({ providers: z.array(z.string()) });
export type Providers = z.infer<typeof ProvidersSchema>;

export const ModelSchema = z.object({ id: z.string(), name: z.string() });
export type Model = z.infer<typeof ModelSchema>;

export const ModelListSchema = z.object({ models: z.array(ModelSchema) });
export type ModelList = z.infer<typeof ModelListSchema>;

export const LlmKeySchema = z.object({
  id: z.string(),
  provider: z.string(),
  defaultModel: z.string(),
  baseUrl: z.string().optional(),
  isEnabled: z.boolean(),
  createdAt: z.string(),
});
export type LlmKey = z.infer<typeof LlmKeySchema>;

export const LlmKeyListSchema = z.object({ keys: z.array(LlmKeySchema) });
export type LlmKeyList = z.infer<typeof LlmKeyListSchema>;

export interface UpsertLlmKeyRequest {
  provider: string;
  apiKey: string;
  defaultModel: string;
  baseUrl?: string;
  isEnabled?: boolean;
}

export const LlmChainEntrySchema = z.object({
  id: z.string().optional(),
  position: z.number().int().optional(),
  provider: z.string(),
  model: z.string(),
  isEnabled: z.boolean().optional(),
});
export type LlmChainEntry = z.infer<typeof LlmChainEntrySchema>;

export const LlmChainSchema = z.object({ chain: z.array(LlmChainEntrySchema) });
export type LlmChain = z.infer<typeof LlmChainSchema>;
