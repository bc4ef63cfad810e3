/**
 * Tests for the WebExtract client facade
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { WebExtractClient, createClient } from '../src/client.mjs';
import { NotFoundError } from '../src/errors.mjs';
import type { Transport, TransportResponse } from '../src/types.mjs';

const ORIGIN = 'https://api.example.com';

const usage = {
  tier: 'pro',
  creditsUsed: 10,
  creditsLimit: 100,
  creditsRemaining: 90,
  periodStart: '2024-01-01',
  periodEnd: '2024-01-31',
};

function ok(body: unknown): TransportResponse {
  return { status: 200, headers: { 'x-api-version': '1.0.0' }, body: JSON.stringify(body) };
}

describe('WebExtractClient', () => {
  it('should extract with a camelCase body', async () => {
    const send = vi.fn<Transport['send']>().mockResolvedValue(
      ok({ data: { name: 'Lamp' }, url: 'https://example.com/p', fetchedAt: '2024-01-01T00:00:00Z' })
    );
    const client = new WebExtractClient({ apiKey: 'test-key', baseUrl: ORIGIN, transport: { send } });

    const result = await client.extract({
      url: 'https://example.com/p',
      schema: { name: 'string' },
      fetchMode: 'static',
      llmConfig: { provider: 'openai', model: 'm1' },
    });

    expect(result.data).toEqual({ name: 'Lamp' });
    const request = send.mock.calls[0][0];
    expect(request.method).toBe('POST');
    expect(request.url).toBe(`${ORIGIN}/api/v1/extract`);
    expect(JSON.parse(request.body ?? '')).toEqual({
      url: 'https://example.com/p',
      schema: { name: 'string' },
      fetchMode: 'static',
      llmConfig: { provider: 'openai', model: 'm1' },
    });
  });

  it('should start crawls and analyze sites', async () => {
    const send = vi
      .fn<Transport['send']>()
      .mockResolvedValueOnce(ok({ jobId: 'job_1', status: 'pending', statusUrl: '/api/v1/jobs/job_1' }))
      .mockResolvedValueOnce(ok({ url: 'https://example.com', suggestedSchema: {}, followPatterns: ['/p/*'] }));
    const client = new WebExtractClient({ apiKey: 'test-key', baseUrl: ORIGIN, transport: { send } });

    const job = await client.crawl({ url: 'https://example.com', schema: {}, options: { maxPages: 5 } });
    const analysis = await client.analyze({ url: 'https://example.com', depth: 1 });

    expect(job.jobId).toBe('job_1');
    expect(analysis.followPatterns).toEqual(['/p/*']);
    expect(send.mock.calls.map(([request]) => request.url)).toEqual([
      `${ORIGIN}/api/v1/crawl`,
      `${ORIGIN}/api/v1/analyze`,
    ]);
  });

  it('should expose the service groups', () => {
    const client = new WebExtractClient({ apiKey: 'test-key', transport: { send: vi.fn() } });

    expect(Object.keys(client)).toEqual(expect.arrayContaining(['jobs', 'schemas', 'sites', 'keys', 'llm']));
  });
});

describe('createClient', () => {
  it('should fill options from the environment', async () => {
    const send = vi.fn<Transport['send']>().mockResolvedValue(ok(usage));
    const client = createClient(
      { transport: { send } },
      { WEBEXTRACT_API_KEY: 'env-key', WEBEXTRACT_BASE_URL: 'https://env.example.com' }
    );

    await client.getUsage();

    const request = send.mock.calls[0][0];
    expect(request.url).toBe('https://env.example.com/api/v1/usage');
    expect(request.headers.authorization).toBe('Bearer env-key');
  });

  it('should prefer explicit options', async () => {
    const send = vi.fn<Transport['send']>().mockResolvedValue(ok(usage));
    const client = createClient(
      { apiKey: 'explicit-key', baseUrl: ORIGIN, transport: { send } },
      { WEBEXTRACT_API_KEY: 'env-key' }
    );

    await client.getUsage();

    expect(send.mock.calls[0][0].headers.authorization).toBe('Bearer explicit-key');
  });

  it('should fail without any API key', () => {
    expect(() => createClient({}, {})).toThrow('apiKey is required');
  });
});

describe('WebExtractClient over undici', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should cache usage according to Cache-Control', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/usage', method: 'GET' })
      .reply(200, usage, { headers: { 'x-api-version': '1.0.0', 'cache-control': 'max-age=60' } });

    const client = new WebExtractClient({ apiKey: 'test-key', baseUrl: ORIGIN, dispatcher: agent });

    await expect(client.getUsage()).resolves.toEqual(usage);
    // The interceptor is consumed, so a second network call would fail
    await expect(client.getUsage()).resolves.toEqual(usage);
  });

  it('should map 404 responses', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/jobs/missing', method: 'GET' })
      .reply(404, { error: 'Job not found' }, { headers: { 'x-api-version': '1.0.0' } });

    const client = new WebExtractClient({ apiKey: 'test-key', baseUrl: ORIGIN, dispatcher: agent });

    const error = await client.jobs.get('missing').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error instanceof NotFoundError && error.message).toBe('Job not found');
  });

  it('should send query parameters', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/jobs?limit=5&offset=10', method: 'GET' })
      .reply(200, { jobs: [] }, { headers: { 'x-api-version': '1.0.0' } });

    const client = new WebExtractClient({ apiKey: 'test-key', baseUrl: ORIGIN, dispatcher: agent });

    await expect(client.jobs.list({ limit: 5, offset: 10 })).resolves.toEqual({ jobs: [] });
  });
});
