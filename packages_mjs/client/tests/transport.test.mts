/**
 * Tests for the undici transport, using MockAgent in place of the network
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { UndiciTransport, normalizeResponseHeaders } from '../src/transport/undici-transport.mjs';

const ORIGIN = 'https://api.example.com';

describe('normalizeResponseHeaders', () => {
  it('should lower-case names and join multi-values', () => {
    expect(
      normalizeResponseHeaders({
        'Cache-Control': 'max-age=60',
        'set-cookie': ['a=1', 'b=2'],
        'x-empty': undefined,
      })
    ).toEqual({
      'cache-control': 'max-age=60',
      'set-cookie': 'a=1, b=2',
    });
  });
});

describe('UndiciTransport', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return status, headers and body text', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/v1/usage', method: 'GET' })
      .reply(200, { tier: 'free' }, { headers: { 'x-api-version': '1.2.0' } });

    const transport = new UndiciTransport(agent);
    const response = await transport.send({
      method: 'GET',
      url: `${ORIGIN}/api/v1/usage`,
      headers: { accept: 'application/json' },
      signal: new AbortController().signal,
    });

    expect(response.status).toBe(200);
    expect(response.headers['x-api-version']).toBe('1.2.0');
    expect(JSON.parse(response.body)).toEqual({ tier: 'free' });
  });

  it('should send method, headers and body', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/api/v1/keys',
        method: 'POST',
        headers: { authorization: 'Bearer test-key' },
        body: '{"name":"ci"}',
      })
      .reply(201, { id: 'k1', name: 'ci', key: 'test-secret' });

    const response = await new UndiciTransport(agent).send({
      method: 'POST',
      url: `${ORIGIN}/api/v1/keys`,
      headers: { authorization: 'Bearer test-key', 'content-type': 'application/json' },
      body: '{"name":"ci"}',
      signal: new AbortController().signal,
    });

    expect(response.status).toBe(201);
  });

  it('should pass error statuses through', async () => {
    agent.get(ORIGIN).intercept({ path: '/api/v1/jobs/missing' }).reply(404, { error: 'Job not found' });

    const response = await new UndiciTransport(agent).send({
      method: 'GET',
      url: `${ORIGIN}/api/v1/jobs/missing`,
      headers: {},
      signal: new AbortController().signal,
    });

    expect(response.status).toBe(404);
    expect(response.body).toBe('{"error":"Job not found"}');
  });

  it('should reject on connection errors', async () => {
    agent.get(ORIGIN).intercept({ path: '/api/v1/usage' }).replyWithError(new Error('socket hang up'));

    await expect(
      new UndiciTransport(agent).send({
        method: 'GET',
        url: `${ORIGIN}/api/v1/usage`,
        headers: {},
        signal: new AbortController().signal,
      })
    ).rejects.toThrow('socket hang up');
  });

  it('should reject when the signal is already aborted', async () => {
    agent.get(ORIGIN).intercept({ path: '/api/v1/usage' }).reply(200, {});
    const controller = new AbortController();
    controller.abort();

    await expect(
      new UndiciTransport(agent).send({
        method: 'GET',
        url: `${ORIGIN}/api/v1/usage`,
        headers: {},
        signal: controller.signal,
      })
    ).rejects.toThrow();
  });
});
