import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { AxiosHttpClient } from './axios-client.js';

type StubResponse = {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
};

function stubAdapter(
  respond: (config: InternalAxiosRequestConfig) => StubResponse,
): AxiosAdapter {
  return async (config) => {
    const response = respond(config);
    return {
      data: response.data ?? '',
      status: response.status ?? 200,
      statusText: 'stub',
      headers: response.headers ?? {},
      config,
      request: {},
    };
  };
}

function makeClient(adapter: AxiosAdapter): AxiosHttpClient {
  return new AxiosHttpClient({
    userAgent: 'test-agent/1.0',
    timeoutMs: 1000,
    maxSockets: 2,
    adapter,
  });
}

describe('AxiosHttpClient', () => {
  it('returns HTML documents with their headers', async () => {
    const client = makeClient(
      stubAdapter(() => ({
        data: '<html><body>hi</body></html>',
        headers: {
          'content-type': 'text/html; charset=utf-8',
          'content-disposition': 'inline; filename="page.html"',
        },
      })),
    );

    const result = await client.getDocument('https://example.com/');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.body).toBe('<html><body>hi</body></html>');
      expect(result.status).toBe(200);
      expect(result.finalUrl).toBe('https://example.com/');
      expect(result.contentType).toBe('text/html; charset=utf-8');
      expect(result.contentDisposition).toBe('inline; filename="page.html"');
    }
  });

  it('accepts XHTML documents', async () => {
    const client = makeClient(
      stubAdapter(() => ({
        data: '<html/>',
        headers: { 'content-type': 'application/xhtml+xml' },
      })),
    );

    const result = await client.getDocument('https://example.com/');
    expect(result.ok).toBe(true);
  });

  it('rejects non-HTML documents as a content-type failure', async () => {
    const client = makeClient(
      stubAdapter(() => ({
        data: '{}',
        headers: { 'content-type': 'application/json' },
      })),
    );

    const result = await client.getDocument('https://example.com/api');

    expect(result).toMatchObject({
      ok: false,
      reason: 'content-type',
      status: 200,
    });
  });

  it('reports non-200 statuses as http-status failures', async () => {
    const client = makeClient(
      stubAdapter(() => ({
        status: 404,
        headers: { 'content-type': 'text/html' },
      })),
    );

    const result = await client.getDocument('https://example.com/missing');

    expect(result).toMatchObject({
      ok: false,
      reason: 'http-status',
      status: 404,
      error: 'HTTP 404',
    });
  });

  it('classifies aborted requests as timeouts', async () => {
    const client = makeClient(async () => {
      throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED');
    });

    const result = await client.getText('https://example.com/robots.txt');

    expect(result).toMatchObject({ ok: false, reason: 'timeout' });
  });

  it('classifies other transport errors as network failures', async () => {
    const client = makeClient(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:80');
    });

    const result = await client.getDocument('https://example.com/');

    expect(result).toMatchObject({
      ok: false,
      reason: 'network',
      error: 'connect ECONNREFUSED 127.0.0.1:80',
    });
  });

  it('sends the configured user agent', async () => {
    let seenAgent: unknown;
    const client = makeClient(
      stubAdapter((config) => {
        seenAgent = config.headers.get('User-Agent');
        return { data: 'User-agent: *', headers: { 'content-type': 'text/plain' } };
      }),
    );

    const result = await client.getText('https://example.com/robots.txt');

    expect(seenAgent).toBe('test-agent/1.0');
    expect(result.ok && result.body).toBe('User-agent: *');
  });

  it('returns binary bodies as bytes', async () => {
    const client = makeClient(
      stubAdapter(() => ({
        data: Buffer.from([1, 2, 3]),
        headers: {
          'content-type': 'image/png',
          'content-disposition': 'attachment; filename="dot.png"',
        },
      })),
    );

    const result = await client.getBinary('https://example.com/dot.png');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Array.from(result.body)).toEqual([1, 2, 3]);
      expect(result.contentDisposition).toBe('attachment; filename="dot.png"');
    }

    await client.close();
  });
});
