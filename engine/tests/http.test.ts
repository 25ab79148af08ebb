import { describe, it, expect } from 'vitest';
import { TransportError } from '../src/errors/index.js';
import { HttpEndpointInvoker } from '../src/http/HttpEndpointInvoker.js';
import { HttpRequestBuilder, joinUrl, normalizeAuthorization } from '../src/http/HttpRequestBuilder.js';

describe('HttpRequestBuilder', () => {
  it('builds a request with query, headers and a JSON body', () => {
    const request = HttpRequestBuilder.for('post', 'https://api.test/', '/orders')
      .query({ page: '1', q: 'a b' })
      .headers({ Authorization: 'Bearer "abc"\n' })
      .body('{"sku":"A1"}')
      .build();

    expect(request).toEqual({
      method: 'POST',
      url: 'https://api.test/orders?page=1&q=a%20b',
      headers: { Authorization: 'Bearer abc', 'Content-Type': 'application/json' },
      body: '{"sku":"A1"}',
    });
  });

  it('keeps an explicit content type', () => {
    const request = HttpRequestBuilder.for('PUT', 'https://api.test', 'items/1')
      .headers({ 'content-type': 'text/plain' })
      .body('hello')
      .build();

    expect(request.headers).toEqual({ 'content-type': 'text/plain' });
  });

  it('omits empty bodies', () => {
    const request = HttpRequestBuilder.for('GET', 'https://api.test', 'items').body('  ').build();

    expect(request).toEqual({ method: 'GET', url: 'https://api.test/items', headers: {} });
  });

  it('lets a later header win regardless of case', () => {
    const request = HttpRequestBuilder.for('GET', 'https://api.test', 'items').headers({ 'X-Id': '1', 'x-id': '2' }).build();

    expect(request.headers).toEqual({ 'x-id': '2' });
  });

  it('joins base URLs and paths with one slash', () => {
    expect(joinUrl('https://a.test//', '//v1/x')).toBe('https://a.test/v1/x');
  });

  it('normalizes bearer tokens only', () => {
    expect(normalizeAuthorization('bearer  "tok" ')).toBe('Bearer tok');
    expect(normalizeAuthorization('Basic dXNlcg==')).toBe('Basic dXNlcg==');
  });
});

describe('HttpEndpointInvoker', () => {
  const request = { method: 'POST', url: 'https://api.test/users', headers: { 'X-Trace': 't-1' }, body: '{"name":"demo"}' };

  it('returns any status with headers and parsed JSON', async () => {
    const calls: Array<{ url: string; init: RequestInit | undefined }> = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      calls.push({ url: String(input), init });
      return new Response('{"id":1}', { status: 409, headers: { 'content-type': 'application/json' } });
    };

    const response = await new HttpEndpointInvoker({ fetch: fetchImpl }).invoke(request);

    expect(response.status).toBe(409);
    expect(response.body).toBe('{"id":1}');
    expect(response.json).toEqual({ id: 1 });
    expect(response.headers['content-type']).toBe('application/json');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://api.test/users');
    expect(calls[0]?.init?.method).toBe('POST');
    expect(calls[0]?.init?.headers).toEqual({ 'X-Trace': 't-1' });
    expect(calls[0]?.init?.body).toBe('{"name":"demo"}');
  });

  it('leaves non-JSON bodies unparsed', async () => {
    const fetchImpl: typeof fetch = async () => new Response('plain', { status: 200 });

    const response = await new HttpEndpointInvoker({ fetch: fetchImpl }).invoke(request);

    expect(response.body).toBe('plain');
    expect(response.json).toBeUndefined();
  });

  it('wraps network failures in TransportError', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };

    const invocation = new HttpEndpointInvoker({ fetch: fetchImpl }).invoke(request);

    await expect(invocation).rejects.toBeInstanceOf(TransportError);
    await expect(invocation).rejects.toThrow('HTTP POST https://api.test/users failed: fetch failed');
  });

  it('times out slow requests', async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    await expect(new HttpEndpointInvoker({ timeoutMs: 20, fetch: fetchImpl }).invoke(request)).rejects.toThrow(
      'HTTP POST https://api.test/users failed: request timed out after 20ms',
    );
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl: typeof fetch = async (_input, init) => {
      if (init?.signal?.aborted) {
        throw new Error('aborted');
      }
      return new Response('');
    };

    await expect(new HttpEndpointInvoker({ fetch: fetchImpl }).invoke(request, controller.signal)).rejects.toThrow(
      'HTTP POST https://api.test/users failed: aborted',
    );
  });
});
