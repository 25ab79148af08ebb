/**
 * HTTP Request Builder
 *
 * Fluent builder for endpoint requests. Values passed in are already
 * template-resolved.
 *
 * @example
 * ```ts
 * const request = HttpRequestBuilder.for('POST', 'https://api.test/', '/orders')
 *   .query({ page: '1' })
 *   .headers({ Authorization: 'Bearer "abc"' })
 *   .body('{"sku":"A1"}')
 *   .build();
 * // url: https://api.test/orders?page=1, Authorization: Bearer abc
 * ```
 *
 * @module http
 */

import type { EndpointRequest } from './EndpointInvoker.js';

const DEFAULT_CONTENT_TYPE = 'application/json';
const BEARER_PREFIX = 'Bearer ';

export class HttpRequestBuilder {
  private readonly requestMethod: string;
  private readonly url: string;
  private readonly queryParams: Array<[string, string]> = [];
  private readonly headerMap = new Map<string, { name: string; value: string }>();
  private requestBody?: string;

  constructor(method: string, url: string) {
    this.requestMethod = method.trim().toUpperCase();
    this.url = url;
  }

  /**
   * Start from a base URL and a stage path; exactly one slash joins them
   */
  static for(method: string, baseUrl: string, path: string): HttpRequestBuilder {
    return new HttpRequestBuilder(method, joinUrl(baseUrl, path));
  }

  query(params: Readonly<Record<string, string>>): this {
    for (const [key, value] of Object.entries(params)) {
      this.queryParams.push([key, value]);
    }
    return this;
  }

  /**
   * Set a header; names compare case-insensitively and a later value wins
   */
  header(name: string, value: string): this {
    const normalized = name.toLowerCase() === 'authorization' ? normalizeAuthorization(value) : value;
    this.headerMap.set(name.toLowerCase(), { name, value: normalized });
    return this;
  }

  headers(headers: Readonly<Record<string, string>>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.header(name, value);
    }
    return this;
  }

  /**
   * Set the body; an empty body is not sent
   */
  body(body: string | undefined): this {
    this.requestBody = body && body.trim() ? body : undefined;
    return this;
  }

  build(): EndpointRequest {
    if (this.requestBody !== undefined && !this.headerMap.has('content-type')) {
      this.header('Content-Type', DEFAULT_CONTENT_TYPE);
    }

    const headers: Record<string, string> = {};
    for (const { name, value } of this.headerMap.values()) {
      headers[name] = value;
    }

    const request: EndpointRequest = {
      method: this.requestMethod,
      url: this.buildUrl(),
      headers,
    };
    if (this.requestBody !== undefined) {
      request.body = this.requestBody;
    }
    return request;
  }

  private buildUrl(): string {
    if (this.queryParams.length === 0) {
      return this.url;
    }
    const query = this.queryParams
      .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
      .join('&');
    return `${this.url}?${query}`;
  }
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * `Bearer "token"\n` → `Bearer token`
 */
export function normalizeAuthorization(value: string): string {
  if (!value.toLowerCase().startsWith(BEARER_PREFIX.toLowerCase())) {
    return value;
  }
  const token = value.slice(BEARER_PREFIX.length).replace(/^["\s]+|["\s]+$/g, '');
  return `${BEARER_PREFIX}${token}`;
}
