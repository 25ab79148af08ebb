/**
 * Mock Endpoint Invoker
 *
 * Scripted transport for tests: responses are queued per route
 * (`METHOD url`, or `*` for any) and every request is recorded.
 *
 * @module testing
 */

import { TransportError } from '../errors/index.js';
import { HttpResponseParser } from '../http/HttpResponseParser.js';
import type { EndpointInvoker, EndpointRequest, EndpointResponse } from '../http/EndpointInvoker.js';

export interface MockResponse {
  status: number;
  /** Object bodies are serialized as JSON */
  body?: unknown;
  headers?: Record<string, string>;
}

type ScriptedReply = MockResponse | Error;

export class MockEndpointInvoker implements EndpointInvoker {
  private readonly routes = new Map<string, ScriptedReply[]>();
  private calls: EndpointRequest[] = [];

  /**
   * Queue replies for a route; the last one repeats once the queue is down to it
   */
  on(route: string, ...replies: ScriptedReply[]): this {
    const key = normalizeRoute(route);
    const queue = this.routes.get(key) ?? [];
    queue.push(...replies);
    this.routes.set(key, queue);
    return this;
  }

  async invoke(request: EndpointRequest, signal?: AbortSignal): Promise<EndpointResponse> {
    if (signal?.aborted) {
      throw new TransportError({ method: request.method, url: request.url, cause: new Error('request aborted') });
    }
    this.calls.push({ ...request, headers: { ...request.headers } });

    const reply = this.next(`${request.method.toUpperCase()} ${request.url}`) ?? this.next('*');
    if (!reply) {
      throw new TransportError({ method: request.method, url: request.url, cause: new Error('no mock response registered') });
    }
    if (reply instanceof Error) {
      throw reply;
    }

    const body = reply.body === undefined ? '' : typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    const response: EndpointResponse = { status: reply.status, body, headers: reply.headers ?? {} };
    const json = HttpResponseParser.tryParseJson(body);
    if (json !== undefined) {
      response.json = json;
    }
    return response;
  }

  getCallCount(): number {
    return this.calls.length;
  }

  getCalls(): readonly EndpointRequest[] {
    return [...this.calls];
  }

  getLastCall(): EndpointRequest | undefined {
    return this.calls[this.calls.length - 1];
  }

  reset(): void {
    this.routes.clear();
    this.calls = [];
  }

  private next(key: string): ScriptedReply | undefined {
    const queue = this.routes.get(key);
    if (!queue || queue.length === 0) {
      return undefined;
    }
    return queue.length > 1 ? queue.shift() : queue[0];
  }
}

function normalizeRoute(route: string): string {
  if (route === '*') {
    return route;
  }
  const space = route.indexOf(' ');
  return space === -1 ? route : `${route.slice(0, space).toUpperCase()} ${route.slice(space + 1)}`;
}
