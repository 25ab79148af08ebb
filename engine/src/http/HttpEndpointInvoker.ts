/**
 * HTTP Endpoint Invoker
 *
 * Default transport for endpoint stages, built on the global fetch.
 * Every response comes back as-is; network failures and timeouts become
 * TransportError so the retry executor and circuit breaker can count them.
 *
 * @module http
 */

import { TransportError } from '../errors/index.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategory } from '../types/log-types.js';
import { HttpResponseParser } from './HttpResponseParser.js';
import type { EndpointInvoker, EndpointRequest, EndpointResponse } from './EndpointInvoker.js';

export interface HttpEndpointInvokerOptions {
  /**
   * Per-request timeout (milliseconds)
   * @default 30000
   */
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

export class HttpEndpointInvoker implements EndpointInvoker {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEndpointInvokerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async invoke(request: EndpointRequest, signal?: AbortSignal): Promise<EndpointResponse> {
    const { signal: requestSignal, dispose } = linkSignals(this.timeoutMs, signal);
    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: requestSignal,
      });
      const parsed = await HttpResponseParser.parse(response);

      LoggerManager.getLogger().debug(
        `${request.method} ${request.url} → ${parsed.status}`,
        { durationMs: Date.now() - startTime },
        LogCategory.RUNTIME,
      );
      return parsed;
    } catch (error) {
      const cause = requestSignal.aborted && !signal?.aborted
        ? new Error(`request timed out after ${this.timeoutMs}ms`, { cause: error })
        : error;
      throw new TransportError({ method: request.method, url: request.url, cause });
    } finally {
      dispose();
    }
  }
}

/**
 * One signal that aborts on the caller's signal or after `timeoutMs`
 */
function linkSignals(timeoutMs: number, outer?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();

  if (outer?.aborted) {
    controller.abort();
  } else {
    outer?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeout);
      outer?.removeEventListener('abort', onAbort);
    },
  };
}
