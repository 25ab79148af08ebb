/**
 * Endpoint invocation contract
 *
 * @module http
 */

import type { TemplateResponse } from '../context/TemplateResolver.js';

/**
 * Fully resolved request, ready for the wire
 */
export interface EndpointRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Response as stages and `response.*` tokens see it
 */
export type EndpointResponse = TemplateResponse;

/**
 * Transport for endpoint stages. Implementations return every response,
 * whatever its status, and throw TransportError when no response arrives.
 */
export interface EndpointInvoker {
  invoke(request: EndpointRequest, signal?: AbortSignal): Promise<EndpointResponse>;
}
