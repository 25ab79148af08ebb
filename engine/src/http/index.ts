export type { EndpointInvoker, EndpointRequest, EndpointResponse } from './EndpointInvoker.js';
export { HttpEndpointInvoker, type HttpEndpointInvokerOptions } from './HttpEndpointInvoker.js';
export { HttpRequestBuilder, joinUrl, normalizeAuthorization } from './HttpRequestBuilder.js';
export { HttpResponseParser } from './HttpResponseParser.js';
