export { Client, createClient, type ClientOptions, type HttpMethod, type HttpResponse } from './client.js';
export { FileStream } from './body.js';
export { PooledRequest, RequestPool, type PooledBody } from './pool.js';
export { createRequest, methodSendsBody, RequestDefinition } from './request.js';
export { isNoContentStatus, readResponseBody, type ResponseBody } from './response.js';
export {
  ClientConfigSchema,
  DEFAULT_DIAL_TIMEOUT_SECONDS,
  DEFAULT_MAX_CONNS_PER_HOST,
  isIpOrCidr,
  RequestOptionsSchema,
  RESPONSE_TYPES,
  type ClientConfig,
  type ClientConfigInput,
  type RequestBodyInput,
  type RequestOptions,
  type RequestOptionsInput,
  type ResponseType
} from './schemas.js';
export {
  createNetworkPolicy,
  createNodeTransport,
  type HttpTransport,
  type NetworkPolicy,
  type TransportRequest,
  type TransportResponse
} from './transport.js';
