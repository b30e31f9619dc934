/**
 * HTTP Adapter exports
 */

export { HttpAdapter } from './http-adapter.js';
export type { HttpAdapterOptions } from './http-adapter.js';
export { FetchTransport } from './transport.js';
export type {
  HttpTransport,
  TransportResponse,
  TransportRequestOptions,
  FetchTransportOptions,
} from './transport.js';
export { buildTokenRequestBody, TOKEN_REQUEST_HEADERS } from './token-request.js';
export { parseTokenResponse, RawTokenResponseSchema } from './token-response.js';
export { normalizeScope } from './utils.js';
