/**
 * src/index.ts: Public entry point of so24-client.
 *
 *   import { So24Client } from 'so24-client';
 *
 *   await So24Client.withClient(credentials, { cacheTtl: 60 }, async (client) => {
 *     const page = await client.customers.list({ search: 'acme' });
 *   });
 */

export { So24Client } from './client/So24Client.js';

export {
  ClientOptionsSchema,
  DEFAULT_BASE_URL,
  DEFAULT_HEADERS,
  DEFAULT_SCOPE,
  DEFAULT_TOKEN_URL,
  credentialsFromEnv,
  loadEnv,
  optionsFromEnv,
  resolveOptions,
} from './config.js';
export type { ClientOptions, Env, ResolvedClientOptions } from './config.js';

export { OAuthClientCredentialsExchange, ORGANIZATION_HEADER } from './auth/oauth.js';
export type { Credentials, IssuedToken, TokenExchange } from './auth/oauth.js';
export { TokenManager } from './auth/token-manager.js';
export type { AccessToken } from './auth/token-manager.js';

export {
  ApiError,
  AuthenticationError,
  BatchError,
  ClientClosedError,
  NotFoundError,
  RateLimitExceededError,
  RetryExhaustedError,
  ServerError,
  TransientNetworkError,
  ValidationError,
  classifyResponse,
  isApiError,
  isErrorKind,
  parseRetryAfter,
} from './client/errors.js';
export type { ErrorKind } from './client/errors.js';

export { BatchRequest, BatchResponse, MAX_BATCH_SIZE } from './client/batch.js';
export type { BatchItemInit, BatchItemResponse, BatchPayload } from './client/batch.js';
export type { PaginatedResult } from './client/paginate.js';
export type { HttpMethod, QueryValue, RequestDescriptor } from './client/descriptor.js';
export type { RateLimitStatus } from './client/rate-limit.js';
export type { RetryPolicy } from './client/retry.js';
export { GotTransport } from './client/transport.js';
export type { HttpTransport, TransportRequest, TransportResponse } from './client/transport.js';

export * from './client/resources/index.js';
export * from './client/schemas/index.js';

export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
