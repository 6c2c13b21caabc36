import { OAuthClientCredentialsExchange, type Credentials } from '../auth/oauth.js';
import { TokenManager } from '../auth/token-manager.js';
import {
  credentialsFromEnv,
  optionsFromEnv,
  resolveOptions,
  validateCredentials,
  type ClientOptions,
  type ResolvedClientOptions,
} from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { BatchResponse, MAX_BATCH_SIZE, type BatchRequest } from './batch.js';
import { ResponseCache } from './cache.js';
import { createDescriptor, type HttpMethod, type QueryValue } from './descriptor.js';
import { BatchError } from './errors.js';
import { RequestPipeline } from './pipeline.js';
import { FixedWindowRateLimiter, type RateLimitStatus } from './rate-limit.js';
import type { ApiRequester, RequestOptions } from './resources/base.js';
import { CustomersResource } from './resources/customers.js';
import { InvoicesResource } from './resources/invoices.js';
import { ProductCategoriesResource } from './resources/product-categories.js';
import { ProductsResource } from './resources/products.js';
import { GotTransport } from './transport.js';

/**
 * So24Client: typed client for one organization's REST API.
 *
 * Design constraints:
 *   - Per-organization isolation: one instance = one credential set, one token,
 *     one cache and one rate-limit window. Nothing is shared between instances.
 *   - Every call, resource methods included, goes through the request pipeline
 *     (cache → rate limit → token → attempt with retry → 401 refresh → decode).
 *   - Options are validated at construction and never change afterwards.
 *   - After close() every call rejects with ClientClosedError.
 *
 * Resources:
 *   - customers
 *   - products
 *   - productCategories
 *   - invoices
 */
export class So24Client implements ApiRequester {
  readonly options: ResolvedClientOptions;
  readonly organizationId: string;

  readonly customers: CustomersResource;
  readonly products: ProductsResource;
  readonly productCategories: ProductCategoriesResource;
  readonly invoices: InvoicesResource;

  private readonly logger: Logger;
  private readonly tokens: TokenManager;
  private readonly limiter: FixedWindowRateLimiter;
  private readonly cache: ResponseCache | null;
  private readonly pipeline: RequestPipeline;

  constructor(credentials: Credentials, options: ClientOptions = {}) {
    const validated = validateCredentials(credentials);
    this.options = resolveOptions(options);
    this.organizationId = validated.organizationId;
    this.logger = (options.logger ?? createLogger()).child({ organizationId: validated.organizationId });

    const timeoutMs = this.options.timeout * 1000;
    const exchange =
      options.tokenExchange ??
      new OAuthClientCredentialsExchange(validated, {
        tokenUrl: this.options.tokenUrl,
        scope: this.options.scope,
        timeoutMs,
      });

    this.tokens = new TokenManager(exchange, {
      refreshMarginMs: this.options.tokenRefreshMargin * 1000,
      logger: this.logger,
    });
    this.limiter = new FixedWindowRateLimiter(this.options.rateLimitRate, { logger: this.logger });
    this.cache = this.options.cacheEnabled
      ? new ResponseCache({ maxSize: this.options.cacheMaxSize, ttlMs: this.options.cacheTtl * 1000 })
      : null;

    this.pipeline = new RequestPipeline({
      transport: options.transport ?? new GotTransport({ baseUrl: this.options.baseUrl, http2: this.options.http2 }),
      tokens: this.tokens,
      limiter: this.limiter,
      cache: this.cache,
      retry: this.options.retry,
      timeoutMs,
      headers: this.options.headers,
      logger: this.logger,
    });

    this.customers = new CustomersResource(this);
    this.products = new ProductsResource(this);
    this.productCategories = new ProductCategoriesResource(this);
    this.invoices = new InvoicesResource(this);

    this.logger.debug(
      {
        baseUrl: this.options.baseUrl,
        cacheEnabled: this.options.cacheEnabled,
        rateLimitRate: this.options.rateLimitRate,
      },
      'client created',
    );
  }

  /** Builds a client from SO24_* environment variables (and .env). */
  static fromEnv(overrides: ClientOptions = {}): So24Client {
    return new So24Client(credentialsFromEnv(), { ...optionsFromEnv(), ...overrides });
  }

  /**
   * withClient: scoped acquisition: the client is closed when `fn` settles,
   * whether it resolved or threw.
   */
  static async withClient<T>(
    credentials: Credentials,
    options: ClientOptions,
    fn: (client: So24Client) => Promise<T> | T,
  ): Promise<T> {
    const client = new So24Client(credentials, options);
    try {
      return await fn(client);
    } finally {
      client.close();
    }
  }

  get closed(): boolean {
    return this.pipeline.closed;
  }

  /** Sends one call through the pipeline and returns the decoded payload. */
  request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.pipeline.execute(createDescriptor(method, path, options));
  }

  get(path: string, query?: Record<string, QueryValue>, options: Omit<RequestOptions, 'query'> = {}): Promise<unknown> {
    return this.request('GET', path, { ...options, query });
  }

  post(path: string, body?: unknown, options: Omit<RequestOptions, 'body'> = {}): Promise<unknown> {
    return this.request('POST', path, { ...options, body });
  }

  put(path: string, body?: unknown, options: Omit<RequestOptions, 'body'> = {}): Promise<unknown> {
    return this.request('PUT', path, { ...options, body });
  }

  patch(path: string, body?: unknown, options: Omit<RequestOptions, 'body'> = {}): Promise<unknown> {
    return this.request('PATCH', path, { ...options, body });
  }

  delete(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('DELETE', path, options);
  }

  /**
   * sendBatch: posts every queued sub-request in one call. Cached reads under
   * the paths of mutating sub-requests are invalidated once the batch succeeds.
   */
  async sendBatch(batch: BatchRequest, path = '/batch'): Promise<BatchResponse> {
    if (batch.isEmpty()) {
      throw new BatchError('Batch is empty');
    }
    if (batch.size > MAX_BATCH_SIZE) {
      throw new BatchError(`Batch has ${batch.size} requests (max size: ${MAX_BATCH_SIZE})`);
    }

    const ids = batch.ids;
    const payload = await this.request('POST', path, {
      body: batch.toPayload(),
      invalidates: batch.mutatedPaths(),
    });
    return new BatchResponse(payload, ids);
  }

  rateLimitStatus(): RateLimitStatus {
    return this.limiter.status();
  }

  /** Number of cached responses; 0 when caching is disabled. */
  get cacheSize(): number {
    return this.cache?.size ?? 0;
  }

  clearCache(): void {
    this.cache?.clear();
  }

  /**
   * Releases the transport, drops the token and cache, and rejects callers
   * waiting on the rate limiter. Safe to call more than once.
   */
  close(): void {
    if (this.pipeline.closed) return;
    this.pipeline.close();
    this.logger.debug('client closed');
  }
}
