/**
 * pipeline.ts: The single path every outbound call takes.
 *
 * Per call: CACHE_CHECK → RATE_LIMIT_WAIT → AUTH → ATTEMPT (inner retry loop)
 * → [AUTH_RETRY once] → DECODE → CACHE_UPDATE → DONE, any stage able to end
 * in FAILED with a classified ApiError.
 *
 * Every dispatched HTTP attempt consumes one rate-limit unit; cache hits
 * consume nothing. Token, cache and limiter state belong to this instance.
 */

import type { AccessToken, TokenManager } from '../auth/token-manager.js';
import { authorizationHeader } from '../auth/token-manager.js';
import type { Logger } from '../logger.js';
import type { ResponseCache } from './cache.js';
import {
  cacheKey,
  describeRequest,
  isReadOnly,
  isUnderPath,
  resourceRoot,
  sortedQuery,
  type RequestDescriptor,
} from './descriptor.js';
import {
  AuthenticationError,
  ClientClosedError,
  RateLimitExceededError,
  ValidationError,
  classifyResponse,
} from './errors.js';
import type { FixedWindowRateLimiter } from './rate-limit.js';
import { withRetry, type RetryPolicy } from './retry.js';
import type { HttpTransport, TransportResponse } from './transport.js';

export type PipelineStage =
  | 'CACHE_CHECK'
  | 'RATE_LIMIT_WAIT'
  | 'AUTH'
  | 'ATTEMPT'
  | 'AUTH_RETRY'
  | 'DECODE'
  | 'CACHE_UPDATE'
  | 'DONE'
  | 'FAILED';

export interface RequestPipelineOptions {
  transport: HttpTransport;
  tokens: TokenManager;
  limiter: FixedWindowRateLimiter;
  /** null when caching is disabled. */
  cache: ResponseCache | null;
  retry: RetryPolicy;
  timeoutMs: number;
  /** Static headers sent with every request; descriptor headers win on conflict. */
  headers: Record<string, string>;
  logger: Logger;
}

interface PendingRead {
  path: string;
  run: Promise<unknown>;
}

export class RequestPipeline {
  private readonly transport: HttpTransport;
  private readonly tokens: TokenManager;
  private readonly limiter: FixedWindowRateLimiter;
  private readonly cache: ResponseCache | null;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  // Identical cacheable reads in flight share one run
  private readonly pending = new Map<string, PendingRead>();
  // Bumped by every completed write; a read started under an older value never reaches the cache
  private writeGeneration = 0;
  private readonly controller = new AbortController();

  constructor(options: RequestPipelineOptions) {
    this.transport = options.transport;
    this.tokens = options.tokens;
    this.limiter = options.limiter;
    this.cache = options.cache;
    this.retry = options.retry;
    this.timeoutMs = options.timeoutMs;
    this.headers = options.headers;
    this.logger = options.logger;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * execute: runs one descriptor through the pipeline and returns the
   * decoded payload (parsed JSON, raw text for non-JSON bodies, undefined for
   * empty ones).
   */
  async execute(descriptor: RequestDescriptor): Promise<unknown> {
    if (this.closed) {
      throw new ClientClosedError();
    }

    if (!isReadOnly(descriptor) || this.cache === null) {
      return this.run(descriptor, null);
    }

    const key = cacheKey(descriptor);
    this.stage('CACHE_CHECK', descriptor);
    const hit = this.cache.lookup(key);
    if (hit) {
      this.logger.debug({ request: describeRequest(descriptor) }, 'cache hit');
      return structuredClone(hit.body);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight.run.then((payload) => structuredClone(payload));
    }

    const read: PendingRead = {
      path: descriptor.path,
      run: this.run(descriptor, key).finally(() => {
        if (this.pending.get(key) === read) this.pending.delete(key);
      }),
    };
    this.pending.set(key, read);
    return read.run;
  }

  /** Cancels rate-limit and backoff waits, aborts in-flight requests and drops token and cache. */
  close(): void {
    if (this.closed) return;
    this.controller.abort();
    this.limiter.close();
    this.transport.close();
    this.tokens.clear();
    this.cache?.clear();
    this.pending.clear();
  }

  private async run(descriptor: RequestDescriptor, key: string | null): Promise<unknown> {
    const generation = this.writeGeneration;
    try {
      let response: TransportResponse;
      const used: { token: AccessToken | null } = { token: null };
      try {
        response = await this.dispatch(descriptor, used);
      } catch (error) {
        // A 401 from the API on the first pass gets exactly one forced refresh
        // and re-run; a failed token exchange (no token in hand) does not
        if (!(error instanceof AuthenticationError) || error.status !== 401 || used.token === null) {
          throw error;
        }
        this.stage('AUTH_RETRY', descriptor);
        this.logger.warn({ request: describeRequest(descriptor) }, 'access token rejected, refreshing once');
        await this.tokens.refresh(used.token);
        response = await this.dispatch(descriptor, used);
      }

      this.stage('DECODE', descriptor);
      const payload = decodeBody(response);

      this.stage('CACHE_UPDATE', descriptor);
      this.updateCache(descriptor, key, generation, payload, response.contentType);

      this.stage('DONE', descriptor);
      return payload;
    } catch (error) {
      this.logger.debug(
        { request: describeRequest(descriptor), error: error instanceof Error ? error.message : String(error) },
        'pipeline stage FAILED',
      );
      throw error;
    }
  }

  private dispatch(
    descriptor: RequestDescriptor,
    used: { token: AccessToken | null },
  ): Promise<TransportResponse> {
    return withRetry(
      async (attempt) => {
        this.stage('RATE_LIMIT_WAIT', descriptor);
        await this.limiter.acquire();

        this.stage('AUTH', descriptor);
        used.token = null;
        const token = await this.tokens.getValidToken();
        used.token = token;

        this.stage('ATTEMPT', descriptor, { attempt });
        const response = await this.transport.send({
          method: descriptor.method,
          path: descriptor.path,
          query: sortedQuery(descriptor.query),
          body: descriptor.body,
          headers: {
            ...this.headers,
            ...descriptor.headers,
            Authorization: authorizationHeader(token),
          },
          timeoutMs: this.timeoutMs,
        });

        if (response.status < 200 || response.status >= 300) {
          const error = classifyResponse(response.status, looseBody(response), response.headers);
          if (error instanceof RateLimitExceededError && error.retryAfterMs !== null) {
            this.limiter.pauseUntil(Date.now() + error.retryAfterMs);
          }
          throw error;
        }
        return response;
      },
      {
        policy: this.retry,
        signal: this.controller.signal,
        onRetry: ({ attempt, error, delayMs }) => {
          this.logger.warn(
            {
              request: describeRequest(descriptor),
              attempt,
              maxAttempts: this.retry.maxAttempts,
              status: error.status,
              delayMs: Math.round(delayMs),
            },
            `retrying after ${error.name}: ${error.message}`,
          );
        },
      },
    );
  }

  private updateCache(
    descriptor: RequestDescriptor,
    key: string | null,
    generation: number,
    payload: unknown,
    contentType: string | undefined,
  ): void {
    if (this.cache === null) return;

    if (isReadOnly(descriptor)) {
      if (key === null) return;
      if (generation !== this.writeGeneration) {
        this.logger.debug({ request: describeRequest(descriptor) }, 'read overtaken by a write, not cached');
        return;
      }
      this.cache.store({
        key,
        path: descriptor.path,
        body: structuredClone(payload),
        contentType,
        storedAt: Date.now(),
        ttlMs: this.cache.ttlMs,
      });
      return;
    }

    this.writeGeneration++;
    const roots = new Set([descriptor.path, ...descriptor.invalidates].map(resourceRoot));
    for (const root of roots) {
      // Later reads under the root start their own run instead of joining one sent before the write
      for (const [pendingKey, read] of this.pending) {
        if (isUnderPath(read.path, root)) this.pending.delete(pendingKey);
      }
      const removed = this.cache.invalidate(root);
      if (removed > 0) {
        this.logger.debug({ root, removed }, 'cache entries invalidated by write');
      }
    }
  }

  private stage(stage: PipelineStage, descriptor: RequestDescriptor, extra: Record<string, unknown> = {}): void {
    this.logger.debug({ stage, request: describeRequest(descriptor), ...extra }, `pipeline stage ${stage}`);
  }
}

function isJsonContentType(contentType: string | undefined): boolean {
  return contentType !== undefined && /[/+]json\b/i.test(contentType);
}

/** Best-effort body for error classification: JSON when it parses, text otherwise. */
function looseBody(response: TransportResponse): unknown {
  if (response.body === '') return undefined;
  try {
    const parsed: unknown = JSON.parse(response.body);
    return parsed;
  } catch {
    return response.body;
  }
}

/**
 * decodeBody: JSON bodies are parsed, empty bodies (204) decode to undefined.
 * A body that claims to be JSON but does not parse is a malformed response.
 */
export function decodeBody(response: TransportResponse): unknown {
  if (response.status === 204 || response.body.trim() === '') {
    return undefined;
  }

  const looksJson = /^\s*[[{]/.test(response.body);
  if (!isJsonContentType(response.contentType) && !looksJson) {
    return response.body;
  }

  try {
    const parsed: unknown = JSON.parse(response.body);
    return parsed;
  } catch (error) {
    throw new ValidationError(`Malformed response body: ${error instanceof Error ? error.message : String(error)}`, {
      status: response.status,
      cause: error,
    });
  }
}
