/**
 * errors.ts: Classified error hierarchy for every failure the client surfaces.
 *
 * Every non-success path out of the request pipeline ends in one of these.
 * Callers branch on `kind` (or instanceof) rather than parsing messages.
 */

import { z } from 'zod';

export type ErrorKind =
  | 'api'
  | 'authentication'
  | 'transient_network'
  | 'rate_limited'
  | 'validation'
  | 'not_found'
  | 'server'
  | 'retry_exhausted'
  | 'client_closed'
  | 'batch';

export interface ApiErrorOptions {
  status?: number;
  code?: string;
  details?: unknown;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly kind: ErrorKind = 'api';
  readonly status: number | undefined;
  readonly code: string | undefined;
  readonly details: unknown;

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.status = options.status;
    this.code = options.code;
    this.details = options.details;
  }
}

// Token exchange failed, or the API kept rejecting a freshly issued token
export class AuthenticationError extends ApiError {
  override readonly kind = 'authentication';
  // True when the exchange failed for a reason worth retrying (network, 5xx)
  readonly retryable: boolean;

  constructor(message: string, options: ApiErrorOptions & { retryable?: boolean } = {}) {
    super(message, options);
    this.name = 'AuthenticationError';
    this.retryable = options.retryable ?? false;
  }
}

// Connection refused/reset, DNS failure, or the per-attempt deadline elapsed
export class TransientNetworkError extends ApiError {
  override readonly kind = 'transient_network';

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message, options);
    this.name = 'TransientNetworkError';
  }
}

export class RateLimitExceededError extends ApiError {
  override readonly kind = 'rate_limited';
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null, options: ApiErrorOptions = {}) {
    super(message, { status: 429, ...options });
    this.name = 'RateLimitExceededError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class ValidationError extends ApiError {
  override readonly kind = 'validation';
  readonly issues: readonly z.ZodIssue[];

  constructor(message: string, options: ApiErrorOptions & { issues?: readonly z.ZodIssue[] } = {}) {
    super(message, options);
    this.name = 'ValidationError';
    this.issues = options.issues ?? [];
  }

  static fromZod(context: string, error: z.ZodError): ValidationError {
    const summary = error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    return new ValidationError(`${context}: ${summary}`, { issues: error.issues, cause: error });
  }
}

export class NotFoundError extends ApiError {
  override readonly kind = 'not_found';

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message, { status: 404, ...options });
    this.name = 'NotFoundError';
  }
}

export class ServerError extends ApiError {
  override readonly kind = 'server';

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message, options);
    this.name = 'ServerError';
  }
}

/**
 * Thrown when a transient failure persisted through every allowed attempt.
 * Distinct from a first-attempt failure so callers can tell "never worked"
 * from "stopped retrying". The last observed error is kept as `lastError`.
 */
export class RetryExhaustedError extends ApiError {
  override readonly kind = 'retry_exhausted';
  readonly attempts: number;
  readonly lastError: ApiError;

  constructor(attempts: number, lastError: ApiError) {
    super(`Request failed after ${attempts} attempts: ${lastError.message}`, {
      status: lastError.status,
      code: lastError.code,
      details: lastError.details,
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class ClientClosedError extends ApiError {
  override readonly kind = 'client_closed';

  constructor(message = 'Client has been closed') {
    super(message);
    this.name = 'ClientClosedError';
  }
}

export class BatchError extends ApiError {
  override readonly kind = 'batch';

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message, options);
    this.name = 'BatchError';
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isErrorKind<K extends ErrorKind>(
  error: unknown,
  kind: K,
): error is ApiError & { kind: K } {
  return error instanceof ApiError && error.kind === kind;
}

// The API's error envelope. Every field is optional: proxies and load balancers
// in front of the API answer with plain text or HTML.
const ErrorEnvelopeSchema = z
  .object({
    message: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
    code: z.union([z.string(), z.number()]).optional(),
    status: z.union([z.string(), z.number()]).optional(),
    errors: z.unknown().optional(),
  })
  .passthrough();

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

export function parseErrorEnvelope(body: unknown): ErrorEnvelope | null {
  const result = ErrorEnvelopeSchema.safeParse(body);
  return result.success ? result.data : null;
}

const DELTA_SECONDS = /^\d+(?:\.\d+)?$/;

/** Retry-After (delta seconds or an HTTP-date) as a wait in ms; null when absent or unreadable. */
export function parseRetryAfter(
  value: string | string[] | undefined,
  now: number = Date.now(),
): number | null {
  const header = (Array.isArray(value) ? value[0] : value)?.trim();
  if (!header) return null;

  const waitMs = DELTA_SECONDS.test(header) ? Number(header) * 1000 : Date.parse(header) - now;
  return Number.isNaN(waitMs) ? null : Math.max(0, Math.floor(waitMs));
}

/**
 * classifyResponse: maps a non-2xx response onto the error hierarchy.
 *
 * The message comes from the error envelope when the server sent one,
 * otherwise a generic `HTTP Error <status>` line.
 */
export function classifyResponse(
  status: number,
  body: unknown,
  headers: Record<string, string | string[] | undefined> = {},
): ApiError {
  const envelope = parseErrorEnvelope(body);
  const message =
    envelope?.message || envelope?.error_description || envelope?.error || `HTTP Error ${status}`;
  const rawCode = envelope?.code ?? envelope?.status;
  const options: ApiErrorOptions = {
    status,
    code: rawCode === undefined ? undefined : String(rawCode),
    details: envelope?.errors ?? body,
  };

  if (status === 401) return new AuthenticationError(message, options);
  if (status === 404) return new NotFoundError(message, options);
  if (status === 429) {
    return new RateLimitExceededError(message, parseRetryAfter(headers['retry-after']), options);
  }
  if (status === 400 || status === 422) return new ValidationError(message, options);
  if (status >= 500 && status < 600) return new ServerError(message, options);
  return new ApiError(message, options);
}
