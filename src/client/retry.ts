import {
  ApiError,
  AuthenticationError,
  RateLimitExceededError,
  RetryExhaustedError,
  ServerError,
  TransientNetworkError,
} from './errors.js';
import { sleep } from './sleep.js';

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Upper bound of the random delay added to every backoff. */
  jitterMs: number;
  /** Statuses treated as transient; null means 408, 429 and every 5xx. */
  retryStatuses: readonly number[] | null;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 10_000,
  jitterMs: 250,
  retryStatuses: null,
};

export interface RetryContext {
  attempt: number;
  error: ApiError;
  delayMs: number;
}

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  /** Called before each backoff sleep. */
  onRetry?: (context: RetryContext) => void;
}

/**
 * computeBackoffDelay: exponential backoff with jitter.
 * attempt=0 → base, attempt=1 → base*multiplier, …, capped at maxDelayMs, plus up to jitterMs.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
  return Math.min(exponential, policy.maxDelayMs) + Math.random() * policy.jitterMs;
}

function isRetryableStatus(status: number, policy: RetryPolicy): boolean {
  if (policy.retryStatuses !== null) return policy.retryStatuses.includes(status);
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

/** Whether a failure is likely to succeed on another attempt. */
export function isTransient(error: unknown, policy: RetryPolicy = DEFAULT_RETRY_POLICY): error is ApiError {
  if (error instanceof TransientNetworkError) return true;
  if (error instanceof AuthenticationError) return error.retryable;
  if (error instanceof RetryExhaustedError) return false;
  if (error instanceof RateLimitExceededError || error instanceof ServerError) {
    return error.status === undefined || isRetryableStatus(error.status, policy);
  }
  if (error instanceof ApiError && error.status !== undefined && error.kind === 'api') {
    return isRetryableStatus(error.status, policy);
  }
  return false;
}

/**
 * withRetry: runs `attempt` until it succeeds, fails non-transiently, or the
 * policy's attempts are spent.
 *
 * A 429 carrying Retry-After waits exactly that long; everything else waits
 * computeBackoffDelay. After the last attempt a transient failure surfaces as
 * RetryExhaustedError; with a single allowed attempt it surfaces unchanged.
 * Non-transient errors are re-thrown immediately without retry.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, signal, onRetry } = options;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return await attempt(attemptNumber);
    } catch (error) {
      if (!isTransient(error, policy)) {
        throw error;
      }
      if (attemptNumber >= maxAttempts) {
        throw maxAttempts > 1 ? new RetryExhaustedError(attemptNumber, error) : error;
      }

      const hinted = error instanceof RateLimitExceededError ? error.retryAfterMs : null;
      const delayMs = hinted ?? computeBackoffDelay(attemptNumber - 1, policy);
      onRetry?.({ attempt: attemptNumber, error, delayMs });
      await sleep(delayMs, signal);
    }
  }
}
