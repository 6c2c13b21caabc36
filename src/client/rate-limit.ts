import { ClientClosedError } from './errors.js';
import type { Logger } from '../logger.js';

export const RATE_LIMIT_WINDOW_MS = 60_000;

export interface RateLimitStatus {
  enabled: boolean;
  ceiling: number | null;
  windowStart: number | null;
  callsInWindow: number;
  pausedUntil: number | null;
  waiting: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * FixedWindowRateLimiter: bounds outbound calls to `ceiling` per window.
 *
 * The window opens at the first admission after the previous one rolled over.
 * Callers beyond the ceiling are queued and released in arrival order when the
 * window rolls over; nobody is rejected for being over the limit.
 *
 * A ceiling of null or <= 0 disables limiting: acquire() resolves immediately.
 * A server Retry-After hint (pauseUntil) holds every admission until it passes.
 */
export class FixedWindowRateLimiter {
  private readonly ceiling: number | null;
  private readonly windowMs: number;
  private readonly logger: Logger | undefined;

  private windowStart: number | null = null;
  private callsInWindow = 0;
  private pausedUntil = 0;
  private closed = false;

  // FIFO of suspended callers, same hand-off pattern as a concurrency semaphore
  private readonly queue: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(ceiling: number | null, options: { windowMs?: number; logger?: Logger } = {}) {
    this.ceiling = ceiling !== null && ceiling > 0 ? Math.floor(ceiling) : null;
    this.windowMs = options.windowMs ?? RATE_LIMIT_WINDOW_MS;
    this.logger = options.logger;
  }

  get enabled(): boolean {
    return this.ceiling !== null;
  }

  /** Consumes one unit of the current window, suspending until one is available. */
  acquire(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClientClosedError());
    }
    if (this.ceiling === null) {
      return Promise.resolve();
    }

    // Skip the fast path while others wait, so late arrivals cannot overtake them
    if (this.queue.length === 0 && this.tryAdmit(Date.now())) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.queue.push({ resolve, reject });
      this.logger?.debug(
        { waiting: this.queue.length, callsInWindow: this.callsInWindow, ceiling: this.ceiling },
        'rate limit reached, caller suspended',
      );
      this.schedule();
    });
  }

  /** Holds every admission until `until` (epoch ms), e.g. after a 429 with Retry-After. */
  pauseUntil(until: number): void {
    if (this.ceiling === null || until <= this.pausedUntil) return;
    this.pausedUntil = until;
    this.logger?.debug({ pausedUntil: until }, 'rate limiter paused by server hint');
  }

  status(): RateLimitStatus {
    return {
      enabled: this.ceiling !== null,
      ceiling: this.ceiling,
      windowStart: this.windowStart,
      callsInWindow: this.callsInWindow,
      pausedUntil: this.pausedUntil > 0 ? this.pausedUntil : null,
      waiting: this.queue.length,
    };
  }

  /** Rejects every suspended caller with ClientClosedError and refuses new ones. */
  close(): void {
    this.closed = true;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const waiters = this.queue.splice(0, this.queue.length);
    for (const waiter of waiters) {
      waiter.reject(new ClientClosedError());
    }
  }

  private tryAdmit(now: number): boolean {
    if (this.ceiling === null) return true;
    if (now < this.pausedUntil) return false;

    if (this.windowStart === null || now >= this.windowStart + this.windowMs) {
      this.windowStart = now;
      this.callsInWindow = 0;
    }
    if (this.callsInWindow < this.ceiling) {
      this.callsInWindow++;
      return true;
    }
    return false;
  }

  private drain(): void {
    this.timer = null;
    const now = Date.now();

    while (this.queue.length > 0 && this.tryAdmit(now)) {
      const next = this.queue.shift();
      next?.resolve();
    }

    if (this.queue.length > 0) {
      this.schedule();
    }
  }

  private schedule(): void {
    if (this.timer !== null || this.closed) return;

    const now = Date.now();
    const windowFull =
      this.ceiling !== null && this.windowStart !== null && this.callsInWindow >= this.ceiling;
    const rollover =
      windowFull && this.windowStart !== null ? this.windowStart + this.windowMs : now;
    const wakeAt = Math.max(rollover, this.pausedUntil);

    this.timer = setTimeout(() => this.drain(), Math.max(0, wakeAt - now));
  }
}
