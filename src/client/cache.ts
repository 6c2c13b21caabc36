/**
 * cache.ts: In-memory response cache with per-entry TTL and LRU eviction.
 *
 * Scoped to one client instance and never persisted. Map insertion order
 * doubles as recency order: a hit re-inserts the entry at the tail, so the
 * head is always the least recently used entry.
 */

import { isUnderPath } from './descriptor.js';

export interface CacheEntry {
  key: string;
  path: string;
  body: unknown;
  contentType: string | undefined;
  storedAt: number;
  ttlMs: number;
}

export interface ResponseCacheOptions {
  maxSize: number;
  ttlMs: number;
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;
  readonly ttlMs: number;

  constructor(options: ResponseCacheOptions) {
    this.maxSize = Math.max(1, Math.floor(options.maxSize));
    this.ttlMs = options.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  private isFresh(entry: CacheEntry, now: number): boolean {
    return now < entry.storedAt + entry.ttlMs;
  }

  /** Returns the entry while its TTL holds; an expired entry is purged and reported absent. */
  lookup(key: string, now: number = Date.now()): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    this.entries.delete(key);
    if (!this.isFresh(entry, now)) {
      return undefined;
    }
    this.entries.set(key, entry);
    return entry;
  }

  /** Stores (or overwrites) an entry, evicting expired and then least recently used entries to make room. */
  store(entry: CacheEntry, now: number = Date.now()): void {
    this.entries.delete(entry.key);

    if (this.entries.size >= this.maxSize) {
      this.evictExpired(now);
    }
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(entry.key, entry);
  }

  /** Purges every expired entry; returns how many were removed. */
  evictExpired(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Drops every entry whose path lies under `prefix`; returns how many were removed. */
  invalidate(prefix: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (isUnderPath(entry.path, prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }
}
