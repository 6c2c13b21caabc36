/**
 * descriptor.ts: The immutable description of one outbound call.
 *
 * A descriptor is both the unit of execution for the pipeline and, once
 * normalized, the cache key for read-only calls.
 */

import { createHash } from 'node:crypto';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query: Readonly<Record<string, QueryValue>>;
  readonly body?: unknown;
  readonly headers: Readonly<Record<string, string>>;
  // Extra paths whose cached reads a successful call makes stale (batch posts)
  readonly invalidates: readonly string[];
}

export interface DescriptorInit {
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  invalidates?: string[];
}

const READ_ONLY_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['GET', 'HEAD']);

/**
 * Ensures a leading slash and strips trailing slashes, so `customers/` and
 * `/customers` describe the same resource.
 */
export function normalizePath(path: string): string {
  const trimmed = path.trim().replace(/\/+$/, '');
  if (trimmed === '') return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function createDescriptor(
  method: HttpMethod,
  path: string,
  init: DescriptorInit = {},
): RequestDescriptor {
  const query: Record<string, QueryValue> = {};
  for (const [name, value] of Object.entries(init.query ?? {})) {
    if (value !== undefined) query[name] = value;
  }

  return Object.freeze({
    method,
    path: normalizePath(path),
    query: Object.freeze(query),
    body: init.body,
    headers: Object.freeze({ ...init.headers }),
    invalidates: Object.freeze((init.invalidates ?? []).map(normalizePath)),
  });
}

export function isReadOnly(descriptor: RequestDescriptor): boolean {
  return READ_ONLY_METHODS.has(descriptor.method);
}

/** Query parameters sorted by name, undefined values dropped. */
export function sortedQuery(query: Readonly<Record<string, QueryValue>>): Array<[string, string]> {
  return Object.entries(query)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([name, value]): [string, string] => [name, String(value)])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function hashBody(body: unknown): string {
  if (body === undefined) return '';
  return createHash('sha256').update(JSON.stringify(body)).digest('hex');
}

/**
 * cacheKey: deterministic key built from method, path, sorted query and
 * a digest of the body. Headers are not part of the key; the client's static
 * headers are fixed for its lifetime.
 */
export function cacheKey(descriptor: RequestDescriptor): string {
  return JSON.stringify([
    descriptor.method,
    descriptor.path,
    sortedQuery(descriptor.query),
    hashBody(descriptor.body),
  ]);
}

/**
 * resourceRoot: the first path segment, e.g. `/customers/42/contacts` → `/customers`.
 * Writes invalidate cached reads under the root of the path they touched.
 */
export function resourceRoot(path: string): string {
  const normalized = normalizePath(path);
  const [first] = normalized.split('/').filter((segment) => segment !== '');
  return first === undefined ? '/' : `/${first}`;
}

/** Segment-aware prefix match: `/customers` covers `/customers/1` but not `/customersX`. */
export function isUnderPath(path: string, prefix: string): boolean {
  const normalizedPrefix = normalizePath(prefix);
  if (normalizedPrefix === '/') return true;
  const normalizedPath = normalizePath(path);
  return normalizedPath === normalizedPrefix || normalizedPath.startsWith(`${normalizedPrefix}/`);
}

export function describeRequest(descriptor: RequestDescriptor): string {
  const query = sortedQuery(descriptor.query);
  if (query.length === 0) return `${descriptor.method} ${descriptor.path}`;
  return `${descriptor.method} ${descriptor.path}?${new URLSearchParams(query).toString()}`;
}
