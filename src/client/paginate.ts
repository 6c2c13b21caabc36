/**
 * paginate.ts: Pagination envelope for list endpoints.
 *
 * List endpoints take `page` (1-based) and `pageSize` query parameters and
 * answer with either a bare array or an object wrapping it in `data`. There
 * is no total count or next link, so a page is assumed to have a successor
 * exactly when it came back full.
 */

import type { z } from 'zod';
import { ValidationError } from './errors.js';

export const DEFAULT_PAGE_SIZE = 50;

export interface PaginatedResult<T> {
  items: T[];
  page: number;
  pageSize: number;
  hasMore: boolean;
}

/**
 * Pulls the record array out of a list response. A lone object is treated as
 * a one-element list; an empty body as an empty one.
 */
export function extractList(payload: unknown): unknown[] {
  if (payload === undefined || payload === null) return [];
  if (Array.isArray(payload)) return payload;
  if (typeof payload === 'object') {
    if ('data' in payload) {
      const data: unknown = payload.data;
      if (Array.isArray(data)) return data;
      if (data === null || data === undefined) return [];
    } else {
      return [payload];
    }
  }
  throw new ValidationError('Error parsing response list: expected an array or an object with a data array', {
    details: payload,
  });
}

export function decodeList<S extends z.ZodTypeAny>(schema: S, payload: unknown, context: string): Array<z.output<S>> {
  return extractList(payload).map((item, index) => {
    const parsed = schema.safeParse(item);
    if (!parsed.success) {
      throw ValidationError.fromZod(`${context} [${index}]`, parsed.error);
    }
    return parsed.data;
  });
}

export function toPage<T>(items: T[], page: number, pageSize: number): PaginatedResult<T> {
  return { items, page, pageSize, hasMore: items.length >= pageSize };
}

/**
 * iteratePages: walks pages from `startPage` until one comes back short.
 * Each page is fetched lazily, when the consumer asks for its first item.
 */
export async function* iteratePages<T>(
  fetchPage: (page: number) => Promise<PaginatedResult<T>>,
  startPage = 1,
): AsyncGenerator<T, void, undefined> {
  let page = startPage;
  for (;;) {
    const result = await fetchPage(page);
    yield* result.items;
    if (!result.hasMore || result.items.length === 0) return;
    page++;
  }
}
