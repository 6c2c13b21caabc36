/**
 * batch.ts: Several API calls sent as one POST to the batch endpoint.
 *
 * Wire format:
 *   request   { requests: [{ id, method, path, body?, query_params? }] }
 *   response  { responses: [{ id, status, body? }] }
 *
 * Sub-requests are matched to sub-responses by id. The batch endpoint's own
 * call goes through the pipeline like any other POST, so it is rate limited,
 * authenticated and retried once as a whole.
 */

import { z } from 'zod';
import { normalizePath, type HttpMethod, type QueryValue } from './descriptor.js';
import { BatchError, ValidationError } from './errors.js';

export const MAX_BATCH_SIZE = 20;

export interface BatchItemInit {
  method: HttpMethod;
  path: string;
  /** Defaults to `req_<position>`. */
  id?: string;
  body?: unknown;
  query?: Record<string, QueryValue>;
}

export interface BatchItem {
  id: string;
  method: HttpMethod;
  path: string;
  body?: unknown;
  query_params?: Record<string, string | number | boolean>;
}

export interface BatchPayload {
  requests: BatchItem[];
}

export class BatchRequest {
  readonly maxSize: number;
  private items: BatchItem[] = [];

  constructor(maxSize: number = MAX_BATCH_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1 || maxSize > MAX_BATCH_SIZE) {
      throw new BatchError(`Batch size must be between 1 and ${MAX_BATCH_SIZE}, got ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  get size(): number {
    return this.items.length;
  }

  /** Ids in insertion order. */
  get ids(): string[] {
    return this.items.map((item) => item.id);
  }

  /** Adds a sub-request and returns the id its response will carry. */
  add(init: BatchItemInit): string {
    if (this.isFull()) {
      throw new BatchError(`Batch is full (max size: ${this.maxSize})`);
    }
    const id = init.id ?? `req_${this.items.length}`;
    if (this.items.some((item) => item.id === id)) {
      throw new BatchError(`Duplicate batch request id: ${id}`);
    }

    const item: BatchItem = { id, method: init.method, path: normalizePath(init.path) };
    if (init.body !== undefined) item.body = init.body;
    if (init.query) {
      const query: Record<string, string | number | boolean> = {};
      for (const [name, value] of Object.entries(init.query)) {
        if (value !== undefined) query[name] = value;
      }
      if (Object.keys(query).length > 0) item.query_params = query;
    }
    this.items.push(item);
    return id;
  }

  clear(): void {
    this.items = [];
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  isFull(): boolean {
    return this.items.length >= this.maxSize;
  }

  /** Paths of the mutating sub-requests; their cached reads go stale when the batch is sent. */
  mutatedPaths(): string[] {
    return this.items.filter((item) => item.method !== 'GET' && item.method !== 'HEAD').map((item) => item.path);
  }

  toPayload(): BatchPayload {
    return { requests: this.items.map((item) => ({ ...item })) };
  }
}

const BatchResponseSchema = z.object({
  responses: z.array(
    z
      .object({
        id: z.string(),
        status: z.number().int(),
        body: z.unknown().optional(),
      })
      .passthrough(),
  ),
});

export type BatchItemResponse = z.infer<typeof BatchResponseSchema>['responses'][number];

export class BatchResponse {
  readonly requestIds: readonly string[];
  private readonly responses = new Map<string, BatchItemResponse>();

  constructor(payload: unknown, requestIds: readonly string[]) {
    const parsed = BatchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod('Malformed batch response', parsed.error);
    }
    this.requestIds = requestIds;
    for (const response of parsed.data.responses) {
      this.responses.set(response.id, response);
    }
  }

  get(id: string): BatchItemResponse | undefined {
    return this.responses.get(id);
  }

  all(): ReadonlyMap<string, BatchItemResponse> {
    return this.responses;
  }

  status(id: string): number | undefined {
    return this.responses.get(id)?.status;
  }

  body(id: string): unknown {
    return this.responses.get(id)?.body;
  }

  isSuccessful(id: string): boolean {
    const status = this.status(id);
    return status !== undefined && status >= 200 && status < 300;
  }

  /** True when every sub-request that was sent answered 2xx; a missing answer counts as failure. */
  allSuccessful(): boolean {
    return this.requestIds.every((id) => this.isSuccessful(id));
  }
}
