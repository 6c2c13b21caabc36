/**
 * base.ts: Shared CRUD endpoint over one resource collection.
 *
 * Outgoing payloads are validated with the resource's create/update schema
 * before anything touches the network; every record coming back is decoded
 * with the record schema. Either failure is a ValidationError.
 */

import type { z } from 'zod';
import { BatchRequest, MAX_BATCH_SIZE, type BatchResponse } from '../batch.js';
import type { HttpMethod, QueryValue } from '../descriptor.js';
import { ValidationError } from '../errors.js';
import {
  DEFAULT_PAGE_SIZE,
  decodeList,
  iteratePages,
  toPage,
  type PaginatedResult,
} from '../paginate.js';

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  /** Extra paths whose cached reads this call makes stale. */
  invalidates?: string[];
}

/** What an endpoint needs from the client: the pipeline entry point and batching. */
export interface ApiRequester {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
  sendBatch(batch: BatchRequest, path?: string): Promise<BatchResponse>;
}

export interface ListParams {
  /** 1-based. */
  page?: number;
  pageSize?: number;
  search?: string;
  [filter: string]: QueryValue;
}

export interface ResourceSchemas<TRecord, TCreate, TUpdate> {
  record: z.ZodType<TRecord, z.ZodTypeDef, unknown>;
  create: z.ZodType<unknown, z.ZodTypeDef, TCreate>;
  update: z.ZodType<unknown, z.ZodTypeDef, TUpdate>;
}

export abstract class ResourceEndpoint<TRecord, TCreate, TUpdate> {
  protected readonly client: ApiRequester;
  readonly basePath: string;
  /** Singular noun used in error messages, e.g. "customer". */
  protected readonly noun: string;
  private readonly schemas: ResourceSchemas<TRecord, TCreate, TUpdate>;

  protected constructor(
    client: ApiRequester,
    basePath: string,
    noun: string,
    schemas: ResourceSchemas<TRecord, TCreate, TUpdate>,
  ) {
    this.client = client;
    this.basePath = basePath;
    this.noun = noun;
    this.schemas = schemas;
  }

  async list(params: ListParams = {}): Promise<PaginatedResult<TRecord>> {
    const { page = 1, pageSize = DEFAULT_PAGE_SIZE, search, ...filters } = params;
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError(`Invalid page: ${page}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ValidationError(`Invalid pageSize: ${pageSize}`);
    }

    const query: Record<string, QueryValue> = { ...filters, page, pageSize };
    if (search) query.search = search;

    const payload = await this.client.request('GET', this.basePath, { query });
    const items = decodeList(this.schemas.record, payload, `Invalid ${this.noun} list`);
    return toPage(items, page, pageSize);
  }

  /** Every record across pages, fetched one page at a time as iteration proceeds. */
  listAll(params: Omit<ListParams, 'page'> = {}): AsyncGenerator<TRecord, void, undefined> {
    return iteratePages((page) => this.list({ ...params, page }));
  }

  async get(id: string): Promise<TRecord> {
    const payload = await this.client.request('GET', this.itemPath(id));
    return this.decode(payload);
  }

  async create(input: TCreate): Promise<TRecord> {
    const body = this.validate(this.schemas.create, input, `Invalid ${this.noun}`);
    const payload = await this.client.request('POST', this.basePath, { body });
    return this.decode(payload);
  }

  async update(id: string, patch: TUpdate): Promise<TRecord> {
    const body = this.validate(this.schemas.update, patch, `Invalid ${this.noun} update`);
    const payload = await this.client.request('PATCH', this.itemPath(id), { body });
    return this.decode(payload);
  }

  async delete(id: string): Promise<void> {
    await this.client.request('DELETE', this.itemPath(id));
  }

  /**
   * Fetches several records through the batch endpoint, in chunks of at most
   * 20. The result holds only the ids that answered 2xx with a body.
   */
  async batchGet(ids: readonly string[]): Promise<Map<string, TRecord>> {
    const unique = [...new Set(ids)];
    const records = new Map<string, TRecord>();

    for (let offset = 0; offset < unique.length; offset += MAX_BATCH_SIZE) {
      const batch = new BatchRequest();
      for (const id of unique.slice(offset, offset + MAX_BATCH_SIZE)) {
        batch.add({ method: 'GET', path: this.itemPath(id), id });
      }
      const response = await this.client.sendBatch(batch);
      for (const id of batch.ids) {
        const body = response.body(id);
        if (response.isSuccessful(id) && body !== undefined && body !== null) {
          records.set(id, this.decode(body));
        }
      }
    }
    return records;
  }

  protected itemPath(id: string, ...rest: string[]): string {
    if (id.trim() === '') {
      throw new ValidationError(`Invalid ${this.noun} id: must not be empty`);
    }
    return [this.basePath, encodeURIComponent(id), ...rest].join('/');
  }

  protected decode(payload: unknown): TRecord {
    const parsed = this.schemas.record.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(`Invalid ${this.noun} response`, parsed.error);
    }
    return parsed.data;
  }

  private validate<TInput>(schema: z.ZodType<unknown, z.ZodTypeDef, TInput>, input: TInput, context: string): unknown {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod(context, parsed.error);
    }
    return parsed.data;
  }
}
