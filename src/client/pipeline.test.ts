import { afterEach, describe, expect, it, vi } from 'vitest';
import { TokenManager } from '../auth/token-manager.js';
import { FakeTokenExchange, FakeTransport, silentLogger } from '../testing/fakes.js';
import { ResponseCache } from './cache.js';
import { createDescriptor, type DescriptorInit, type HttpMethod } from './descriptor.js';
import {
  AuthenticationError,
  ClientClosedError,
  NotFoundError,
  RetryExhaustedError,
  TransientNetworkError,
  ValidationError,
} from './errors.js';
import { decodeBody, RequestPipeline, type RequestPipelineOptions } from './pipeline.js';
import { FixedWindowRateLimiter } from './rate-limit.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';

interface SetupOptions {
  expiresIn?: number;
  rateLimit?: number | null;
  cache?: boolean;
  pipeline?: Partial<RequestPipelineOptions>;
}

function setup(options: SetupOptions = {}) {
  const transport = new FakeTransport();
  const exchange = new FakeTokenExchange({ expiresIn: options.expiresIn });
  const tokens = new TokenManager(exchange, { refreshMarginMs: 30_000 });
  const limiter = new FixedWindowRateLimiter(options.rateLimit ?? null);
  const cache = options.cache === false ? null : new ResponseCache({ maxSize: 100, ttlMs: 300_000 });
  const pipeline = new RequestPipeline({
    transport,
    tokens,
    limiter,
    cache,
    retry: { ...DEFAULT_RETRY_POLICY, baseDelayMs: 0, jitterMs: 0 },
    timeoutMs: 30_000,
    headers: { Accept: 'application/json' },
    logger: silentLogger(),
    ...options.pipeline,
  });
  const call = (method: HttpMethod, path: string, init?: DescriptorInit) =>
    pipeline.execute(createDescriptor(method, path, init));
  return { pipeline, transport, exchange, tokens, limiter, cache, call };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

describe('RequestPipeline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('caching', () => {
    it('serves a repeated read from cache without network, token or rate-limit use', async () => {
      const { call, transport, exchange, limiter } = setup({ rateLimit: 10 });
      transport.reply({ body: { id: '1', name: 'Acme' } });

      const first = await call('GET', '/customers/1');
      const second = await call('GET', '/customers/1');

      expect(second).toEqual(first);
      expect(transport.requests).toHaveLength(1);
      expect(exchange.calls).toBe(1);
      expect(limiter.status().callsInWindow).toBe(1);
    });

    it('goes back to the network once the TTL has passed', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(0);
      const { call, transport } = setup();
      transport.reply({ body: { version: 1 } }, { body: { version: 2 } });

      expect(await call('GET', '/products/1')).toEqual({ version: 1 });
      vi.setSystemTime(299_999);
      expect(await call('GET', '/products/1')).toEqual({ version: 1 });
      vi.setSystemTime(300_000);
      expect(await call('GET', '/products/1')).toEqual({ version: 2 });
      expect(transport.requests).toHaveLength(2);
    });

    it('keys reads by query', async () => {
      const { call, transport } = setup();
      transport.reply({ body: [1] }, { body: [2] });

      expect(await call('GET', '/customers', { query: { page: 1 } })).toEqual([1]);
      expect(await call('GET', '/customers', { query: { page: 2 } })).toEqual([2]);
      expect(transport.requests).toHaveLength(2);
    });

    it('invalidates cached reads under the resource root after a write', async () => {
      const { call, transport, cache } = setup();
      transport.reply(
        { body: [{ id: '1' }] },
        { body: { id: '1', name: 'Old' } },
        { body: { id: '9' } },
        { body: { id: '1', name: 'New' } },
        { body: { id: '1', name: 'New' } },
      );

      await call('GET', '/customers');
      await call('GET', '/customers/1');
      await call('GET', '/products/9');
      expect(cache?.size).toBe(3);

      await call('PATCH', '/customers/1', { body: { name: 'New' } });

      expect(cache?.size).toBe(1);
      expect(await call('GET', '/customers/1')).toEqual({ id: '1', name: 'New' });
      expect(await call('GET', '/products/9')).toEqual({ id: '9' });
      expect(transport.requests).toHaveLength(5);
    });

    it('invalidates the extra paths a call names', async () => {
      const { call, transport, cache } = setup();
      transport.reply({ body: { id: '7' } }, { body: { responses: [] } });

      await call('GET', '/products/7');
      await call('POST', '/batch', { body: { requests: [] }, invalidates: ['/products/7'] });

      expect(cache?.size).toBe(0);
    });

    it('shares one run between identical concurrent reads', async () => {
      const { call, transport } = setup();
      transport.reply({ body: { id: '1' } });

      const [a, b] = await Promise.all([call('GET', '/invoices/1'), call('GET', '/invoices/1')]);

      expect(a).toEqual({ id: '1' });
      expect(b).toEqual({ id: '1' });
      expect(transport.requests).toHaveLength(1);
    });

    it('does not let a read sent before a write feed later reads', async () => {
      const { call, transport } = setup();
      let releaseOld: () => void = () => undefined;
      const oldReply = new Promise<void>((resolve) => {
        releaseOld = resolve;
      });
      let reads = 0;
      transport.replyAlways(async (request) => {
        if (request.method === 'PATCH') return { body: { id: '1', name: 'New' } };
        reads++;
        if (reads === 1) {
          await oldReply;
          return { body: { id: '1', name: 'Old' } };
        }
        return { body: { id: '1', name: 'New' } };
      });

      const early = call('GET', '/customers/1');
      await call('PATCH', '/customers/1', { body: { name: 'New' } });
      const late = call('GET', '/customers/1');
      releaseOld();

      expect(await early).toEqual({ id: '1', name: 'Old' });
      expect(await late).toEqual({ id: '1', name: 'New' });
      expect(await call('GET', '/customers/1')).toEqual({ id: '1', name: 'New' });
      expect(transport.requests.map((r) => r.method)).toEqual(['GET', 'PATCH', 'GET']);
    });

    it('hands every reader its own copy of a cached payload', async () => {
      const { call, transport } = setup();
      transport.reply({ body: { id: '1', name: 'Acme', tags: ['a'] } });

      const [first, joined] = await Promise.all([call('GET', '/customers/1'), call('GET', '/customers/1')]);
      if (!isRecord(first) || !isRecord(joined)) throw new Error('expected objects');
      first.name = 'tampered';
      joined.tags = [];

      expect(await call('GET', '/customers/1')).toEqual({ id: '1', name: 'Acme', tags: ['a'] });
      expect(transport.requests).toHaveLength(1);
    });

    it('always hits the network when caching is disabled', async () => {
      const { call, transport } = setup({ cache: false });
      transport.replyAlways({ body: { id: '1' } });

      await call('GET', '/customers/1');
      await call('GET', '/customers/1');

      expect(transport.requests).toHaveLength(2);
    });
  });

  describe('authentication', () => {
    it('sends the bearer token with static and per-call headers', async () => {
      const { call, transport } = setup();
      transport.reply({ body: [] });

      await call('GET', '/customers', { query: { search: 'acme', page: 1 }, headers: { 'X-Trace': 't-1' } });

      expect(transport.requests[0]).toEqual({
        method: 'GET',
        path: '/customers',
        query: [
          ['page', '1'],
          ['search', 'acme'],
        ],
        body: undefined,
        headers: { Accept: 'application/json', 'X-Trace': 't-1', Authorization: 'Bearer token-1' },
        timeoutMs: 30_000,
      });
    });

    it('refreshes an expiring token exactly once before the data request', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(0);
      const { call, transport, exchange } = setup({ expiresIn: 60 });
      transport.replyAlways({ body: {} });

      await call('GET', '/customers/1');
      vi.setSystemTime(40_000);
      await call('GET', '/customers/2');

      expect(exchange.calls).toBe(2);
      expect(transport.requests.map((r) => r.headers.Authorization)).toEqual(['Bearer token-1', 'Bearer token-2']);
    });

    it('refreshes once and re-sends after a 401', async () => {
      const { call, transport, exchange } = setup();
      transport.reply({ status: 401, body: { message: 'Token expired' } }, { body: { id: '1' } });

      await expect(call('GET', '/customers/1')).resolves.toEqual({ id: '1' });
      expect(exchange.calls).toBe(2);
      expect(transport.requests.map((r) => r.headers.Authorization)).toEqual(['Bearer token-1', 'Bearer token-2']);
    });

    it('surfaces a second 401 as AuthenticationError', async () => {
      const { call, transport, exchange } = setup();
      transport.replyAlways({ status: 401, body: { message: 'Invalid token' } });

      const error = await call('GET', '/customers/1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ status: 401, message: 'Invalid token' });
      expect(transport.requests).toHaveLength(2);
      expect(exchange.calls).toBe(2);
    });

    it('does not refresh again when the token exchange itself is refused', async () => {
      const { call, transport, exchange } = setup();
      exchange.queue(new AuthenticationError('Client authentication failed', { status: 401 }));

      await expect(call('GET', '/customers/1')).rejects.toThrow('Client authentication failed');
      expect(exchange.calls).toBe(1);
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('retry', () => {
    it('retries 5xx and consumes one rate-limit unit per attempt', async () => {
      const { call, transport, limiter } = setup({ rateLimit: 100 });
      transport.replyAlways({ status: 503, body: { message: 'Maintenance' } });

      const error = await call('GET', '/customers').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toMatchObject({ attempts: 3, status: 503 });
      expect(transport.requests).toHaveLength(3);
      expect(limiter.status().callsInWindow).toBe(3);
    });

    it('does not retry a 404', async () => {
      const { call, transport } = setup();
      transport.replyAlways({ status: 404, body: { message: 'Customer not found' } });

      await expect(call('GET', '/customers/404')).rejects.toBeInstanceOf(NotFoundError);
      expect(transport.requests).toHaveLength(1);
    });

    it('waits out Retry-After on 429 and pauses the limiter', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(0);
      const { call, transport, limiter } = setup({ rateLimit: 100 });
      transport.reply({ status: 429, headers: { 'retry-after': '2' } }, { body: { ok: true } });

      const result = call('GET', '/customers');
      await vi.advanceTimersByTimeAsync(1_999);
      expect(transport.requests).toHaveLength(1);
      expect(limiter.status().pausedUntil).toBe(2_000);

      await vi.advanceTimersByTimeAsync(1);
      await expect(result).resolves.toEqual({ ok: true });
      expect(transport.requests).toHaveLength(2);
    });

    it('retries a transport failure', async () => {
      const { call, transport } = setup();
      transport.reply(new TransientNetworkError('socket hang up'), { body: { id: '1' } });

      await expect(call('GET', '/customers/1')).resolves.toEqual({ id: '1' });
      expect(transport.requests).toHaveLength(2);
    });
  });

  describe('decoding', () => {
    it('fails a malformed JSON body without retrying', async () => {
      const { call, transport } = setup();
      transport.replyAlways({ body: '{"id":', contentType: 'application/json' });

      const error = await call('GET', '/customers/1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ status: 200 });
      expect(transport.requests).toHaveLength(1);
    });
  });

  describe('close', () => {
    it('rejects new calls and releases resources', async () => {
      const { pipeline, call, transport, cache } = setup();
      transport.reply({ body: { id: '1' } });
      await call('GET', '/customers/1');

      pipeline.close();

      await expect(call('GET', '/customers/1')).rejects.toBeInstanceOf(ClientClosedError);
      expect(transport.closed).toBe(true);
      expect(cache?.size).toBe(0);
      expect(pipeline.closed).toBe(true);
    });

    it('rejects callers waiting on the rate limiter', async () => {
      const { pipeline, call, transport } = setup({ rateLimit: 1 });
      transport.replyAlways({ body: {} });
      await call('GET', '/customers/1');

      const waiting = call('GET', '/customers/2');
      pipeline.close();

      await expect(waiting).rejects.toBeInstanceOf(ClientClosedError);
      expect(transport.requests).toHaveLength(1);
    });
  });
});

describe('decodeBody', () => {
  const response = (status: number, body: string, contentType?: string) => ({
    status,
    headers: {},
    body,
    contentType,
  });

  it('decodes empty and 204 bodies to undefined', () => {
    expect(decodeBody(response(204, ''))).toBeUndefined();
    expect(decodeBody(response(200, '  '))).toBeUndefined();
  });

  it('parses JSON by content type or shape', () => {
    expect(decodeBody(response(200, '{"a":1}', 'application/json'))).toEqual({ a: 1 });
    expect(decodeBody(response(200, '[1,2]'))).toEqual([1, 2]);
    expect(decodeBody(response(200, '"x"', 'application/problem+json'))).toBe('x');
  });

  it('returns other text unchanged', () => {
    expect(decodeBody(response(200, 'OK', 'text/plain'))).toBe('OK');
  });

  it('reports malformed JSON', () => {
    expect(() => decodeBody(response(200, '{oops', 'application/json'))).toThrow(/^Malformed response body: /);
  });
});
