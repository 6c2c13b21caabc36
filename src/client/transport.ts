import got, { type Got, RequestError, TimeoutError } from 'got';
import { ClientClosedError, TransientNetworkError } from './errors.js';
import type { HttpMethod } from './descriptor.js';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface TransportRequest {
  method: HttpMethod;
  /** Relative to the transport's base URL, with a leading slash. */
  path: string;
  query: Array<[string, string]>;
  body?: unknown;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  headers: ResponseHeaders;
  /** Raw body text; decoding belongs to the pipeline. */
  body: string;
  contentType: string | undefined;
}

/**
 * HttpTransport: performs exactly one HTTP exchange.
 *
 * Non-2xx statuses resolve normally; only failures without a response
 * (connection errors, timeouts, aborts) reject, already classified.
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  /** Aborts in-flight requests and refuses new ones. */
  close(): void;
}

export interface GotTransportOptions {
  baseUrl: string;
  http2: boolean;
}

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * GotTransport: got instance with the API root as prefix URL. Headers come
 * fully assembled from the pipeline.
 *
 * got's own retry is disabled (the pipeline owns retry) and HTTP errors do not
 * throw, so the pipeline sees every status and classifies it once.
 */
export class GotTransport implements HttpTransport {
  private readonly instance: Got;
  private readonly controller = new AbortController();

  constructor(options: GotTransportOptions) {
    this.instance = got.extend({
      prefixUrl: options.baseUrl,
      http2: options.http2,
      retry: { limit: 0 },
      throwHttpErrors: false,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.controller.signal.aborted) {
      throw new ClientClosedError();
    }

    // got refuses inputs with a leading slash once prefixUrl is set
    const url = request.path.replace(/^\/+/, '');

    try {
      const response = await this.instance(url, {
        method: request.method,
        searchParams: new URLSearchParams(request.query),
        headers: request.headers,
        ...(request.body === undefined ? {} : { json: request.body }),
        timeout: { request: request.timeoutMs },
        signal: this.controller.signal,
        responseType: 'text',
      });

      return {
        status: response.statusCode,
        headers: response.headers,
        body: response.body,
        contentType: headerValue(response.headers, 'content-type'),
      };
    } catch (error) {
      throw this.classify(error, request);
    }
  }

  close(): void {
    this.controller.abort();
  }

  private classify(error: unknown, request: TransportRequest): Error {
    if (this.controller.signal.aborted) {
      return new ClientClosedError('Client closed while a request was in flight');
    }
    if (error instanceof TimeoutError) {
      return new TransientNetworkError(
        `Request timed out after ${request.timeoutMs}ms: ${request.method} ${request.path}`,
        { code: 'ETIMEDOUT', cause: error },
      );
    }
    if (error instanceof RequestError) {
      return new TransientNetworkError(`Connection error: ${error.message}`, {
        code: error.code,
        cause: error,
      });
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
