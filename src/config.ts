/**
 * config.ts: Client options: schema, defaults and environment loading.
 *
 * Options are parsed once at construction and are read-only afterwards.
 * Environment variables (optionally from a .env file via dotenv):
 *   SO24_CLIENT_ID, SO24_CLIENT_SECRET, SO24_ORGANIZATION_ID   credentials
 *   SO24_BASE_URL, SO24_TOKEN_URL                               endpoints
 *   SO24_CACHE_ENABLED, SO24_CACHE_TTL, SO24_CACHE_MAX_SIZE      response cache
 *   SO24_RATE_LIMIT, SO24_TIMEOUT, SO24_HTTP2                    transport
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { Credentials, TokenExchange } from './auth/oauth.js';
import { ValidationError } from './client/errors.js';
import type { HttpTransport } from './client/transport.js';
import type { Logger } from './logger.js';

export const DEFAULT_BASE_URL = 'https://rest.api.24sevenoffice.com/v1';
export const DEFAULT_TOKEN_URL = 'https://rest.api.24sevenoffice.com/oauth2/token';
export const DEFAULT_SCOPE = 'https://api.24sevenoffice.com/rest';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': 'so24-client - Node.js 24SevenOffice API Client',
  Accept: 'application/json',
};

const RetryOptionsSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().min(0).default(500),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().min(0).default(10_000),
  jitterMs: z.number().min(0).default(250),
  retryStatuses: z.array(z.number().int().min(100).max(599)).nullable().default(null),
});

export const ClientOptionsSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  tokenUrl: z.string().url().default(DEFAULT_TOKEN_URL),
  scope: z.string().min(1).default(DEFAULT_SCOPE),
  cacheEnabled: z.boolean().default(true),
  /** Seconds. */
  cacheTtl: z.number().positive().default(300),
  cacheMaxSize: z.number().int().min(1).default(1000),
  /** Requests per minute; 0 or null disables client-side limiting. */
  rateLimitRate: z.number().int().min(0).nullable().default(100),
  http2: z.boolean().default(false),
  headers: z.record(z.string()).default({}),
  /** Seconds, applied to each attempt separately. */
  timeout: z.number().min(0.1).default(30),
  /** Seconds before expiry at which a token is refreshed proactively. */
  tokenRefreshMargin: z.number().min(0).default(30),
  retry: RetryOptionsSchema.default({}),
});

export type ClientOptions = z.input<typeof ClientOptionsSchema> & {
  logger?: Logger;
  /** Replaces the got transport, e.g. with an in-process fake. */
  transport?: HttpTransport;
  /** Replaces the simple-oauth2 client-credentials exchange. */
  tokenExchange?: TokenExchange;
};

export type ResolvedClientOptions = z.output<typeof ClientOptionsSchema>;

export function resolveOptions(options: ClientOptions = {}): ResolvedClientOptions {
  const { logger: _logger, transport: _transport, tokenExchange: _exchange, ...rest } = options;
  const parsed = ClientOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid client options', parsed.error);
  }
  return {
    ...parsed.data,
    headers: { ...DEFAULT_HEADERS, ...parsed.data.headers },
  };
}

const CredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  organizationId: z.string().min(1),
});

export function validateCredentials(credentials: Credentials): Credentials {
  const parsed = CredentialsSchema.safeParse(credentials);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid credentials', parsed.error);
  }
  return Object.freeze({ ...parsed.data });
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export type Env = Record<string, string | undefined>;

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const numberFromEnv = z.coerce.number().finite();

const EnvOptionsSchema = z.object({
  SO24_BASE_URL: z.string().url().optional(),
  SO24_TOKEN_URL: z.string().url().optional(),
  SO24_CACHE_ENABLED: booleanFromEnv.optional(),
  SO24_CACHE_TTL: numberFromEnv.optional(),
  SO24_CACHE_MAX_SIZE: numberFromEnv.optional(),
  SO24_RATE_LIMIT: numberFromEnv.optional(),
  SO24_TIMEOUT: numberFromEnv.optional(),
  SO24_HTTP2: booleanFromEnv.optional(),
});

/** Loads .env (without overriding variables already set) and returns process.env. */
export function loadEnv(path?: string): Env {
  loadDotenv(path === undefined ? {} : { path });
  return process.env;
}

// Empty strings in .env files mean "unset"
function presentOnly(env: Env): Env {
  const result: Env = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[name] = value.trim();
  }
  return result;
}

export function credentialsFromEnv(env: Env = loadEnv()): Credentials {
  const present = presentOnly(env);
  return validateCredentials({
    clientId: present.SO24_CLIENT_ID ?? '',
    clientSecret: present.SO24_CLIENT_SECRET ?? '',
    organizationId: present.SO24_ORGANIZATION_ID ?? '',
  });
}

export function optionsFromEnv(env: Env = loadEnv()): ClientOptions {
  const parsed = EnvOptionsSchema.safeParse(presentOnly(env));
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid environment', parsed.error);
  }

  const vars = parsed.data;
  const options: ClientOptions = {};
  if (vars.SO24_BASE_URL !== undefined) options.baseUrl = vars.SO24_BASE_URL;
  if (vars.SO24_TOKEN_URL !== undefined) options.tokenUrl = vars.SO24_TOKEN_URL;
  if (vars.SO24_CACHE_ENABLED !== undefined) options.cacheEnabled = vars.SO24_CACHE_ENABLED;
  if (vars.SO24_CACHE_TTL !== undefined) options.cacheTtl = vars.SO24_CACHE_TTL;
  if (vars.SO24_CACHE_MAX_SIZE !== undefined) options.cacheMaxSize = vars.SO24_CACHE_MAX_SIZE;
  if (vars.SO24_RATE_LIMIT !== undefined) options.rateLimitRate = vars.SO24_RATE_LIMIT;
  if (vars.SO24_TIMEOUT !== undefined) options.timeout = vars.SO24_TIMEOUT;
  if (vars.SO24_HTTP2 !== undefined) options.http2 = vars.SO24_HTTP2;
  return options;
}
