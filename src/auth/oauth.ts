import { ClientCredentials } from 'simple-oauth2';
import { z } from 'zod';
import { AuthenticationError } from '../client/errors.js';

// Credentials are immutable for the lifetime of a client and never leave the auth layer
export interface Credentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly organizationId: string;
}

// What the token endpoint granted, before the manager pins it to a clock
export interface IssuedToken {
  accessToken: string;
  tokenType: string;
  expiresIn: number;
  scope?: string;
}

/** One OAuth2 exchange against the token endpoint. Implementations never retry. */
export interface TokenExchange {
  exchange(): Promise<IssuedToken>;
}

export const ORGANIZATION_HEADER = 'X-24so-organizationId';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1).default('Bearer'),
  expires_in: z.coerce.number().positive(),
  scope: z.string().optional(),
});

export interface OAuthExchangeOptions {
  tokenUrl: string;
  scope: string;
  timeoutMs: number;
}

interface BoomLike {
  isBoom: true;
  message: string;
  output: { statusCode: number };
  data?: unknown;
}

// Internal helper: type-narrowing check for the Boom errors simple-oauth2 rejects with
function isBoom(error: unknown): error is BoomLike {
  return (
    error instanceof Error &&
    'isBoom' in error &&
    error.isBoom === true &&
    'output' in error &&
    typeof error.output === 'object' &&
    error.output !== null &&
    'statusCode' in error.output &&
    typeof error.output.statusCode === 'number'
  );
}

// Wreck marks errors produced from an HTTP response (as opposed to a socket failure)
function responsePayload(error: BoomLike): { isResponse: boolean; payload: unknown } {
  const data = error.data;
  if (typeof data !== 'object' || data === null) return { isResponse: false, payload: undefined };
  const isResponse = 'isResponseError' in data && data.isResponseError === true;
  const payload = 'payload' in data ? data.payload : undefined;
  return { isResponse, payload };
}

function payloadMessage(payload: unknown): string | undefined {
  const text = Buffer.isBuffer(payload) ? payload.toString('utf8') : payload;
  let value: unknown = text;
  if (typeof text === 'string') {
    try {
      const parsed: unknown = JSON.parse(text);
      value = parsed;
    } catch {
      return text.trim() === '' ? undefined : text;
    }
  }
  if (typeof value !== 'object' || value === null) return undefined;
  if ('error_description' in value && typeof value.error_description === 'string' && value.error_description) {
    return value.error_description;
  }
  if ('error' in value && typeof value.error === 'string' && value.error) {
    return value.error;
  }
  return undefined;
}

/**
 * toAuthenticationError: classifies a failed exchange.
 *
 * Non-2xx answers from the token endpoint carry the server's status and
 * `error_description`; 5xx answers and socket failures are marked retryable so
 * the pipeline's bounded retry can try again.
 */
export function toAuthenticationError(error: unknown): AuthenticationError {
  if (error instanceof AuthenticationError) return error;

  if (isBoom(error)) {
    const { isResponse, payload } = responsePayload(error);
    if (isResponse) {
      const status = error.output.statusCode;
      const message = payloadMessage(payload) ?? `Failed to obtain token: HTTP ${status}`;
      return new AuthenticationError(message, {
        status,
        details: payload,
        retryable: status >= 500,
        cause: error,
      });
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AuthenticationError(`HTTP error during authentication: ${message}`, {
    retryable: true,
    cause: error,
  });
}

/**
 * OAuthClientCredentialsExchange: the client-credentials grant via simple-oauth2.
 *
 * The API expects client_id/client_secret in a form body (not Basic auth) and
 * the organization id as a header on the token request.
 */
export class OAuthClientCredentialsExchange implements TokenExchange {
  private readonly client: ClientCredentials;
  private readonly scope: string;
  private readonly timeoutMs: number;

  constructor(credentials: Credentials, options: OAuthExchangeOptions) {
    const url = new URL(options.tokenUrl);
    this.scope = options.scope;
    this.timeoutMs = options.timeoutMs;
    this.client = new ClientCredentials({
      client: {
        id: credentials.clientId,
        secret: credentials.clientSecret,
      },
      auth: {
        tokenHost: url.origin,
        tokenPath: url.pathname,
      },
      http: {
        headers: {
          Accept: 'application/json',
          [ORGANIZATION_HEADER]: credentials.organizationId,
        },
      },
      options: {
        authorizationMethod: 'body',
        bodyFormat: 'form',
      },
    });
  }

  async exchange(): Promise<IssuedToken> {
    let raw: unknown;
    try {
      const accessToken = await this.client.getToken({ scope: this.scope }, { timeout: this.timeoutMs });
      raw = accessToken.token;
    } catch (error) {
      throw toAuthenticationError(error);
    }

    const parsed = TokenResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthenticationError(`Invalid token response: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
        details: parsed.error.issues,
        cause: parsed.error,
      });
    }

    return {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      expiresIn: parsed.data.expires_in,
      scope: parsed.data.scope,
    };
  }
}
