import type { Logger } from '../logger.js';
import { toAuthenticationError, type IssuedToken, type TokenExchange } from './oauth.js';

export interface AccessToken {
  readonly accessToken: string;
  readonly tokenType: string;
  /** Epoch milliseconds. */
  readonly expiresAt: number;
  readonly scope?: string;
}

export interface TokenManagerOptions {
  /** How long before expiry a token is already treated as stale. */
  refreshMarginMs: number;
  logger?: Logger;
}

export function authorizationHeader(token: AccessToken): string {
  return `${token.tokenType} ${token.accessToken}`;
}

/**
 * TokenManager: holds one organization's access token and refreshes it.
 *
 * A token within `refreshMarginMs` of expiry is refreshed proactively. Refresh
 * is coalesced: the first caller starts the exchange and every caller arriving
 * while it is in flight awaits the same promise, so one client never runs two
 * exchanges at once. The token is swapped wholesale, never merged.
 */
export class TokenManager {
  private token: AccessToken | null = null;
  private refreshing: Promise<AccessToken> | null = null;
  private generation = 0;
  private readonly exchange: TokenExchange;
  private readonly refreshMarginMs: number;
  private readonly logger: Logger | undefined;

  constructor(exchange: TokenExchange, options: TokenManagerOptions) {
    this.exchange = exchange;
    this.refreshMarginMs = options.refreshMarginMs;
    this.logger = options.logger;
  }

  /** The held token, valid or not; null before the first exchange and after clear(). */
  get current(): AccessToken | null {
    return this.token;
  }

  isValid(token: AccessToken | null, now: number = Date.now()): token is AccessToken {
    return token !== null && token.expiresAt - now > this.refreshMarginMs;
  }

  async getValidToken(): Promise<AccessToken> {
    if (this.isValid(this.token)) {
      return this.token;
    }
    return this.refresh();
  }

  /**
   * Forces an exchange, joining one already in flight. Used after the API
   * rejected the held token with 401: when `rejected` is given and another
   * caller has already replaced it with a valid token, that token is returned
   * without a second exchange.
   */
  refresh(rejected?: AccessToken | null): Promise<AccessToken> {
    if (this.refreshing) {
      return this.refreshing;
    }
    if (rejected && this.token !== rejected && this.isValid(this.token)) {
      return Promise.resolve(this.token);
    }

    this.logger?.debug(this.token ? 'refreshing access token' : 'requesting access token');
    const refreshPromise = this.runExchange().finally(() => {
      this.refreshing = null;
    });
    this.refreshing = refreshPromise;
    return refreshPromise;
  }

  /** Drops the held token; the next call performs a fresh exchange. */
  clear(): void {
    this.token = null;
    this.generation++;
  }

  private async runExchange(): Promise<AccessToken> {
    const generation = this.generation;
    let issued: IssuedToken;
    try {
      issued = await this.exchange.exchange();
    } catch (error) {
      const authError = toAuthenticationError(error);
      this.logger?.warn({ status: authError.status, retryable: authError.retryable }, authError.message);
      throw authError;
    }

    const token: AccessToken = {
      accessToken: issued.accessToken,
      tokenType: issued.tokenType,
      expiresAt: Date.now() + issued.expiresIn * 1000,
      scope: issued.scope,
    };
    // A clear() while the exchange was in flight wins over its result
    if (generation === this.generation) {
      this.token = token;
    }
    this.logger?.debug({ expiresAt: new Date(token.expiresAt).toISOString() }, 'access token issued');
    return token;
  }
}
