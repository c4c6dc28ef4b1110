/**
 * Authentication Strategies
 *
 * Two mutually exclusive strategies, picked once from settings:
 * - ApiKeyAuth: static `X-API-KEY` header
 * - SessionAuth: token from `POST /session`, fetched lazily and cached
 *
 * @module gateway/auth
 */

import { z } from 'zod';

import type { AuthSettings } from '../config/settings.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('auth');

export type AuthMethod = AuthSettings['method'];

export interface AuthStrategy {
  readonly method: AuthMethod;

  /** Headers that authenticate a request */
  headers(): Promise<Record<string, string>>;

  /** Forget any cached credential after the server rejected it */
  invalidate(): void;
}

export class ApiKeyAuth implements AuthStrategy {
  readonly method = 'api_key' as const;

  constructor(private readonly apiKey: string) {}

  async headers(): Promise<Record<string, string>> {
    return { 'X-API-KEY': this.apiKey };
  }

  invalidate(): void {
    // Static key, nothing cached
  }
}

/**
 * Posts the credentials to the login endpoint and resolves with the raw
 * response body.
 */
export type SessionLogin = (credentials: { username: string; password: string }) => Promise<unknown>;

const SessionResponseSchema = z.object({ id: z.string().min(1) });

/**
 * Session-token authentication.
 *
 * Concurrent callers that find no cached token share one in-flight login;
 * a failed login leaves the cache empty so the next call tries again.
 */
export class SessionAuth implements AuthStrategy {
  readonly method = 'session' as const;

  private token: string | null = null;
  private pendingLogin: Promise<string> | null = null;

  constructor(
    private readonly email: string,
    private readonly password: string,
    private readonly login: SessionLogin
  ) {}

  async headers(): Promise<Record<string, string>> {
    const token = await this.getToken();
    return { 'X-Metabase-Session': token };
  }

  invalidate(): void {
    if (this.token !== null) {
      logger.info('Discarding rejected session token');
    }
    this.token = null;
  }

  get hasToken(): boolean {
    return this.token !== null;
  }

  async getToken(): Promise<string> {
    if (this.token !== null) {
      return this.token;
    }
    if (this.pendingLogin === null) {
      this.pendingLogin = this.fetchToken().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  private async fetchToken(): Promise<string> {
    const body = await this.login({ username: this.email, password: this.password });
    const parsed = SessionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Authentication failed: session response did not contain a token id');
    }
    this.token = parsed.data.id;
    logger.info('Successfully obtained session token');
    return this.token;
  }
}

export function createAuthStrategy(settings: AuthSettings, login: SessionLogin): AuthStrategy {
  switch (settings.method) {
    case 'api_key':
      return new ApiKeyAuth(settings.apiKey);
    case 'session':
      return new SessionAuth(settings.email, settings.password, login);
  }
}
