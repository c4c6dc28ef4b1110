/**
 * Metabase Request Gateway
 *
 * Turns a method + API path into an authenticated, timeout-bounded request
 * and classifies every failure into the gateway error taxonomy:
 * ConnectTimeoutError, ReadTimeoutError, ConnectError, ApiError.
 *
 * Requests go through undici's fetch with an Agent that carries the connect
 * timeout (socket establishment) and the read timeout (headers and body).
 * A call that overrides the timeouts gets its own short-lived Agent.
 *
 * @module gateway/client
 */

import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';

import type { AuthSettings, HttpSettings, Settings } from '../config/settings.js';
import { createLogger } from '../logging/logger.js';
import { createAuthStrategy, type AuthStrategy } from './auth.js';
import {
  ApiError,
  ConnectError,
  ConnectTimeoutError,
  GatewayError,
  ReadTimeoutError,
  readErrorCode,
  type RequestContext,
} from './errors.js';
import type {
  HttpMethod,
  IMetabaseGateway,
  QueryParams,
  RequestOptions,
  TimeoutSettings,
} from './types.js';

const logger = createLogger('gateway');

const BASE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
};

const CONNECT_TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'ETIMEDOUT']);
const READ_TIMEOUT_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

/**
 * Minimal response surface the gateway reads
 */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string | undefined;
  dispatcher: Dispatcher;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface MetabaseGatewayOptions {
  /** Metabase base URL, without the `/api` suffix */
  baseUrl: string;
  auth: AuthSettings;
  http: HttpSettings;
  /** Replaces undici's fetch (tests) */
  fetch?: HttpFetch | undefined;
}

type FailureMessage = (status: number, body: string) => string;

export class MetabaseGateway implements IMetabaseGateway {
  readonly baseUrl: string;
  readonly auth: AuthStrategy;

  private readonly timeouts: TimeoutSettings;
  private readonly enableHttp2: boolean;
  private readonly fetchImpl: HttpFetch;
  private readonly dispatcher: Agent;

  constructor(options: MetabaseGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeouts = {
      connect: options.http.connectTimeout,
      read: options.http.readTimeout,
    };
    this.enableHttp2 = options.http.enableHttp2;
    this.fetchImpl = options.fetch ?? undiciFetch;
    this.dispatcher = createDispatcher(this.timeouts, this.enableHttp2);
    this.auth = createAuthStrategy(options.auth, (credentials) => this.login(credentials));

    logger.info(`Using ${this.auth.method} authentication method`);
  }

  static fromSettings(settings: Settings, fetch?: HttpFetch): MetabaseGateway {
    return new MetabaseGateway({
      baseUrl: settings.metabaseUrl,
      auth: settings.auth,
      http: settings.http,
      fetch,
    });
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const context: RequestContext = { method, path, url: this.buildUrl(path, options.query) };
    const timeouts: TimeoutSettings = {
      connect: options.timeouts?.connect ?? this.timeouts.connect,
      read: options.timeouts?.read ?? this.timeouts.read,
    };
    const headers = { ...BASE_HEADERS, ...(await this.auth.headers()) };

    logger.debug(`Making ${method} request to ${path}`);

    try {
      const result = await this.send(context, headers, options.body, timeouts);
      logger.debug(`Successful response from ${path}`);
      return result;
    } catch (error) {
      if (error instanceof ApiError && error.status === 401) {
        this.auth.invalidate();
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private async login(credentials: { username: string; password: string }): Promise<unknown> {
    const path = '/session';
    const context: RequestContext = { method: 'POST', path, url: this.buildUrl(path) };
    return this.send(
      context,
      { ...BASE_HEADERS },
      credentials,
      this.timeouts,
      (status, body) => `Authentication failed: ${status} - ${body}`
    );
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}/api${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) {
        continue;
      }
      if (Array.isArray(value)) {
        for (const item of value) {
          url.searchParams.append(key, String(item));
        }
      } else {
        url.searchParams.append(key, String(value));
      }
    }
    return url.toString();
  }

  private async send(
    context: RequestContext,
    headers: Record<string, string>,
    body: unknown,
    timeouts: TimeoutSettings,
    failureMessage?: FailureMessage
  ): Promise<unknown> {
    const payload = body === undefined ? undefined : JSON.stringify(body);
    const isOverride =
      timeouts.connect !== this.timeouts.connect || timeouts.read !== this.timeouts.read;
    const dispatcher = isOverride ? createDispatcher(timeouts, this.enableHttp2) : this.dispatcher;

    try {
      const response = await this.fetchImpl(context.url, {
        method: context.method,
        headers,
        body: payload,
        dispatcher,
      });
      const text = await response.text();

      if (!response.ok) {
        const details = parseJson(text);
        const error = new ApiError(
          context,
          response.status,
          text,
          details,
          failureMessage?.(response.status, text)
        );
        logger.warn(error.message, { path: context.path });
        throw error;
      }

      return parseBody(text);
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      const classified = classifyTransportError(error, context, timeouts);
      if (classified instanceof GatewayError) {
        logger.error(classified.message, { method: context.method, path: context.path });
      }
      throw classified;
    } finally {
      if (isOverride) {
        await dispatcher.close();
      }
    }
  }
}

function createDispatcher(timeouts: TimeoutSettings, allowH2: boolean): Agent {
  return new Agent({
    connect: { timeout: timeouts.connect * 1000 },
    headersTimeout: timeouts.read * 1000,
    bodyTimeout: timeouts.read * 1000,
    allowH2,
  });
}

/**
 * Map a fetch failure onto the gateway taxonomy. undici wraps the real
 * cause (`fetch failed` → ConnectTimeoutError, ECONNREFUSED, ...), so the
 * whole cause chain is inspected. Errors that did not come from the
 * transport are returned unchanged.
 */
export function classifyTransportError(
  error: unknown,
  context: RequestContext,
  timeouts: TimeoutSettings
): unknown {
  const codes = collectErrorCodes(error);

  if (codes.some((code) => CONNECT_TIMEOUT_CODES.has(code))) {
    return new ConnectTimeoutError(context, timeouts.connect, rootCause(error));
  }
  if (codes.some((code) => READ_TIMEOUT_CODES.has(code))) {
    return new ReadTimeoutError(context, timeouts.read, rootCause(error));
  }
  if (codes.length > 0 || isFetchFailure(error)) {
    return new ConnectError(context, rootCause(error));
  }
  return error;
}

function collectErrorCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
    const code = readErrorCode(current);
    if (code) {
      codes.push(code);
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return codes;
}

function rootCause(error: unknown): unknown {
  let current: unknown = error;
  while (current instanceof Error && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
}

function isFetchFailure(error: unknown): boolean {
  return error instanceof TypeError && error.cause !== undefined;
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return null;
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  const value = parseJson(text);
  return value === null && text.trim() !== 'null' ? text : value;
}
