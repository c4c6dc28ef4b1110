/**
 * Gateway Errors
 *
 * Classified failures of a Metabase API call. Every transport or HTTP
 * failure surfaces as exactly one of these; none are retried.
 *
 * @module gateway/errors
 */

import type { HttpMethod } from './types.js';

/**
 * Request context shared by every gateway failure
 */
export interface RequestContext {
  method: HttpMethod;
  path: string;
  url: string;
}

export type GatewayErrorKind = 'connect_timeout' | 'read_timeout' | 'connect_error' | 'api_error';

/**
 * Base class for classified gateway failures
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  readonly method: HttpMethod;
  readonly path: string;
  readonly url: string;

  constructor(message: string, context: RequestContext, options?: { cause?: unknown }) {
    super(message, options);
    this.method = context.method;
    this.path = context.path;
    this.url = context.url;
  }
}

/**
 * The connection could not be established within the connect timeout
 */
export class ConnectTimeoutError extends GatewayError {
  override readonly kind = 'connect_timeout' as const;

  constructor(
    context: RequestContext,
    public readonly timeoutSeconds: number,
    cause?: unknown
  ) {
    super(
      `Connection timeout (${timeoutSeconds}s) when connecting to ${context.url}: ${describeCause(cause)}`,
      context,
      { cause }
    );
    this.name = 'ConnectTimeoutError';
  }
}

/**
 * The connection was established but the response did not arrive in time
 */
export class ReadTimeoutError extends GatewayError {
  override readonly kind = 'read_timeout' as const;

  constructor(
    context: RequestContext,
    public readonly timeoutSeconds: number,
    cause?: unknown
  ) {
    super(
      `Read timeout (${timeoutSeconds}s) when reading response from ${context.url}: ${describeCause(cause)}`,
      context,
      { cause }
    );
    this.name = 'ReadTimeoutError';
  }
}

/**
 * Transport-level failure: DNS, refused or reset connection, TLS
 */
export class ConnectError extends GatewayError {
  override readonly kind = 'connect_error' as const;

  constructor(context: RequestContext, cause?: unknown) {
    super(`Connection error when connecting to ${context.url}: ${describeCause(cause)}`, context, { cause });
    this.name = 'ConnectError';
  }
}

/**
 * Metabase answered with a non-2xx status
 */
export class ApiError extends GatewayError {
  override readonly kind = 'api_error' as const;

  constructor(
    context: RequestContext,
    public readonly status: number,
    public readonly body: string,
    public readonly details: unknown = null,
    message?: string
  ) {
    super(message ?? `API request failed with status ${status}: ${body}`, context);
    this.name = 'ApiError';
  }
}

/**
 * Neither an API key nor a complete email/password pair is configured,
 * or a configuration value is out of bounds. Fatal at startup.
 */
export class AuthConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'AuthConfigError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = readErrorCode(cause);
    return code ? `${cause.message} (${code})` : cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}

/**
 * Read the `code` property Node and undici attach to their errors.
 */
export function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
