/**
 * Gateway Types
 *
 * @module gateway/types
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | readonly (string | number | boolean)[] | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Connect and read budgets, in seconds
 */
export interface TimeoutSettings {
  connect: number;
  read: number;
}

export interface RequestOptions {
  /** Appended to the URL; arrays repeat the key once per element */
  query?: QueryParams | undefined;

  /** Serialized as the JSON request body */
  body?: unknown;

  /** Overrides the configured timeouts for this call only */
  timeouts?: Partial<TimeoutSettings> | undefined;
}

/**
 * Authenticated access to the Metabase REST API.
 *
 * Paths are relative to `<base url>/api`. Resolves with the parsed JSON body
 * of a 2xx response and rejects with a GatewayError otherwise.
 */
export interface IMetabaseGateway {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
  close(): Promise<void>;
}
