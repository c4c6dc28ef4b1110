/**
 * In-Memory Gateway
 *
 * An IMetabaseGateway backed by a route table instead of HTTP, for tests and
 * offline tooling. Routes are keyed by `"METHOD /path"`; a route may be a
 * fixed payload or a handler that computes (or throws) per call.
 *
 * @module gateway/memory-gateway
 */

import { ApiError } from './errors.js';
import type { HttpMethod, IMetabaseGateway, RequestOptions } from './types.js';

export type RouteKey = `${HttpMethod} /${string}`;

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  options: RequestOptions;
}

export type RouteHandler = (call: RecordedCall) => unknown;

export type RouteDefinition = { handler: RouteHandler } | { payload: unknown };

export class InMemoryMetabaseGateway implements IMetabaseGateway {
  private readonly routes = new Map<string, RouteDefinition>();
  private readonly log: RecordedCall[] = [];
  private closed = false;

  constructor(payloads: Partial<Record<RouteKey, unknown>> = {}) {
    for (const [key, payload] of Object.entries(payloads)) {
      this.routes.set(key, { payload });
    }
  }

  /** Every call made so far, in order */
  get calls(): readonly RecordedCall[] {
    return this.log;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Serve a fixed payload for a route
   */
  respond(key: RouteKey, payload: unknown): this {
    this.routes.set(key, { payload });
    return this;
  }

  /**
   * Compute the response per call; throwing rejects the request
   */
  handle(key: RouteKey, handler: RouteHandler): this {
    this.routes.set(key, { handler });
    return this;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const call: RecordedCall = { method, path, options };
    this.log.push(call);

    const route = this.routes.get(`${method} ${path}`);
    if (!route) {
      const context = { method, path, url: `memory://api${path}` };
      throw new ApiError(context, 404, `No route for ${method} ${path}`);
    }
    if ('handler' in route) {
      return route.handler(call);
    }
    return structuredClone(route.payload);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
