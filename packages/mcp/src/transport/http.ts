/**
 * Streamable HTTP Transport
 *
 * Stateless MCP over HTTP: every `POST /mcp` gets a fresh server and
 * transport, torn down when the response closes. Also serves `/ping`,
 * `/health` and service info on `/`.
 *
 * Endpoints:
 *   POST /mcp     - MCP JSON-RPC messages
 *   GET  /ping    - Liveness probe (not logged)
 *   GET  /health  - Health check with service details
 *   GET  /        - Service info
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createLogger } from 'metabase-mcp-core';

import { SERVER_VERSION } from '../server.js';

const logger = createLogger('http');

export const MCP_PATH = '/mcp';

export interface HttpTransportOptions {
  host: string;
  port: number;
  serviceName: string;
  /** Builds the MCP server for one request */
  createMcpServer: () => Server;
}

export interface RunningHttpServer {
  server: HttpServer;
  /** Base URL the server listens on */
  url: string;
  close(): Promise<void>;
}

/**
 * Set CORS headers for cross-origin requests
 */
function setCorsHeaders(res: ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Accept, Mcp-Session-Id, Mcp-Protocol-Version');
  res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendMethodNotAllowed(res: ServerResponse): void {
  res.setHeader('Allow', 'POST');
  sendJson(res, 405, {
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Method not allowed.' },
    id: null,
  });
}

async function handleMcp(
  req: IncomingMessage,
  res: ServerResponse,
  createMcpServer: () => Server
): Promise<void> {
  const mcpServer = createMcpServer();
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on('close', () => {
    transport.close().catch((error: unknown) => {
      logger.warn(`Failed to close transport: ${error instanceof Error ? error.message : String(error)}`);
    });
    mcpServer.close().catch((error: unknown) => {
      logger.warn(`Failed to close MCP server: ${error instanceof Error ? error.message : String(error)}`);
    });
  });

  await mcpServer.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Create the HTTP server without starting it.
 */
export function createHttpServer(options: HttpTransportOptions): HttpServer {
  const startedAt = Date.now();

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname;
    const method = req.method?.toUpperCase();

    if (pathname !== '/ping') {
      logger.debug(`${method ?? 'UNKNOWN'} ${pathname}`);
    }

    setCorsHeaders(res);

    // Handle CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    switch (pathname) {
      case MCP_PATH:
        if (method === 'POST') {
          await handleMcp(req, res, options.createMcpServer);
        } else {
          sendMethodNotAllowed(res);
        }
        break;

      case '/ping':
        sendJson(res, 200, { status: 'ok', timestamp: new Date().toISOString() });
        break;

      case '/health':
        sendJson(res, 200, {
          status: 'healthy',
          service: options.serviceName,
          version: SERVER_VERSION,
          uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
          timestamp: new Date().toISOString(),
        });
        break;

      default:
        if (pathname === '/' && method === 'GET') {
          sendJson(res, 200, {
            name: options.serviceName,
            version: SERVER_VERSION,
            description: 'MCP server for the Metabase REST API',
            endpoints: {
              [MCP_PATH]: 'MCP streamable HTTP endpoint (POST)',
              '/ping': 'Liveness probe (GET)',
              '/health': 'Health check endpoint (GET)',
            },
          });
        } else {
          sendJson(res, 404, { error: 'Not found' });
        }
    }
  }

  return createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error(`Request error: ${error instanceof Error ? error.message : String(error)}`);
      if (!res.headersSent) {
        sendJson(res, 500, {
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      } else {
        res.end();
      }
    });
  });
}

/**
 * Create the HTTP server and wait until it listens. Port 0 picks a free port.
 */
export async function startHttpServer(options: HttpTransportOptions): Promise<RunningHttpServer> {
  const server = createHttpServer(options);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : options.port;
  const url = `http://${options.host}:${port}`;

  logger.info(`Server running at ${url}${MCP_PATH}`);

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
