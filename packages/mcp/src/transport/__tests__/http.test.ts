/**
 * Streamable HTTP Transport Tests
 *
 * Listens on an ephemeral local port.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { InMemoryMetabaseGateway } from 'metabase-mcp-core';

import { createMetabaseMCPServer } from '../../server.js';
import { startHttpServer, type RunningHttpServer } from '../http.js';

let running: RunningHttpServer;
let gateway: InMemoryMetabaseGateway;

beforeEach(async () => {
  gateway = new InMemoryMetabaseGateway({
    'GET /collection': [{ id: 1, name: 'Team Ops' }, { id: 2, name: 'Archive' }],
  });
  running = await startHttpServer({
    host: '127.0.0.1',
    port: 0,
    serviceName: 'metabase-mcp',
    createMcpServer: () => createMetabaseMCPServer({ gateway }),
  });
});

afterEach(async () => {
  await running.close();
});

describe('startHttpServer', () => {
  it('should answer /ping', async () => {
    const response = await fetch(`${running.url}/ping`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual({ status: 'ok', timestamp: expect.any(String) });
  });

  it('should report health and service info', async () => {
    const health: unknown = await (await fetch(`${running.url}/health`)).json();
    const info: unknown = await (await fetch(`${running.url}/`)).json();

    expect(health).toMatchObject({ status: 'healthy', service: 'metabase-mcp', version: '0.1.0' });
    expect(info).toMatchObject({ name: 'metabase-mcp', version: '0.1.0' });
  });

  it('should refuse GET and DELETE on the MCP endpoint', async () => {
    for (const method of ['GET', 'DELETE']) {
      const response = await fetch(`${running.url}/mcp`, { method });

      expect(response.status).toBe(405);
      expect(await response.json()).toEqual({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
    }
  });

  it('should answer CORS preflight requests', async () => {
    const response = await fetch(`${running.url}/mcp`, { method: 'OPTIONS' });

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('should return 404 for unknown paths', async () => {
    const response = await fetch(`${running.url}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('should serve tool calls to an MCP client', async () => {
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(new StreamableHTTPClientTransport(new URL(`${running.url}/mcp`)));

    try {
      const result = CallToolResultSchema.parse(
        await client.callTool({ name: 'find_candidate_collections', arguments: { query: 'ops' } })
      );
      const block = result.content[0];

      expect(block?.type).toBe('text');
      expect(block?.type === 'text' ? JSON.parse(block.text) : null).toMatchObject({
        query: 'ops',
        collections: [{ collection_id: 1, collection_name: 'Team Ops' }],
      });
    } finally {
      await client.close();
    }
  });
});
