/**
 * MCP Server Tests
 *
 * Drives the server through a real SDK client over the in-memory transport.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { InMemoryMetabaseGateway } from 'metabase-mcp-core';

import { createMetabaseMCPServer } from '../server.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const clients: Client[] = [];

async function connect(gateway: InMemoryMetabaseGateway): Promise<Client> {
  const server = createMetabaseMCPServer({ gateway });
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  clients.push(client);
  return client;
}

async function call(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const block = result.content[0];
  if (block?.type !== 'text') {
    throw new Error(`expected a text block from ${name}`);
  }
  return { text: block.text, isError: result.isError === true };
}

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
});

// ============================================================================
// Tests
// ============================================================================

describe('createMetabaseMCPServer', () => {
  it('should advertise its name and version', async () => {
    const client = await connect(new InMemoryMetabaseGateway());

    expect(client.getServerVersion()).toEqual({ name: 'metabase-mcp', version: '0.1.0' });
  });

  it('should list every tool', async () => {
    const client = await connect(new InMemoryMetabaseGateway());

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'find_candidate_collections',
      'search_cards_in_collections',
      'search_metabase',
      'list_databases',
      'list_cards',
      'list_cards_paginated',
      'list_cards_by_collection',
      'list_collections',
      'list_tables',
      'get_table_fields',
      'execute_card',
      'execute_query',
      'create_card',
      'create_collection',
    ]);
  });

  it('should discover collections as pretty-printed JSON', async () => {
    const client = await connect(
      new InMemoryMetabaseGateway({
        'GET /collection': [
          { id: 1, name: 'Team Ops' },
          { id: 2, name: 'Sales Reports' },
          { id: 3, name: 'Archive' },
        ],
      })
    );

    const { text, isError } = await call(client, 'find_candidate_collections', {
      query: 'team',
      limit_collections: 5,
    });

    expect(isError).toBe(false);
    expect(text.split('\n')[1]).toBe('  "query": "team",');
    expect(JSON.parse(text)).toMatchObject({
      collections: [{ collection_id: 1, collection_name: 'Team Ops' }],
      results: { total_collections_searched: 3, matched_collections: 1, returned_collections: 1 },
    });
  });

  it('should search cards inside the given collections', async () => {
    const client = await connect(
      new InMemoryMetabaseGateway({
        'GET /card': [
          { id: 1, name: 'Revenue YTD', collection_id: 10, updated_at: '2024-01-01' },
          { id: 2, name: 'User Growth', collection_id: 10, updated_at: '2024-06-01' },
        ],
      })
    );

    const { text } = await call(client, 'search_cards_in_collections', {
      query: 'revenue',
      collection_ids: [10, 11],
      limit: 10,
    });

    expect(JSON.parse(text)).toMatchObject({
      collections_searched: [10, 11],
      pagination: { limit: 10, offset: 0, returned: 1, total_found: 1, has_more: false },
      cards: [{ id: 1, name: 'Revenue YTD' }],
    });
  });

  it('should return list_tables as Markdown', async () => {
    const client = await connect(
      new InMemoryMetabaseGateway({ 'GET /database/1/metadata': { tables: [] } })
    );

    const { text } = await call(client, 'list_tables', { database_id: 1 });

    expect(text).toBe('# Tables in Database 1\n\n**Total Tables:** 0\n\n*No tables found in this database.*\n');
  });

  it('should pass native parameters through execute_query', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'POST /dataset': { row_count: 1 } });
    const client = await connect(gateway);

    await call(client, 'execute_query', {
      database_id: 3,
      query: 'SELECT 1',
      native_parameters: [{ name: 'x', value: 1 }],
    });

    expect(gateway.calls[0]?.options.body).toEqual({
      database: 3,
      type: 'native',
      native: { query: 'SELECT 1', parameters: [{ name: 'x', value: 1 }] },
    });
  });

  it('should map filter_type onto the card filter', async () => {
    const gateway = new InMemoryMetabaseGateway({ 'GET /card': [{ id: 1 }] });
    const client = await connect(gateway);

    const { text } = await call(client, 'list_cards_paginated', { filter_type: 'mine', limit: 1 });

    expect(gateway.calls[0]?.options.query).toEqual({ f: 'mine' });
    expect(JSON.parse(text)).toEqual({
      cards: [{ id: 1 }],
      pagination: { limit: 1, offset: 0, returned: 1, total_available: 1, has_more: false },
      filter: 'mine',
    });
  });

  it('should report invalid arguments as a tool error', async () => {
    const client = await connect(new InMemoryMetabaseGateway());

    const result = await call(client, 'search_cards_in_collections', { query: 'revenue' });

    expect(result).toEqual({
      isError: true,
      text: 'Error: Invalid arguments for search_cards_in_collections: collection_ids: Required',
    });
  });

  it('should report invalid pagination as a tool error', async () => {
    const client = await connect(new InMemoryMetabaseGateway({ 'GET /card': [] }));

    const result = await call(client, 'search_cards_in_collections', {
      query: 'revenue',
      collection_ids: [1],
      limit: 0,
    });

    expect(result).toEqual({ isError: true, text: 'Error: limit must be an integer >= 1 (got 0)' });
  });

  it('should report gateway failures as a tool error', async () => {
    const client = await connect(new InMemoryMetabaseGateway());

    const result = await call(client, 'list_databases');

    expect(result).toEqual({
      isError: true,
      text: 'Error: API request failed with status 404: No route for GET /database',
    });
  });

  it('should reject unknown tools', async () => {
    const client = await connect(new InMemoryMetabaseGateway());

    expect(await call(client, 'drop_everything')).toEqual({ isError: true, text: 'Unknown tool: drop_everything' });
  });
});
