/**
 * Metabase MCP Server Implementation
 *
 * Exposes the Metabase REST API as MCP tools. Every tool call goes through
 * the shared request gateway.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createLogger, type IMetabaseGateway } from 'metabase-mcp-core';

import {
  ALL_TOOLS,
  errorResponse,
  handleCreateCard,
  handleCreateCollection,
  handleExecuteCard,
  handleExecuteQuery,
  handleFindCandidateCollections,
  handleGetTableFields,
  handleListCards,
  handleListCardsByCollection,
  handleListCardsPaginated,
  handleListCollections,
  handleListDatabases,
  handleListTables,
  handleSearchCardsInCollections,
  handleSearchMetabase,
  type ToolResponse,
} from './tools/index.js';

export const SERVER_VERSION = '0.1.0';

const logger = createLogger('mcp');

export interface MetabaseMCPConfig {
  gateway: IMetabaseGateway;
  /** Name advertised to clients (default: metabase-mcp) */
  name?: string | undefined;
  version?: string | undefined;
}

/**
 * Route a tool call to its handler.
 */
export async function callTool(
  gateway: IMetabaseGateway,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResponse> {
  switch (name) {
    case 'find_candidate_collections':
      return handleFindCandidateCollections(gateway, args);

    case 'search_cards_in_collections':
      return handleSearchCardsInCollections(gateway, args);

    case 'search_metabase':
      return handleSearchMetabase(gateway, args);

    case 'list_databases':
      return handleListDatabases(gateway);

    case 'list_cards':
      return handleListCards(gateway);

    case 'list_cards_paginated':
      return handleListCardsPaginated(gateway, args);

    case 'list_cards_by_collection':
      return handleListCardsByCollection(gateway, args);

    case 'list_collections':
      return handleListCollections(gateway);

    case 'list_tables':
      return handleListTables(gateway, args);

    case 'get_table_fields':
      return handleGetTableFields(gateway, args);

    case 'execute_card':
      return handleExecuteCard(gateway, args);

    case 'execute_query':
      return handleExecuteQuery(gateway, args);

    case 'create_card':
      return handleCreateCard(gateway, args);

    case 'create_collection':
      return handleCreateCollection(gateway, args);

    default:
      return {
        content: [{ type: 'text', text: `Unknown tool: ${name}` }],
        isError: true,
      };
  }
}

export function createMetabaseMCPServer(config: MetabaseMCPConfig): Server {
  const server = new Server(
    { name: config.name ?? 'metabase-mcp', version: config.version ?? SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: ALL_TOOLS,
  }));

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug(`Calling tool ${name}`);

    try {
      return await callTool(config.gateway, name, args ?? {});
    } catch (error) {
      logger.warn(`Tool ${name} failed: ${error instanceof Error ? error.message : String(error)}`);
      return errorResponse(error);
    }
  });

  return server;
}
