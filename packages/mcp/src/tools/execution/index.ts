/**
 * Execution Tools
 *
 * Layer: Execution
 *
 * Tools:
 * - execute_card: run a saved question
 * - execute_query: run native SQL against a database
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { executeCard, executeQuery, type IMetabaseGateway } from 'metabase-mcp-core';

import { jsonResponse, parseArgs, type ToolResponse } from '../response.js';

export const executeCardToolDefinition: Tool = {
  name: 'execute_card',
  description: 'Run a saved question (card) and return its results.',
  inputSchema: {
    type: 'object',
    properties: {
      card_id: {
        type: 'integer',
        description: 'Card id',
      },
      parameters: {
        type: 'object',
        description: 'Parameter values for the card, if it takes any',
      },
    },
    required: ['card_id'],
  },
};

export const executeQueryToolDefinition: Tool = {
  name: 'execute_query',
  description: 'Run a native SQL query against a database and return the results.',
  inputSchema: {
    type: 'object',
    properties: {
      database_id: {
        type: 'integer',
        description: 'Database id',
      },
      query: {
        type: 'string',
        description: 'SQL to run',
      },
      native_parameters: {
        type: 'array',
        items: { type: 'object' },
        description: 'Template tag parameters for the query',
      },
    },
    required: ['database_id', 'query'],
  },
};

export const EXECUTION_TOOLS: Tool[] = [executeCardToolDefinition, executeQueryToolDefinition];

const ExecuteCardArgs = z.object({
  card_id: z.number().int(),
  parameters: z.record(z.unknown()).optional(),
});

const ExecuteQueryArgs = z.object({
  database_id: z.number().int(),
  query: z.string(),
  native_parameters: z.array(z.record(z.unknown())).optional(),
});

export async function handleExecuteCard(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const { card_id, parameters } = parseArgs('execute_card', ExecuteCardArgs, args);
  return jsonResponse(await executeCard(gateway, card_id, parameters));
}

export async function handleExecuteQuery(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const { database_id, query, native_parameters } = parseArgs('execute_query', ExecuteQueryArgs, args);
  return jsonResponse(
    await executeQuery(gateway, { databaseId: database_id, query, parameters: native_parameters })
  );
}
