/**
 * Exploration Tools
 *
 * Layer: Exploration
 *
 * Listing tools over databases, tables, cards and collections. Upstream
 * payloads are returned as Metabase serves them unless noted.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  CARD_FILTERS,
  DEFAULT_FIELD_LIMIT,
  getTableFields,
  listCards,
  listCardsByCollection,
  listCardsPaginated,
  listCollections,
  listDatabases,
  listTables,
  type IMetabaseGateway,
} from 'metabase-mcp-core';

import { jsonResponse, parseArgs, textResponse, type ToolResponse } from '../response.js';

const NO_ARGUMENTS: Tool['inputSchema'] = {
  type: 'object',
  properties: {},
  required: [],
};

export const listDatabasesToolDefinition: Tool = {
  name: 'list_databases',
  description: 'List all databases connected to Metabase.',
  inputSchema: NO_ARGUMENTS,
};

export const listCardsToolDefinition: Tool = {
  name: 'list_cards',
  description:
    'List every card (saved question). Can be very large; prefer list_cards_paginated or the discovery tools.',
  inputSchema: NO_ARGUMENTS,
};

export const listCardsPaginatedToolDefinition: Tool = {
  name: 'list_cards_paginated',
  description: 'List cards one page at a time, optionally filtered.',
  inputSchema: {
    type: 'object',
    properties: {
      limit: {
        type: 'integer',
        minimum: 1,
        description: 'Page size (default: 50)',
      },
      offset: {
        type: 'integer',
        minimum: 0,
        description: 'Cards to skip (default: 0)',
      },
      filter_type: {
        type: 'string',
        enum: [...CARD_FILTERS],
        description: 'Which cards to list (default: all)',
      },
    },
    required: [],
  },
};

export const listCardsByCollectionToolDefinition: Tool = {
  name: 'list_cards_by_collection',
  description: 'List the cards stored in one collection.',
  inputSchema: {
    type: 'object',
    properties: {
      collection_id: {
        type: 'integer',
        description: 'Collection id',
      },
    },
    required: ['collection_id'],
  },
};

export const listCollectionsToolDefinition: Tool = {
  name: 'list_collections',
  description: 'List all collections.',
  inputSchema: NO_ARGUMENTS,
};

export const listTablesToolDefinition: Tool = {
  name: 'list_tables',
  description: 'List the tables of a database as a Markdown table (id, display name, description, entity type).',
  inputSchema: {
    type: 'object',
    properties: {
      database_id: {
        type: 'integer',
        description: 'Database id',
      },
    },
    required: ['database_id'],
  },
};

export const getTableFieldsToolDefinition: Tool = {
  name: 'get_table_fields',
  description: 'Get the fields of a table. Large tables are truncated to `limit` fields.',
  inputSchema: {
    type: 'object',
    properties: {
      table_id: {
        type: 'integer',
        description: 'Table id',
      },
      limit: {
        type: 'integer',
        description: `Maximum fields to return (default: ${DEFAULT_FIELD_LIMIT}; 0 returns all)`,
      },
    },
    required: ['table_id'],
  },
};

export const EXPLORATION_TOOLS: Tool[] = [
  listDatabasesToolDefinition,
  listCardsToolDefinition,
  listCardsPaginatedToolDefinition,
  listCardsByCollectionToolDefinition,
  listCollectionsToolDefinition,
  listTablesToolDefinition,
  getTableFieldsToolDefinition,
];

const ListCardsPaginatedArgs = z.object({
  limit: z.number().int().min(1).optional(),
  offset: z.number().int().min(0).optional(),
  filter_type: z.enum(CARD_FILTERS).optional(),
});

const ListCardsByCollectionArgs = z.object({
  collection_id: z.number().int(),
});

const ListTablesArgs = z.object({
  database_id: z.number().int(),
});

const GetTableFieldsArgs = z.object({
  table_id: z.number().int(),
  limit: z.number().int().optional(),
});

export async function handleListDatabases(gateway: IMetabaseGateway): Promise<ToolResponse> {
  return jsonResponse(await listDatabases(gateway));
}

export async function handleListCards(gateway: IMetabaseGateway): Promise<ToolResponse> {
  return jsonResponse(await listCards(gateway));
}

export async function handleListCardsPaginated(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const { limit, offset, filter_type } = parseArgs('list_cards_paginated', ListCardsPaginatedArgs, args);
  return jsonResponse(await listCardsPaginated(gateway, { limit, offset, filter: filter_type }));
}

export async function handleListCardsByCollection(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const { collection_id } = parseArgs('list_cards_by_collection', ListCardsByCollectionArgs, args);
  return jsonResponse(await listCardsByCollection(gateway, collection_id));
}

export async function handleListCollections(gateway: IMetabaseGateway): Promise<ToolResponse> {
  return jsonResponse(await listCollections(gateway));
}

export async function handleListTables(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const { database_id } = parseArgs('list_tables', ListTablesArgs, args);
  return textResponse(await listTables(gateway, database_id));
}

export async function handleGetTableFields(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const { table_id, limit } = parseArgs('get_table_fields', GetTableFieldsArgs, args);
  return jsonResponse(await getTableFields(gateway, table_id, limit));
}
