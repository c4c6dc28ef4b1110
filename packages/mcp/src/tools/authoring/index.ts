/**
 * Authoring Tools
 *
 * Layer: Authoring
 *
 * Tools:
 * - create_card: save a native SQL question
 * - create_collection: create a (possibly nested) collection
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { createCard, createCollection, type IMetabaseGateway } from 'metabase-mcp-core';

import { jsonResponse, parseArgs, type ToolResponse } from '../response.js';

export const createCardToolDefinition: Tool = {
  name: 'create_card',
  description: 'Create a saved question from native SQL.',
  inputSchema: {
    type: 'object',
    properties: {
      name: {
        type: 'string',
        description: 'Card name',
      },
      database_id: {
        type: 'integer',
        description: 'Database the query runs against',
      },
      query: {
        type: 'string',
        description: 'SQL for the card',
      },
      description: {
        type: 'string',
        description: 'Card description',
      },
      collection_id: {
        type: 'integer',
        description: 'Collection to save the card in',
      },
      visualization_settings: {
        type: 'object',
        description: 'Metabase visualization settings (default: {})',
      },
    },
    required: ['name', 'database_id', 'query'],
  },
};

export const createCollectionToolDefinition: Tool = {
  name: 'create_collection',
  description: 'Create a collection, optionally inside a parent collection.',
  inputSchema: {
    type: 'object',
    properties: {
      name: {
        type: 'string',
        description: 'Collection name',
      },
      description: {
        type: 'string',
        description: 'Collection description',
      },
      color: {
        type: 'string',
        description: 'Hex colour, e.g. "#509EE3"',
      },
      parent_id: {
        type: 'integer',
        description: 'Parent collection id',
      },
    },
    required: ['name'],
  },
};

export const AUTHORING_TOOLS: Tool[] = [createCardToolDefinition, createCollectionToolDefinition];

const CreateCardArgs = z.object({
  name: z.string().min(1),
  database_id: z.number().int(),
  query: z.string().min(1),
  description: z.string().optional(),
  collection_id: z.number().int().optional(),
  visualization_settings: z.record(z.unknown()).optional(),
});

const CreateCollectionArgs = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  color: z.string().optional(),
  parent_id: z.number().int().optional(),
});

export async function handleCreateCard(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const parsed = parseArgs('create_card', CreateCardArgs, args);
  const result = await createCard(gateway, {
    name: parsed.name,
    databaseId: parsed.database_id,
    query: parsed.query,
    description: parsed.description,
    collectionId: parsed.collection_id,
    visualizationSettings: parsed.visualization_settings,
  });
  return jsonResponse(result);
}

export async function handleCreateCollection(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const parsed = parseArgs('create_collection', CreateCollectionArgs, args);
  const result = await createCollection(gateway, {
    name: parsed.name,
    description: parsed.description,
    color: parsed.color,
    parentId: parsed.parent_id,
  });
  return jsonResponse(result);
}
