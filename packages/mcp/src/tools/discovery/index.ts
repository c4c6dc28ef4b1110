/**
 * Discovery Tools
 *
 * Layer: Discovery
 *
 * Tools:
 * - find_candidate_collections: collections whose name or description match
 * - search_cards_in_collections: cards matching a query inside given collections
 * - search_metabase: Metabase's own full-text search
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  findCandidateCollections,
  searchCardsInCollections,
  searchMetabase,
  type IMetabaseGateway,
} from 'metabase-mcp-core';

import { jsonResponse, parseArgs, type ToolResponse } from '../response.js';

export const findCandidateCollectionsToolDefinition: Tool = {
  name: 'find_candidate_collections',
  description:
    'Find collections whose name or description contains the query (case-insensitive). ' +
    'Use this first to narrow down where relevant cards live, then call search_cards_in_collections.',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Text to look for in collection names and descriptions',
      },
      limit_collections: {
        type: 'integer',
        minimum: 0,
        description: 'Maximum collections to return (default: 10)',
      },
    },
    required: ['query'],
  },
};

export const searchCardsInCollectionsToolDefinition: Tool = {
  name: 'search_cards_in_collections',
  description:
    'Search cards (saved questions) by name or description within specific collections. ' +
    'Results are sorted by most recently updated and paginated.',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Text to look for in card names and descriptions',
      },
      collection_ids: {
        type: 'array',
        items: { type: 'integer' },
        description: 'Collection ids to search, usually from find_candidate_collections',
      },
      limit: {
        type: 'integer',
        minimum: 1,
        description: 'Page size (default: 25)',
      },
      offset: {
        type: 'integer',
        minimum: 0,
        description: 'Matches to skip (default: 0)',
      },
    },
    required: ['query', 'collection_ids'],
  },
};

export const searchMetabaseToolDefinition: Tool = {
  name: 'search_metabase',
  description:
    'Search Metabase items (cards, dashboards, collections, tables, ...) with the built-in search API.',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Search text',
      },
      limit: {
        type: 'integer',
        description: 'Maximum results (default: 20)',
      },
      models: {
        type: 'array',
        items: { type: 'string' },
        description: 'Item types to include, e.g. ["card", "dashboard"]',
      },
      archived: {
        type: 'boolean',
        description: 'Search archived items instead (default: false)',
      },
      search_native_query: {
        type: 'boolean',
        description: 'Also match the SQL of native questions',
      },
    },
    required: ['query'],
  },
};

export const DISCOVERY_TOOLS: Tool[] = [
  findCandidateCollectionsToolDefinition,
  searchCardsInCollectionsToolDefinition,
  searchMetabaseToolDefinition,
];

const FindCandidateCollectionsArgs = z.object({
  query: z.string(),
  limit_collections: z.number().int().optional(),
});

const SearchCardsInCollectionsArgs = z.object({
  query: z.string(),
  collection_ids: z.array(z.number().int()),
  limit: z.number().int().optional(),
  offset: z.number().int().optional(),
});

const SearchMetabaseArgs = z.object({
  query: z.string(),
  limit: z.number().int().optional(),
  models: z.array(z.string()).optional(),
  archived: z.boolean().optional(),
  search_native_query: z.boolean().optional(),
});

export async function handleFindCandidateCollections(
  gateway: IMetabaseGateway,
  args: unknown
): Promise<ToolResponse> {
  const { query, limit_collections } = parseArgs('find_candidate_collections', FindCandidateCollectionsArgs, args);
  const result = await findCandidateCollections(gateway, query, { limitCollections: limit_collections });
  return jsonResponse(result);
}

export async function handleSearchCardsInCollections(
  gateway: IMetabaseGateway,
  args: unknown
): Promise<ToolResponse> {
  const { query, collection_ids, limit, offset } = parseArgs(
    'search_cards_in_collections',
    SearchCardsInCollectionsArgs,
    args
  );
  const result = await searchCardsInCollections(gateway, query, collection_ids, { limit, offset });
  return jsonResponse(result);
}

export async function handleSearchMetabase(gateway: IMetabaseGateway, args: unknown): Promise<ToolResponse> {
  const parsed = parseArgs('search_metabase', SearchMetabaseArgs, args);
  const result = await searchMetabase(gateway, parsed.query, {
    limit: parsed.limit,
    models: parsed.models,
    archived: parsed.archived,
    searchNativeQuery: parsed.search_native_query,
  });
  return jsonResponse(result);
}
