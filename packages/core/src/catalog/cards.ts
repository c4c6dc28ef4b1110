/**
 * Card Operations
 *
 * @module catalog/cards
 */

import { isRecord } from '../gateway/schemas.js';
import type { IMetabaseGateway } from '../gateway/types.js';
import { paginate } from '../pagination/paginate.js';

export const CARD_FILTERS = ['all', 'mine', 'bookmarked', 'archived'] as const;

export type CardFilter = (typeof CARD_FILTERS)[number];

export interface ListCardsPaginatedOptions {
  limit?: number | undefined;
  offset?: number | undefined;
  filter?: CardFilter | undefined;
}

export interface PaginatedCards {
  cards: unknown[];
  pagination: {
    limit: number;
    offset: number;
    returned: number;
    total_available: number;
    has_more: boolean;
  };
  filter: CardFilter;
}

export interface CollectionCards {
  cards: unknown[];
  collection_id: number;
  count: number;
  message: string;
}

export interface CreateCardInput {
  name: string;
  databaseId: number;
  query: string;
  description?: string | undefined;
  collectionId?: number | undefined;
  visualizationSettings?: Record<string, unknown> | undefined;
}

/**
 * A response body passed through untouched when it is not the expected list
 */
export type UpstreamPayload = unknown;

export type CardParameters = Record<string, unknown> | Record<string, unknown>[];

/**
 * List every card. Large instances return thousands of entries.
 */
export async function listCards(gateway: IMetabaseGateway): Promise<unknown> {
  return gateway.request('GET', '/card');
}

/**
 * List cards one page at a time. Metabase does not paginate `/card`, so the
 * full list is fetched and sliced locally; a non-list payload is returned
 * unchanged.
 */
export async function listCardsPaginated(
  gateway: IMetabaseGateway,
  options: ListCardsPaginatedOptions = {}
): Promise<PaginatedCards | UpstreamPayload> {
  const limit = options.limit ?? 50;
  const offset = options.offset ?? 0;
  const filter = options.filter ?? 'all';

  const result = await gateway.request('GET', '/card', {
    query: filter === 'all' ? undefined : { f: filter },
  });

  if (!Array.isArray(result)) {
    return result;
  }

  const cards: unknown[] = result;
  const { page, total, hasMore } = paginate(cards, { limit, offset });

  return {
    cards: page,
    pagination: {
      limit,
      offset,
      returned: page.length,
      total_available: total,
      has_more: hasMore,
    },
    filter,
  };
}

/**
 * List the cards of one collection, filtered locally from the full list.
 */
export async function listCardsByCollection(
  gateway: IMetabaseGateway,
  collectionId: number
): Promise<CollectionCards | UpstreamPayload> {
  const result = await gateway.request('GET', '/card');

  if (!Array.isArray(result)) {
    return result;
  }

  const cards = result.filter(
    (card): card is Record<string, unknown> => isRecord(card) && card['collection_id'] === collectionId
  );

  return {
    cards,
    collection_id: collectionId,
    count: cards.length,
    message: `Found ${cards.length} cards in collection ${collectionId}`,
  };
}

function hasParameters(parameters: CardParameters | undefined): parameters is CardParameters {
  if (parameters === undefined) {
    return false;
  }
  return Array.isArray(parameters) ? parameters.length > 0 : Object.keys(parameters).length > 0;
}

/**
 * Run a saved question and return its result set.
 */
export async function executeCard(
  gateway: IMetabaseGateway,
  cardId: number,
  parameters?: CardParameters
): Promise<unknown> {
  const body: Record<string, unknown> = {};
  if (hasParameters(parameters)) {
    body['parameters'] = parameters;
  }
  return gateway.request('POST', `/card/${cardId}/query`, { body });
}

/**
 * Save a native SQL question.
 */
export async function createCard(gateway: IMetabaseGateway, input: CreateCardInput): Promise<unknown> {
  const body: Record<string, unknown> = {
    name: input.name,
    database_id: input.databaseId,
    dataset_query: {
      database: input.databaseId,
      type: 'native',
      native: { query: input.query },
    },
    display: 'table',
    visualization_settings: input.visualizationSettings ?? {},
  };

  if (input.description) {
    body['description'] = input.description;
  }
  if (input.collectionId !== undefined) {
    body['collection_id'] = input.collectionId;
  }

  return gateway.request('POST', '/card', { body });
}
