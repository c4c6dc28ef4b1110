/**
 * Scoped Card Search
 *
 * Second stage of the discovery pipeline. Metabase has no collection-scoped
 * card endpoint, so the full card list is fetched once per requested
 * collection id and filtered locally. Ids are processed one after another;
 * a failing id contributes no matches and does not stop the rest.
 *
 * @module discovery/cards
 */

import { decodeCards, type Card } from '../gateway/schemas.js';
import type { IMetabaseGateway } from '../gateway/types.js';
import { createLogger } from '../logging/logger.js';
import { paginate, validatePagination } from '../pagination/paginate.js';
import { findCandidateCollections } from './collections.js';
import { compareStrings, matchesTerm, normalizeQuery } from './match.js';
import type {
  CardMatch,
  CardSearchResult,
  CollectionSearchOutcome,
  DiscoverCardsOptions,
  DiscoverCardsResult,
  SearchCardsOptions,
} from './types.js';

const logger = createLogger('discovery');

export const DEFAULT_CARD_PAGE_SIZE = 25;

function toCardMatch(card: Card): CardMatch {
  return {
    id: card.id,
    name: card.name,
    description: card.description,
    collection_id: card.collection_id,
    updated_at: card.updated_at,
    created_at: card.created_at,
  };
}

/**
 * Most recently updated first; cards without `updated_at` sort last.
 */
function byUpdatedAtDesc(a: CardMatch, b: CardMatch): number {
  return compareStrings(b.updated_at ?? '', a.updated_at ?? '');
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch the card list and keep the cards of one collection that match `term`.
 */
export async function searchCollectionCards(
  gateway: IMetabaseGateway,
  collectionId: number,
  term: string
): Promise<CollectionSearchOutcome> {
  let payload: unknown;
  try {
    payload = await gateway.request('GET', '/card');
  } catch (error) {
    return { kind: 'skipped', collectionId, reason: describeFailure(error) };
  }

  const decoded = decodeCards(payload);
  if (decoded.kind === 'malformed') {
    return { kind: 'skipped', collectionId, reason: `expected a list of cards, received ${decoded.received}` };
  }

  const cards = decoded.items
    .filter((card) => card.collection_id === collectionId)
    .filter((card) => matchesTerm(term, card.name, card.description))
    .map(toCardMatch);

  return { kind: 'matched', collectionId, cards };
}

/**
 * Search cards by name or description within the given collections.
 *
 * Matches from every collection are merged, sorted by `updated_at`
 * descending and paginated. Duplicate ids are searched once per occurrence.
 *
 * @throws PaginationError for a limit below 1 or a negative offset
 */
export async function searchCardsInCollections(
  gateway: IMetabaseGateway,
  query: string,
  collectionIds: readonly number[],
  options: SearchCardsOptions = {}
): Promise<CardSearchResult> {
  const limit = options.limit ?? DEFAULT_CARD_PAGE_SIZE;
  const offset = options.offset ?? 0;
  validatePagination({ limit, offset });

  const term = normalizeQuery(query);
  const matches: CardMatch[] = [];

  for (const collectionId of collectionIds) {
    const outcome = await searchCollectionCards(gateway, collectionId, term);
    switch (outcome.kind) {
      case 'matched':
        matches.push(...outcome.cards);
        break;
      case 'skipped':
        logger.warn(`Error searching collection ${outcome.collectionId}: ${outcome.reason}`);
        break;
    }
  }

  matches.sort(byUpdatedAtDesc);
  const { page, total, hasMore } = paginate(matches, { limit, offset });

  return {
    query,
    collections_searched: [...collectionIds],
    pagination: {
      limit,
      offset,
      returned: page.length,
      total_found: total,
      has_more: hasMore,
    },
    cards: page,
    note: `Searched ${collectionIds.length} collections for '${query}'. Found ${total} matching cards.`,
  };
}

/**
 * Run both stages: discover candidate collections for `query`, then search
 * their cards for the same query.
 */
export async function discoverCards(
  gateway: IMetabaseGateway,
  query: string,
  options: DiscoverCardsOptions = {}
): Promise<DiscoverCardsResult> {
  const collections = await findCandidateCollections(gateway, query, {
    limitCollections: options.limitCollections,
  });

  const collectionIds = collections.collections
    .map((match) => match.collection_id)
    .filter((id): id is number => typeof id === 'number');

  const search = await searchCardsInCollections(gateway, query, collectionIds, {
    limit: options.limit,
    offset: options.offset,
  });

  return { query, collections, search };
}
