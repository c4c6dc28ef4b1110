/**
 * Collection Discovery
 *
 * First stage of the discovery pipeline: find collections whose name or
 * description contains the query, sorted by name and truncated.
 *
 * @module discovery/collections
 */

import { decodeCollections, type Collection } from '../gateway/schemas.js';
import type { IMetabaseGateway } from '../gateway/types.js';
import { createLogger } from '../logging/logger.js';
import { compareStrings, matchesTerm, normalizeQuery } from './match.js';
import type {
  CollectionDiscoveryResult,
  CollectionMatch,
  FindCandidateCollectionsOptions,
} from './types.js';

const logger = createLogger('discovery');

export const DEFAULT_COLLECTION_LIMIT = 10;

const DISCOVERY_NOTE =
  'Collections matching query in name or description. Use search_cards_in_collections next.';

function toCollectionMatch(collection: Collection): CollectionMatch {
  return {
    collection_id: collection.id,
    collection_name: collection.name,
    description: collection.description,
    parent_id: collection.parent_id,
    archived: collection.archived,
  };
}

function byCollectionName(a: CollectionMatch, b: CollectionMatch): number {
  return compareStrings((a.collection_name ?? '').toLowerCase(), (b.collection_name ?? '').toLowerCase());
}

/**
 * Find collections whose name or description contains `query`.
 *
 * Matching is a case-insensitive substring test on the trimmed query.
 * Results are sorted ascending by lowercased name (missing names first) and
 * cut to `limitCollections`. A non-list upstream payload yields an empty
 * result with zero counts.
 *
 * @throws RangeError when limitCollections is negative or not an integer
 */
export async function findCandidateCollections(
  gateway: IMetabaseGateway,
  query: string,
  options: FindCandidateCollectionsOptions = {}
): Promise<CollectionDiscoveryResult> {
  const limit = options.limitCollections ?? DEFAULT_COLLECTION_LIMIT;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit_collections must be an integer >= 0 (got ${limit})`);
  }

  const payload = await gateway.request('GET', '/collection');
  const decoded = decodeCollections(payload);

  if (decoded.kind === 'malformed') {
    logger.warn(`Expected a list of collections, received ${decoded.received}`);
    return {
      query,
      collections: [],
      results: { total_collections_searched: 0, matched_collections: 0, returned_collections: 0 },
      note: DISCOVERY_NOTE,
    };
  }

  const term = normalizeQuery(query);
  const matches = decoded.items
    .filter((collection) => matchesTerm(term, collection.name, collection.description))
    .map(toCollectionMatch)
    .sort(byCollectionName);

  const limited = matches.slice(0, limit);

  logger.debug(`Matched ${matches.length} of ${decoded.total} collections for "${term}"`);

  return {
    query,
    collections: limited,
    results: {
      total_collections_searched: decoded.total,
      matched_collections: matches.length,
      returned_collections: limited.length,
    },
    note: DISCOVERY_NOTE,
  };
}
