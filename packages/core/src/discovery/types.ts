/**
 * Discovery Pipeline Types
 *
 * Result payloads keep the snake_case field names they are served with.
 *
 * @module discovery/types
 */

import type { Card, Collection } from '../gateway/schemas.js';

/**
 * Projection of a matching collection
 */
export interface CollectionMatch {
  collection_id: Collection['id'];
  collection_name: string | null;
  description: string | null;
  parent_id: number | null;
  archived: boolean;
}

export interface CollectionDiscoveryResult {
  query: string;
  collections: CollectionMatch[];
  results: {
    /** Length of the raw upstream list */
    total_collections_searched: number;
    /** Matches before truncation */
    matched_collections: number;
    /** Matches after truncation */
    returned_collections: number;
  };
  note: string;
}

export interface FindCandidateCollectionsOptions {
  /** Maximum collections returned (>= 0, default 10) */
  limitCollections?: number | undefined;
}

/**
 * Projection of a matching card
 */
export interface CardMatch {
  id: number | null;
  name: string | null;
  description: string | null;
  collection_id: Card['collection_id'];
  updated_at: string | null;
  created_at: string | null;
}

export interface SearchPagination {
  limit: number;
  offset: number;
  returned: number;
  total_found: number;
  has_more: boolean;
}

export interface CardSearchResult {
  query: string;
  collections_searched: number[];
  pagination: SearchPagination;
  cards: CardMatch[];
  note: string;
}

export interface SearchCardsOptions {
  /** Page size (default 25) */
  limit?: number | undefined;
  /** Matches to skip (default 0) */
  offset?: number | undefined;
}

/**
 * What one requested collection contributed to a card search
 */
export type CollectionSearchOutcome =
  | { kind: 'matched'; collectionId: number; cards: CardMatch[] }
  | { kind: 'skipped'; collectionId: number; reason: string };

export interface DiscoverCardsOptions extends SearchCardsOptions {
  limitCollections?: number | undefined;
}

export interface DiscoverCardsResult {
  query: string;
  collections: CollectionDiscoveryResult;
  search: CardSearchResult;
}
