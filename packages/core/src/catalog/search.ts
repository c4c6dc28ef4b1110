/**
 * Metabase Search API
 *
 * @module catalog/search
 */

import { isRecord } from '../gateway/schemas.js';
import type { IMetabaseGateway, QueryParams } from '../gateway/types.js';

export interface SearchMetabaseOptions {
  limit?: number | undefined;
  /** Item types, e.g. `card`, `dashboard`, `collection` */
  models?: string[] | undefined;
  archived?: boolean | undefined;
  searchNativeQuery?: boolean | undefined;
}

export interface SearchInfo {
  query: string;
  limit: number;
  models: string[] | null;
  total_results: number;
}

/**
 * Query `GET /search` and attach a `search_info` summary. A bare array
 * response is wrapped as `{ data, search_info }`.
 */
export async function searchMetabase(
  gateway: IMetabaseGateway,
  query: string,
  options: SearchMetabaseOptions = {}
): Promise<Record<string, unknown>> {
  const limit = options.limit ?? 20;
  const params: QueryParams = {
    q: query,
    limit,
    archived: String(options.archived ?? false),
    search_native_query: options.searchNativeQuery === true ? 'true' : undefined,
    models: options.models,
  };

  const result = await gateway.request('GET', '/search', { query: params });

  const searchInfo = (totalResults: number): SearchInfo => ({
    query,
    limit,
    models: options.models ?? null,
    total_results: totalResults,
  });

  if (isRecord(result)) {
    const data = result['data'];
    return { ...result, search_info: searchInfo(Array.isArray(data) ? data.length : 0) };
  }

  const data = Array.isArray(result) ? result : [];
  return { data, search_info: searchInfo(data.length) };
}
