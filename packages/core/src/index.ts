/**
 * metabase-mcp-core
 *
 * Request gateway, collection discovery, scoped card search and the catalog
 * operations behind the Metabase MCP tools.
 */

// ============================================================================
// Configuration & Logging
// ============================================================================

export type {
  Settings,
  AuthSettings,
  HttpSettings,
  TransportKind,
  EnvInput,
} from './config/settings.js';
export { loadSettings } from './config/settings.js';

export type { Logger, LogLevel, ConfigLogLevel } from './logging/logger.js';
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  isLevelEnabled,
  toLogLevel,
} from './logging/logger.js';

// ============================================================================
// Gateway
// ============================================================================

export type {
  HttpMethod,
  QueryParams,
  QueryValue,
  RequestOptions,
  TimeoutSettings,
  IMetabaseGateway,
} from './gateway/types.js';

export {
  GatewayError,
  ConnectTimeoutError,
  ReadTimeoutError,
  ConnectError,
  ApiError,
  AuthConfigError,
  isGatewayError,
} from './gateway/errors.js';
export type { GatewayErrorKind, RequestContext } from './gateway/errors.js';

export { MetabaseGateway, classifyTransportError } from './gateway/client.js';
export type {
  HttpFetch,
  HttpRequestInit,
  HttpResponse,
  MetabaseGatewayOptions,
} from './gateway/client.js';

export { ApiKeyAuth, SessionAuth, createAuthStrategy } from './gateway/auth.js';
export type { AuthStrategy, AuthMethod, SessionLogin } from './gateway/auth.js';

export { InMemoryMetabaseGateway } from './gateway/memory-gateway.js';
export type { RouteKey, RecordedCall, RouteHandler } from './gateway/memory-gateway.js';

export {
  CollectionSchema,
  CardSchema,
  decodeList,
  decodeCollections,
  decodeCards,
  isRecord,
} from './gateway/schemas.js';
export type { Collection, Card, ListDecodeResult } from './gateway/schemas.js';

// ============================================================================
// Pagination
// ============================================================================

export { paginate, validatePagination, PaginationError } from './pagination/paginate.js';
export type { Page, PaginationOptions } from './pagination/paginate.js';

// ============================================================================
// Discovery Pipeline
// ============================================================================

export {
  findCandidateCollections,
  DEFAULT_COLLECTION_LIMIT,
} from './discovery/collections.js';
export {
  searchCardsInCollections,
  searchCollectionCards,
  discoverCards,
  DEFAULT_CARD_PAGE_SIZE,
} from './discovery/cards.js';
export { normalizeQuery, matchesTerm } from './discovery/match.js';
export type {
  CollectionMatch,
  CollectionDiscoveryResult,
  FindCandidateCollectionsOptions,
  CardMatch,
  CardSearchResult,
  SearchPagination,
  SearchCardsOptions,
  CollectionSearchOutcome,
  DiscoverCardsOptions,
  DiscoverCardsResult,
} from './discovery/types.js';

// ============================================================================
// Catalog Operations
// ============================================================================

export {
  listCards,
  listCardsPaginated,
  listCardsByCollection,
  executeCard,
  createCard,
  CARD_FILTERS,
} from './catalog/cards.js';
export type {
  CardFilter,
  CardParameters,
  CreateCardInput,
  CollectionCards,
  ListCardsPaginatedOptions,
  PaginatedCards,
  UpstreamPayload,
} from './catalog/cards.js';

export { listCollections, createCollection } from './catalog/collections.js';
export type { CreateCollectionInput } from './catalog/collections.js';

export {
  listDatabases,
  listTables,
  summarizeTables,
  formatTablesMarkdown,
  getTableFields,
  executeQuery,
  DEFAULT_FIELD_LIMIT,
} from './catalog/databases.js';
export type { TableSummary, NativeQueryInput } from './catalog/databases.js';

export { searchMetabase } from './catalog/search.js';
export type { SearchMetabaseOptions, SearchInfo } from './catalog/search.js';
