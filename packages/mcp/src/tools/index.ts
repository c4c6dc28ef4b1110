/**
 * Metabase MCP Tools
 *
 * Tools organized into layers:
 * - Discovery: collection discovery, scoped card search, full-text search
 * - Exploration: listing databases, tables, cards and collections
 * - Execution: running saved questions and native queries
 * - Authoring: creating cards and collections
 */

export * from './discovery/index.js';
export * from './exploration/index.js';
export * from './execution/index.js';
export * from './authoring/index.js';
export * from './registry.js';
export * from './response.js';
