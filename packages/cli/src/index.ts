/**
 * metabase-mcp-cli
 *
 * Terminal access to collection discovery and scoped card search.
 */

export { createProgram, CLI_VERSION } from './program.js';
export * from './commands/index.js';
export { createCLIGateway } from './services/gateway-factory.js';
