/**
 * metabase-mcp-server
 *
 * MCP tool definitions and dispatch for the Metabase REST API, plus the
 * stdio and streamable HTTP transports.
 */

export { createMetabaseMCPServer, callTool, SERVER_VERSION } from './server.js';
export type { MetabaseMCPConfig } from './server.js';

export * from './tools/index.js';

export { createHttpServer, startHttpServer, MCP_PATH } from './transport/http.js';
export type { HttpTransportOptions, RunningHttpServer } from './transport/http.js';
export { startStdioServer } from './transport/stdio.js';

export { parseServerArgs, applyServerArgs } from './config/args.js';
export type { ServerArgs } from './config/args.js';
