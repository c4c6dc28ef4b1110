/**
 * Stdio Transport
 *
 * One server for the lifetime of the process, talking JSON-RPC over
 * stdin/stdout. Logs go to stderr.
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger } from 'metabase-mcp-core';

const logger = createLogger('stdio');

export async function startStdioServer(server: Server): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Server running on stdio');
  return transport;
}
