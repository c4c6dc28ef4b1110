#!/usr/bin/env node
/**
 * Metabase MCP Server Entry Point
 *
 * Environment Variables:
 *   METABASE_URL          - Metabase base URL (required)
 *   METABASE_API_KEY      - API key (preferred)
 *   METABASE_USER_EMAIL   - Session login email, when no API key is set
 *   METABASE_PASSWORD     - Session login password
 *   MCP_TRANSPORT         - streamable-http (default) or stdio
 *   HOST, PORT            - HTTP bind address (default: 0.0.0.0:8080)
 *   LOG_LEVEL             - DEBUG, INFO, WARNING, ERROR or CRITICAL
 */

import {
  MetabaseGateway,
  createLogger,
  loadSettings,
  setLogLevel,
  toLogLevel,
} from 'metabase-mcp-core';

import { applyServerArgs, parseServerArgs } from '../config/args.js';
import { createMetabaseMCPServer } from '../server.js';
import { startHttpServer } from '../transport/http.js';
import { startStdioServer } from '../transport/stdio.js';

const logger = createLogger('server');

async function main(): Promise<void> {
  const settings = applyServerArgs(loadSettings(), parseServerArgs(process.argv.slice(2)));
  setLogLevel(toLogLevel(settings.logLevel));

  const gateway = MetabaseGateway.fromSettings(settings);
  const createMcpServer = () => createMetabaseMCPServer({ gateway, name: settings.serverName });

  let stopTransport: () => Promise<void>;

  if (settings.transport === 'stdio') {
    const server = createMcpServer();
    await startStdioServer(server);
    stopTransport = () => server.close();
  } else {
    const http = await startHttpServer({
      host: settings.host,
      port: settings.port,
      serviceName: settings.serverName,
      createMcpServer,
    });
    stopTransport = () => http.close();
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down...');
    await stopTransport();
    await gateway.close();
    logger.info('Server stopped');
  };

  const onSignal = (): void => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
