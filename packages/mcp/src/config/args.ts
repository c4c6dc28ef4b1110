/**
 * Server command-line arguments
 *
 * Usage:
 *   metabase-mcp                          # transport, host and port from the environment
 *   metabase-mcp --transport stdio        # run over stdin/stdout
 *   metabase-mcp --port 9000 --host 127.0.0.1
 *
 * Flags take precedence over HOST, PORT and MCP_TRANSPORT.
 */

import { AuthConfigError, type Settings, type TransportKind } from 'metabase-mcp-core';

export interface ServerArgs {
  transport?: TransportKind;
  host?: string;
  port?: number;
}

function parseTransport(value: string): TransportKind {
  if (value === 'stdio' || value === 'streamable-http') {
    return value;
  }
  throw new AuthConfigError(`Invalid --transport value: ${value} (expected stdio or streamable-http)`);
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new AuthConfigError(`Invalid --port value: ${value} (expected an integer between 1 and 65535)`);
  }
  return port;
}

export function parseServerArgs(args: readonly string[]): ServerArgs {
  const parsed: ServerArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];
    if (nextArg === undefined) {
      continue;
    }
    if (arg === '--transport') {
      parsed.transport = parseTransport(nextArg);
      i++;
    } else if (arg === '--port') {
      parsed.port = parsePort(nextArg);
      i++;
    } else if (arg === '--host') {
      parsed.host = nextArg;
      i++;
    }
  }

  return parsed;
}

export function applyServerArgs(settings: Settings, args: ServerArgs): Settings {
  return {
    ...settings,
    transport: args.transport ?? settings.transport,
    host: args.host ?? settings.host,
    port: args.port ?? settings.port,
  };
}
