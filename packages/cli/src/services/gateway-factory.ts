/**
 * Gateway Factory for CLI
 *
 * Builds a request gateway from the environment, applying LOG_LEVEL on the
 * way.
 *
 * @module services/gateway-factory
 */

import {
  MetabaseGateway,
  loadSettings,
  setLogLevel,
  toLogLevel,
  type EnvInput,
  type IMetabaseGateway,
} from 'metabase-mcp-core';

/**
 * @throws AuthConfigError when the environment has no usable credentials
 */
export function createCLIGateway(env: EnvInput = process.env): IMetabaseGateway {
  const settings = loadSettings(env);
  setLogLevel(toLogLevel(settings.logLevel));
  return MetabaseGateway.fromSettings(settings);
}
