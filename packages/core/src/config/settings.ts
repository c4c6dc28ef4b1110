/**
 * Settings
 *
 * Environment-driven configuration, validated once at startup. The
 * authentication strategy is resolved here: an API key wins, otherwise an
 * email/password pair is required.
 *
 * @module config/settings
 */

import { z } from 'zod';

import { AuthConfigError } from '../gateway/errors.js';
import type { ConfigLogLevel } from '../logging/logger.js';

export type TransportKind = 'streamable-http' | 'stdio';

export type AuthSettings =
  | { method: 'api_key'; apiKey: string }
  | { method: 'session'; email: string; password: string };

export interface HttpSettings {
  /** Connect timeout in seconds (1-60) */
  connectTimeout: number;
  /** Read timeout in seconds (5-300) */
  readTimeout: number;
  enableHttp2: boolean;
}

export interface Settings {
  metabaseUrl: string;
  auth: AuthSettings;
  host: string;
  port: number;
  logLevel: ConfigLogLevel;
  serverName: string;
  transport: TransportKind;
  http: HttpSettings;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const booleanFlag = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off', ''].includes(normalized)) return false;
  return value;
}, z.boolean());

const EnvSchema = z.object({
  METABASE_URL: z.string({ required_error: 'METABASE_URL is required' }).url(),
  METABASE_API_KEY: optionalString,
  METABASE_USER_EMAIL: optionalString,
  METABASE_PASSWORD: optionalString,
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']).default('INFO'),
  MCP_SERVER_NAME: z.string().min(1).default('metabase-mcp'),
  MCP_TRANSPORT: z.enum(['streamable-http', 'stdio']).default('streamable-http'),
  HTTP_CONNECT_TIMEOUT: z.coerce.number().min(1).max(60).default(10),
  HTTP_READ_TIMEOUT: z.coerce.number().min(5).max(300).default(30),
  HTTP_ENABLE_HTTP2: booleanFlag.default(false),
});

export type EnvInput = Record<string, string | undefined>;

/**
 * Load and validate settings from environment variables.
 *
 * @throws AuthConfigError when a value is invalid or no credentials are configured
 */
export function loadSettings(env: EnvInput = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AuthConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;

  return {
    metabaseUrl: values.METABASE_URL.replace(/\/+$/, ''),
    auth: resolveAuth(values.METABASE_API_KEY, values.METABASE_USER_EMAIL, values.METABASE_PASSWORD),
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    serverName: values.MCP_SERVER_NAME,
    transport: values.MCP_TRANSPORT,
    http: {
      connectTimeout: values.HTTP_CONNECT_TIMEOUT,
      readTimeout: values.HTTP_READ_TIMEOUT,
      enableHttp2: values.HTTP_ENABLE_HTTP2,
    },
  };
}

function resolveAuth(
  apiKey: string | undefined,
  email: string | undefined,
  password: string | undefined
): AuthSettings {
  if (apiKey) {
    return { method: 'api_key', apiKey };
  }
  if (email && password) {
    return { method: 'session', email, password };
  }
  throw new AuthConfigError(
    'METABASE_URL is required, and either METABASE_API_KEY or both METABASE_USER_EMAIL and METABASE_PASSWORD must be provided'
  );
}
