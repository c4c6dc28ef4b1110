/**
 * Console Logging
 *
 * Scoped loggers that write `[metabase-mcp:<scope>] message` lines to stderr.
 * stdout is reserved for the stdio MCP transport, so every level goes
 * through console.error.
 *
 * @module logging/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Level names accepted in configuration (LOG_LEVEL)
 */
export type ConfigLogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = 'info';

export interface Logger {
  readonly scope: string;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Map a configured level name onto a logger level.
 */
export function toLogLevel(level: ConfigLogLevel): LogLevel {
  switch (level) {
    case 'DEBUG':
      return 'debug';
    case 'INFO':
      return 'info';
    case 'WARNING':
      return 'warn';
    case 'ERROR':
    case 'CRITICAL':
      return 'error';
  }
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

function formatContext(context: Record<string, unknown> | undefined): string {
  if (!context) {
    return '';
  }
  const entries = Object.entries(context).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return '';
  }
  return ' ' + entries.map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`).join(' ');
}

export function createLogger(scope: string): Logger {
  const prefix = `[metabase-mcp:${scope}]`;

  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (!isLevelEnabled(level)) {
      return;
    }
    const tag = level === 'info' ? '' : ` ${level.toUpperCase()}`;
    console.error(`${prefix}${tag} ${message}${formatContext(context)}`);
  };

  return {
    scope,
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
