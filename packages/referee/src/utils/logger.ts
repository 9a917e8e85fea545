export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  scope: string | undefined;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function minimumLevel(): LogLevel {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configured = process.env['LOG_LEVEL']?.toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function formatLog(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}:${scope} ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    scope,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

/**
 * Create a logger whose lines carry a `[scope]` tag.
 */
export function createLogger(scope?: string): Logger {
  return {
    debug(message: string, data?: Record<string, unknown>): void {
      if (enabled('debug')) {
        console.debug(formatLog(createLogEntry('debug', scope, message, data)));
      }
    },

    info(message: string, data?: Record<string, unknown>): void {
      if (enabled('info')) {
        console.info(formatLog(createLogEntry('info', scope, message, data)));
      }
    },

    warn(message: string, data?: Record<string, unknown>): void {
      if (enabled('warn')) {
        console.warn(formatLog(createLogEntry('warn', scope, message, data)));
      }
    },

    error(message: string, data?: Record<string, unknown>): void {
      console.error(formatLog(createLogEntry('error', scope, message, data)));
    },
  };
}

export const logger = createLogger();
