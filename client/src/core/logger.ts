/**
 * Structured logger with categories and levels.
 * Filtered by a global level set at startup (see parseLogLevel) or at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/** Parse a user-supplied level name (query string, env). Unknown names → null. */
export function parseLogLevel(value: string | null | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(category: string) {
  const prefix = `[${category}]`;

  function shouldLog(level: LogLevel): boolean {
    return LOG_PRIORITY[level] >= LOG_PRIORITY[globalLevel];
  }

  return {
    debug(...args: unknown[]): void {
      if (shouldLog('debug')) console.debug(prefix, ...args);
    },
    info(...args: unknown[]): void {
      if (shouldLog('info')) console.info(prefix, ...args);
    },
    warn(...args: unknown[]): void {
      if (shouldLog('warn')) console.warn(prefix, ...args);
    },
    error(...args: unknown[]): void {
      if (shouldLog('error')) console.error(prefix, ...args);
    },
  };
}
