/**
 * Logger utility for @cronmarket/runtime
 *
 * Lightweight, dependency-free logging with configurable levels and
 * component-scoped prefixes.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_LOG_PREFIX = '[cronmarket]';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
  /** Derive a logger sharing this one's level with `scope` appended to the prefix */
  child(scope: string): Logger;
}

/** Narrow an arbitrary value to a {@link LogLevel}. */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[cronmarket]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.child('matching').info('Job matched');
 * // 2026-01-21T12:00:00.000Z INFO  [cronmarket:matching] Job matched
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = DEFAULT_LOG_PREFIX): Logger {
  const state = { level: LOG_LEVELS[minLevel] };
  return buildLogger(state, prefix);
}

function buildLogger(state: { level: number }, prefix: string): Logger {
  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < state.level) {
      return;
    }
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const fullMessage = `${timestamp} ${levelStr} ${prefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(fullMessage, ...args);
        break;
      case 'info':
        console.info(fullMessage, ...args);
        break;
      case 'warn':
        console.warn(fullMessage, ...args);
        break;
      case 'error':
        console.error(fullMessage, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      state.level = LOG_LEVELS[level];
    },
    child: (scope) => buildLogger(state, scopedPrefix(prefix, scope)),
  };
}

/** `[cronmarket]` + `matching` → `[cronmarket:matching]` */
function scopedPrefix(prefix: string, scope: string): string {
  if (prefix.startsWith('[') && prefix.endsWith(']')) {
    return `${prefix.slice(0, -1)}:${scope}]`;
  }
  return `${prefix}:${scope}`;
}

/**
 * No-op logger for silent operation
 *
 * Components that accept an optional logger default to this one.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
  child: () => silentLogger,
};
