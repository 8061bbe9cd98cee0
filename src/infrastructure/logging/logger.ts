/**
 * conduit - Logging
 *
 * Minimal logger contract used by the router builder, the dispatcher and the
 * built-in middleware. Anything with these four methods (pino, winston,
 * `console`) can be passed where an {@link ILogger} is expected.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels, most verbose first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  /** Lowest level written (default: `info`) */
  level?: LogLevel;

  /** Text placed before every message, e.g. `[conduit]` */
  prefix?: string;
}

/**
 * Console logger writing every level
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Console logger with level filtering and an optional prefix
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'warn', prefix: '[api]' });
 * logger.info('ignored');
 * logger.warn('shadowed route');  // console.warn('[WARN] [api] shadowed route')
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.prefix ?? '';
  const format = (tag: string, message: string): string =>
    prefix ? `[${tag}] ${prefix} ${message}` : `[${tag}] ${message}`;

  return {
    debug: (message, ...args) => {
      if (threshold <= LEVEL_ORDER.debug) console.debug(format('DEBUG', message), ...args);
    },
    info: (message, ...args) => {
      if (threshold <= LEVEL_ORDER.info) console.info(format('INFO', message), ...args);
    },
    warn: (message, ...args) => {
      if (threshold <= LEVEL_ORDER.warn) console.warn(format('WARN', message), ...args);
    },
    error: (message, ...args) => {
      if (threshold <= LEVEL_ORDER.error) console.error(format('ERROR', message), ...args);
    },
  };
}
