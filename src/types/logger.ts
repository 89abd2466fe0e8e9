/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const tables = await scrapeTables(url, { logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const seo = await analyzeSeo(url, { logger: console });
 * ```
 */
export interface Logger {
  /**
   * Debug level logging
   * Called for request tracing and per-extractor summaries
   */
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Info level logging
   */
  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Warn level logging
   */
  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Error level logging
   * Called when the primary page fetch fails
   */
  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console adapter - writes everything to stderr so stdout stays clean for exports
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
  },
  info: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
  },
  warn: (msgOrObj: string | object, ...args: unknown[]) => {
    console.warn(msgOrObj, ...args);
  },
  error: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
  },
};

/**
 * Silent logger - no output
 * Default when DEBUG is not set, and handy in tests
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function pick(logger: Logger, level: LogLevel): Logger['debug'] {
  switch (level) {
    case 'debug':
      return logger.debug.bind(logger);
    case 'info':
      return logger.info.bind(logger);
    case 'warn':
      return logger.warn.bind(logger);
    case 'error':
      return logger.error.bind(logger);
  }
}

function forward(logger: Logger, level: LogLevel, msgOrObj: string | object, args: unknown[]): void {
  const log = pick(logger, level);
  if (typeof msgOrObj === 'string') {
    log(msgOrObj, ...args);
    return;
  }
  const [message, ...rest] = args;
  log(msgOrObj, typeof message === 'string' ? message : undefined, ...rest);
}

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];
  const gated = (level: LogLevel) => (msgOrObj: string | object, ...args: unknown[]) => {
    if (levels[level] >= minLevelNum) {
      forward(baseLogger, level, msgOrObj, args);
    }
  };

  return {
    debug: gated('debug'),
    info: gated('info'),
    warn: gated('warn'),
    error: gated('error'),
  };
}
