import { consoleLogger, createLevelLogger, silentLogger, type Logger } from '../types/logger.js';

/**
 * Debug output is enabled the same way as in most Node tooling:
 * `DEBUG=pagelens` (or a bare `DEBUG=*`) turns on the console logger at debug level.
 * DEBUG is a comma or space separated list; other namespaces are ignored.
 */
export function detectLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const namespaces = (env.DEBUG || '').split(/[\s,]+/);
  if (namespaces.some((ns) => ns === '*' || ns === 'pagelens' || ns.startsWith('pagelens:'))) {
    return createLevelLogger(consoleLogger, 'debug');
  }
  return silentLogger;
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = detectLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger | null) {
  globalLogger = logger;
}

/**
 * Per-call override wins over the global default
 */
export function resolveLogger(logger?: Logger): Logger {
  return logger ?? getLogger();
}

/**
 * Format milliseconds the way request traces print them
 */
export function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(2)}s`;
}
