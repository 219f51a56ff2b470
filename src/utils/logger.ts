// src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

/**
 * Sets the process-wide verbosity. Called once at startup from configuration.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Creates a logger prefixed with the given scope.
 *
 * Everything goes to stderr; stdout is left to the protocol transport.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.error(prefix, message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.error(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}
