/**
 * Categorized console logger.
 *
 * Every message is prefixed with its category (`[sync] ...`) and filtered by a
 * single process-wide level taken from configuration.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(category: string): Logger {
  const prefix = `[${category}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
