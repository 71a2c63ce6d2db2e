/**
 * Leveled logging on top of the console, with an optional log file.
 */

import { appendFileSync, closeSync, openSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger that forwards to `console` and drops messages below `level`.
 * Debug and info go to `console.error` so they never mix with rendered output
 * on stdout.
 */
function isEnabled(messageLevel: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level];
}

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (messageLevel: LogLevel) => isEnabled(messageLevel, level);

  return Object.freeze({
    debug(message: string) {
      if (enabled('debug')) console.error(`DEBUG: ${message}`);
    },
    info(message: string) {
      if (enabled('info')) console.error(`INFO: ${message}`);
    },
    warn(message: string) {
      if (enabled('warn')) console.warn(`WARNING: ${message}`);
    },
    error(message: string) {
      if (enabled('error')) console.error(`ERROR: ${message}`);
    },
  });
}

export interface FileLoggerOptions {
  level?: LogLevel;
  /** Clock used for line timestamps */
  now?: () => Date;
}

/**
 * Create a logger that appends `[timestamp] LEVEL: message` lines to `path`.
 *
 * @throws Error if the file cannot be opened for appending
 */
export function createFileLogger(path: string, options: FileLoggerOptions = {}): Logger {
  const level = options.level ?? 'debug';
  const now = options.now ?? (() => new Date());
  closeSync(openSync(path, 'a'));

  const write = (messageLevel: LogLevel, label: string, message: string) => {
    if (isEnabled(messageLevel, level)) {
      appendFileSync(path, `[${now().toISOString()}] ${label}: ${message}\n`);
    }
  };

  return Object.freeze({
    debug: (message: string) => write('debug', 'DEBUG', message),
    info: (message: string) => write('info', 'INFO', message),
    warn: (message: string) => write('warn', 'WARNING', message),
    error: (message: string) => write('error', 'ERROR', message),
  });
}

/**
 * Send every message to each of `loggers`, in order.
 */
export function combineLoggers(...loggers: Logger[]): Logger {
  return Object.freeze({
    debug: (message: string) => loggers.forEach(l => l.debug(message)),
    info: (message: string) => loggers.forEach(l => l.info(message)),
    warn: (message: string) => loggers.forEach(l => l.warn(message)),
    error: (message: string) => loggers.forEach(l => l.error(message)),
  });
}

/**
 * Shared default used when a caller passes no logger.
 */
export const defaultLogger: Logger = createConsoleLogger('info');

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}
