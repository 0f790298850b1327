/* eslint-disable no-console */
import type { Logger } from '@ledgerjob/types';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger writing `[LEVEL] message` lines to stderr, so stdout only ever carries
 * documents. Messages above `level` are dropped.
 */
export function createLogger(level: LogLevel, write: (line: string) => void = (line) => console.error(line)): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit =
    (messageLevel: LogLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(messageLevel) <= threshold) {
        write(`[${messageLevel.toUpperCase()}] ${message}`);
      }
    };

  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
  };
}

export function logLevelFromFlags(flags: { quiet: boolean; verbose: boolean; debug: boolean }): LogLevel {
  if (flags.debug) return 'debug';
  if (flags.verbose) return 'info';
  if (flags.quiet) return 'error';
  return 'warn';
}
