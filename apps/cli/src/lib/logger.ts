import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const createLoggerOptions = (level: LogLevel): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** Diagnostics go to stderr; stdout is reserved for command output. */
export function createLogger(level: LogLevel): Logger {
  return pino(createLoggerOptions(level), pino.destination({ dest: 2, sync: true }));
}
