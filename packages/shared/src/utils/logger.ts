/**
 * Logger factory for flaky-rerun
 *
 * Wraps pino so every package logs structured JSON under a namespace, with
 * pretty output while developing locally.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

/**
 * Creates a logger instance for the given namespace
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';

  return pino({
    name: namespace,
    level,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'HH:MM:ss Z',
          },
        }
      : undefined,
  });
}

/**
 * Default logger for general use
 */
export const logger = createLogger('flaky-rerun');
