/**
 * pino-based structured logging.
 *
 * One root logger per process; components take named children so every
 * line carries where it came from.
 */

import { pino } from 'pino';
import type { LogLevel } from './config.js';

export type Logger = pino.Logger;

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Human-readable output through pino-pretty (stderr) */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    name: options.name ?? 'taskdeck',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions);
}

/** A logger that drops everything. For tests and library callers without one. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
