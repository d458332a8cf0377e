import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  destination?: pino.DestinationStream;
}

/**
 * JSON logger writing to stderr; stdout is reserved for command output.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: 'trello-card',
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: label => ({ level: label }),
      },
      redact: ['key', 'token', '*.key', '*.token'],
    },
    options.destination ?? pino.destination(2)
  );
}

export const silentLogger: Logger = pino({ level: 'silent' });
