/**
 * Logger utility using pino
 */

import pino from 'pino';
import { getConfig } from '../config/index.js';

export type Logger = pino.Logger;

let _logger: pino.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();

    const transport = config.logFormat === 'pretty'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            destination: 2,
          },
        }
      : undefined;

    _logger = transport
      ? pino({ level: config.logLevel, transport })
      : pino({ level: config.logLevel }, pino.destination(2));
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
