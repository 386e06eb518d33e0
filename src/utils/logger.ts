/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { Config } from '../config.js';

export type { Logger };

/**
 * Create the process logger. One instance is built at startup and passed to
 * every service and Fastify app.
 */
export function createLogger(config: Pick<Config, 'logLevel' | 'prettyLogs'>): Logger {
  return pino({
    level: config.logLevel.toLowerCase(),
    transport: config.prettyLogs
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
