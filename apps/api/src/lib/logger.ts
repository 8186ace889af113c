/**
 * API Logging
 *
 * The process logger and the options Fastify builds its request logger
 * from. Both share the formatting of the package loggers.
 */

import type { pino } from 'pino';
import { createLogger, loggerOptions } from '@relayarr/utils';
import type { Config } from '../config/index.js';

export const logger = createLogger({ component: 'api' });

export function serverLoggerOptions(config: Pick<Config, 'logLevel' | 'nodeEnv'>): pino.LoggerOptions {
  return {
    ...loggerOptions,
    level: config.logLevel,
    base: {
      service: 'relayarr-api',
      env: config.nodeEnv,
    },
  };
}
