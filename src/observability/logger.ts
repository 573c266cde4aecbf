import pino from 'pino';

import { config } from '../config';

import { getLogContext } from './log-context';

/**
 * Pino logger
 * - Production: JSON at info level
 * - Development: pretty printed at debug level
 * - Test: silent unless LOG_LEVEL overrides it
 *
 * Lines written inside a request carry its correlation id and whatever
 * subsidy / transaction ids the redemption flow has added to the context.
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'subsidy',
    env: config.nodeEnv,
  },
  mixin: () => ({ ...getLogContext() }),
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export const createServiceLogger = (component: string) => logger.child({ component });
