import pino, { BaseLogger, Logger } from 'pino';
import { config } from '../config/env';

/**
 * Logger for code running outside a request (services called from scripts, startup).
 * Inside routes prefer request.log so entries carry the request id.
 */
export const logger: Logger = pino({
  level: config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/** The subset of pino's API the services use; satisfied by both pino and request.log. */
export type ServiceLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
