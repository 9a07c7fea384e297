import pino from 'pino';
import { config } from '../config';

const pretty = config.env !== 'production' && config.env !== 'test';

/** Shared by the service logger and Fastify's request logger. */
export const loggerOptions: pino.LoggerOptions = {
  level: config.logLevel,
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

export const logger = pino(loggerOptions);

export function moduleLogger(module: string) {
  return logger.child({ module });
}
