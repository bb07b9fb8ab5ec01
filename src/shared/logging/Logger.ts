/**
 * Application logger based on pino.
 * Structured JSON logs in production, pretty output in development,
 * silent under test unless LOG_LEVEL says otherwise.
 */
import pino, { Logger as PinoLogger } from 'pino';
import { config } from '../config/Config';

export type AppLogger = PinoLogger;

function defaultLevel(): string {
  switch (config.env) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

export const logger: AppLogger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  base: {
    service: config.serviceName,
    version: config.serviceVersion,
    env: config.env,
  },
  transport:
    config.env === 'development'
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
