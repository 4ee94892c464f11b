import type { LoggerOptions } from 'pino';
import type { Config } from '../config';

// pretty logs in dev, json in prod
export function createLoggerOptions(server: Config['server']): LoggerOptions {
  return {
    level: server.logLevel,
    transport: !server.production
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };
}
