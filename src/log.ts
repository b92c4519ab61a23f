import pino from 'pino';
import { getEnv } from './env';

const env = getEnv();

function defaultLevel(): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.NODE_ENV === 'test') {
    return 'silent';
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: defaultLevel(),
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = typeof logger;
