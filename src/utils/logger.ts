import { pino, destination, type Logger } from 'pino';
import { config, type Config } from '../config.js';

/** stdout carries command output, so log lines go to stderr. */
export const LOG_FD = 2;

export function createLogger(env: Pick<Config, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  const options = { name: 'sportsbook-markets', level: env.LOG_LEVEL };
  if (env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: LOG_FD } },
    });
  }
  return pino(options, destination({ dest: LOG_FD, sync: true }));
}

export const logger = createLogger(config);
