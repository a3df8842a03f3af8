/**
 * Shared pino logger. Fastify builds its request logger from the
 * same options, so both write one format at one level.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { getConfig } from '../config';

export function loggerOptions(): LoggerOptions {
  const { LOG_LEVEL, NODE_ENV } = getConfig();
  const options: LoggerOptions = { level: LOG_LEVEL };

  // pretty output only for a developer terminal
  if (NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }
  return options;
}

let root: Logger | null = null;

export function getLogger(): Logger {
  if (!root) {
    root = pino(loggerOptions());
  }
  return root;
}

/** Child logger tagged with the emitting module. */
export function moduleLogger(module: string): Logger {
  return getLogger().child({ module });
}
