/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development. The logger is built from the AppConfig and registered in the
 * container, so services receive it by injection and tests can hand in a
 * silent one.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly.
 */
import pino from 'pino';

import type { AppConfig } from './config';

export function createLogger(config: Pick<AppConfig, 'log' | 'isDev'>): pino.Logger {
  return pino({
    level: config.log.level,
    transport: config.isDev
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

export type Logger = pino.Logger;
