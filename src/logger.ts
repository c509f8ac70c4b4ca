import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

/**
 * Create the process logger from configuration
 */
export function createLogger(config: Pick<AppConfig, 'stage' | 'log'>): Logger {
  return pino({
    level: config.log.level,
    base: {
      stage: config.stage,
      service: 'council-brief'
    },
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.log.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname'
        }
      }
    })
  });
}

/** Logger that drops everything; used by tests and dry runs. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
