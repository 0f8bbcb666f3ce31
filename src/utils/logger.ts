import pino from 'pino';
import { LoggingConfig } from '@/config/appConfig';

/**
 * Root pino logger configured from AppConfig
 * In development: Pretty-printed for human readability
 * Elsewhere: JSON format for log aggregation systems
 */
export function createRootLogger(config: LoggingConfig): pino.Logger {
  return pino({
    level: config.level,
    transport: config.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
