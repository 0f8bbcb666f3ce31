/**
 * Logger Factory
 *
 * Owns the root pino instance and hands out named child loggers.
 * One factory is built per AppContext; nothing here is module-global.
 */

import pino from 'pino';
import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { LoggingConfig } from '@/config/appConfig';
import { createRootLogger } from '@/utils/logger';
import { PinoLogger } from './PinoLogger';

export class LoggerFactory implements ILoggerFactory {
  constructor(readonly root: pino.Logger) {}

  static fromConfig(config: LoggingConfig): LoggerFactory {
    return new LoggerFactory(createRootLogger(config));
  }

  createLogger(context?: string): ILogger {
    return new PinoLogger(context ? this.root.child({ name: context }) : this.root);
  }
}
