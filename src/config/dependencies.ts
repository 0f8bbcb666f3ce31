/**
 * Dependency Container
 *
 * Builds the AppContext handed to createApp(). Concrete implementations
 * are chosen here; everything below receives its collaborators explicitly.
 */

import { AppConfig } from '@/config/appConfig';
import { Database } from '@/config/database';
import { LoggerFactory } from '@/adapters/logging/LoggerFactory';
import { IAccountRepository } from '@/repositories/interfaces';
import { AccountRepository } from '@/repositories/account.repository';
import { AccountService } from '@/services/account.service';

/**
 * Everything a request handler may depend on
 */
export interface AppContext {
  readonly config: AppConfig;
  readonly loggerFactory: LoggerFactory;
  readonly accountService: AccountService;
}

/**
 * Wire an AppContext around any account repository
 */
export function createAppContext(
  config: AppConfig,
  loggerFactory: LoggerFactory,
  accountRepository: IAccountRepository
): AppContext {
  return Object.freeze({
    config,
    loggerFactory,
    accountService: new AccountService(
      accountRepository,
      loggerFactory.createLogger('AccountService')
    ),
  });
}

/**
 * Production wiring: PostgreSQL-backed repository
 * The Database is returned too so the server can test and close it.
 */
export function createPostgresContext(
  config: AppConfig,
  loggerFactory: LoggerFactory
): { context: AppContext; database: Database } {
  const database = new Database(config.database, loggerFactory.createLogger('Database'));
  const context = createAppContext(config, loggerFactory, new AccountRepository(database));

  return { context, database };
}
