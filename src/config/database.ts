import { readFileSync } from 'fs';
import { join } from 'path';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { AppConfig } from '@/config/appConfig';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { ILogger } from '@/interfaces/ILogger';

const SCHEMA_PATH = join(__dirname, '../../db/schema.sql');

/**
 * Anything that can run a parameterized SQL statement
 * Repositories depend on this rather than on the pool itself.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}

/**
 * PostgreSQL connection pool
 *
 * Constructed once by the composition root (server.ts) and closed on
 * shutdown. Pool tuning comes from database.config.ts.
 */
export class Database implements Queryable {
  private readonly pool: Pool;

  constructor(
    config: AppConfig['database'],
    private readonly logger: ILogger
  ) {
    this.pool = new Pool({
      connectionString: config.uri,
      // SSL for cloud databases (Neon, AWS RDS, etc.)
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      max: config.maxConnections,
      idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
      maxUses: DATABASE_POOL_CONFIG.maxUses,
      statement_timeout: DATABASE_POOL_CONFIG.statementTimeoutMillis,
    });

    // Let the pool recycle broken idle clients - don't crash the process
    this.pool.on('error', (err) => {
      this.logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
    });
  }

  /**
   * Execute a SQL query with parameters
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);

      this.logger.debug(
        {
          query: text,
          duration: Date.now() - start,
          rows: result.rowCount,
        },
        'Executed SQL query'
      );

      return result;
    } catch (error) {
      this.logger.error(
        {
          error,
          query: text,
          paramCount: params?.length ?? 0,
        },
        'Database query error'
      );
      throw error;
    }
  }

  /**
   * Create the accounts table when it does not exist yet
   */
  async ensureSchema(): Promise<void> {
    await this.query(readFileSync(SCHEMA_PATH, 'utf8'));
    this.logger.info('Database schema ready');
  }

  /**
   * Test database connection
   * Used for startup validation
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query<{ now: Date }>('SELECT NOW() AS now');
      this.logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
      return true;
    } catch (error) {
      this.logger.error({ error }, 'Database connection failed');
      return false;
    }
  }

  /**
   * Close all connections in the pool
   * Called during graceful shutdown
   */
  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}
