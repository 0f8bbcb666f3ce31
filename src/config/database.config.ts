/**
 * Database Connection Pool Configuration
 *
 * Settings passed to the pg Pool alongside the connection string and
 * pool size from AppConfig.
 * See: https://node-postgres.com/apis/pool
 */
export const DATABASE_POOL_CONFIG = {
  /**
   * Idle connection timeout (5 minutes)
   * Connections idle for longer are closed and the pool shrinks.
   */
  idleTimeoutMillis: 300_000,

  /**
   * Connection acquisition timeout (10 seconds)
   * A request waiting longer than this for a free connection fails.
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Recycle a connection after this many queries
   */
  maxUses: 7_500,

  /**
   * Per-statement timeout applied to every new connection
   */
  statementTimeoutMillis: 10_000,
} as const;
