import { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from '@/config/appConfig';
import { createPostgresContext } from '@/config/dependencies';
import { LoggerFactory } from '@/adapters/logging/LoggerFactory';

/**
 * Server Entry Point
 * Builds the AppContext, starts the Express server and handles graceful shutdown
 */

const config = loadConfig();
const loggerFactory = LoggerFactory.fromConfig(config.logging);
const logger = loggerFactory.createLogger('Server');
const { context, database } = createPostgresContext(config, loggerFactory);

let server: Server | undefined;

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    logger.info('Testing database connection...');
    const dbConnected = await database.testConnection();

    if (!dbConnected) {
      logger.fatal('Failed to connect to database. Exiting...');
      process.exit(1);
    }

    await database.ensureSchema();

    const app = createApp(context);
    const httpServer = app.listen(config.port, () => {
      logger.info(
        {
          port: config.port,
          env: config.nodeEnv,
        },
        `${config.service.name} ${config.service.version} listening on port ${config.port}`
      );
    });

    httpServer.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal(`Port ${config.port} is already in use`);
      } else {
        logger.fatal({ error }, 'Server error');
      }
      process.exit(1);
    });

    server = httpServer;
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }
}

async function closeDatabase(): Promise<void> {
  try {
    await database.close();
  } catch (error) {
    logger.error({ error }, 'Error closing database connections');
  }
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    void closeDatabase().then(() => process.exit(0));
    return;
  }

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed');

    void closeDatabase().then(() => {
      logger.info('Graceful shutdown complete');
      process.exit(0);
    });
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

/**
 * Process event handlers
 */
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

void startServer();
