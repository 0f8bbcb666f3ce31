import express, { Application } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { AppContext } from '@/config/dependencies';
import { ILogger } from '@/interfaces/ILogger';
import { createRequestLogger } from '@/middlewares/requestLogger';
import { securityHeaders } from '@/middlewares/securityHeaders';
import { forceHttps } from '@/middlewares/forceHttps';
import { createRateLimiter } from '@/middlewares/rateLimiter';
import { createErrorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { createRoutes } from '@/api/routes';

const OPENAPI_PATH = join(__dirname, '../docs/openapi.yaml');

function loadOpenApiDocument(logger: ILogger): Record<string, unknown> | null {
  try {
    const document: unknown = yaml.load(readFileSync(OPENAPI_PATH, 'utf8'));
    if (document !== null && typeof document === 'object' && !Array.isArray(document)) {
      return { ...document };
    }
    logger.warn({ path: OPENAPI_PATH }, 'OpenAPI document is not a mapping');
  } catch (error) {
    logger.warn({ error }, 'Could not load OpenAPI documentation');
  }
  return null;
}

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers for one AppContext
 */
export function createApp(context: AppContext): Application {
  const { config, loggerFactory } = context;
  const logger = loggerFactory.createLogger('App');

  const app: Application = express();

  // ============================================
  // Middleware Configuration
  // ============================================

  // Only trust X-Forwarded-* from a single reverse proxy hop when configured;
  // req.secure and req.ip depend on it
  if (config.http.trustProxy) {
    app.set('trust proxy', 1);
  }

  // Request logging (pino-http)
  app.use(createRequestLogger(loggerFactory.root));

  // Security headers
  app.use(securityHeaders());

  if (config.http.forceHttps) {
    app.use(forceHttps);
  }

  // CORS - Disabled in production, any origin without credentials elsewhere.
  // OPTIONS continues to the routes so it gets the same 405 in every environment.
  app.use(
    cors({
      origin: config.nodeEnv === 'production' ? false : '*',
      credentials: false,
      preflightContinue: true,
    })
  );

  // Global rate limiting (all routes except /health)
  app.use(createRateLimiter(config.http.rateLimit, logger));

  // JSON body parser with size limit
  app.use(express.json({ limit: config.http.bodyLimit }));

  // ============================================
  // Routes
  // ============================================

  // Swagger API Documentation
  const openApiDocument = loadOpenApiDocument(logger);
  if (openApiDocument) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  }

  app.use('/', createRoutes(context));

  // ============================================
  // Error Handlers
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(createErrorHandler(loggerFactory.createLogger('ErrorHandler'), config.nodeEnv));

  return app;
}
