/**
 * Rate Limiting Middleware
 *
 * express-rate-limit with the default in-memory store, keyed by req.ip
 * (which honours X-Forwarded-For only when TRUST_PROXY is on).
 * Returns 429 Too Many Requests when the limit is exceeded.
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { AppConfig } from '@/config/appConfig';
import { ILogger } from '@/interfaces/ILogger';

/**
 * Global rate limiter, applied to every route except /health
 */
export function createRateLimiter(
  config: AppConfig['http']['rateLimit'],
  logger: ILogger
): RateLimitRequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    message: {
      success: false,
      error: {
        message: `Too many requests. Please try again later. Limit: ${config.maxRequests} requests per ${config.windowMs / 1000} seconds.`,
      },
    },
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
    skip: (req) => req.path === '/health',
    handler: (req, res, _next, options) => {
      logger.warn(
        {
          type: 'RATE_LIMIT_EXCEEDED',
          ip: req.ip,
          limit: config.maxRequests,
        },
        'Rate limit exceeded'
      );
      res.status(options.statusCode).json(options.message);
    },
  });
}
