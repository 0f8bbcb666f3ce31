import { RequestHandler } from 'express';
import { NotFoundError } from '@/errors';

/**
 * 404 handler for routes no router matched
 * Must be registered after all routes
 */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};
