import { RequestHandler } from 'express';
import { MethodNotAllowedError } from '@/errors';

/**
 * Terminal handler for a route's remaining methods
 *
 * Mount with router.route(path).get(...).post(...).all(methodNotAllowed([...]))
 * so any method without a handler answers 405 with an Allow header.
 */
export function methodNotAllowed(allowed: string[]): RequestHandler {
  const allowHeader = allowed.join(', ');

  return (req, res, next) => {
    res.set('Allow', allowHeader);
    next(new MethodNotAllowedError(req.method, `${req.baseUrl}${req.path}`, allowed));
  };
}
