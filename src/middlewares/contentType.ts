import { RequestHandler } from 'express';
import { UnsupportedMediaTypeError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';

/**
 * Reject requests whose Content-Type is not the given media type
 * Media type parameters such as charset are accepted.
 */
export function requireContentType(mediaType: string, logger: ILogger): RequestHandler {
  return (req, _res, next) => {
    if (req.is(mediaType)) {
      next();
      return;
    }

    logger.warn({ contentType: req.get('Content-Type') ?? null }, 'Invalid Content-Type');
    next(new UnsupportedMediaTypeError(mediaType));
  };
}
