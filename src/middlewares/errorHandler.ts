import { ErrorRequestHandler } from 'express';
import { AppError, FieldError, ValidationError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { NodeEnv } from '@/config/env';

/**
 * Error envelope returned for every failed request
 */
export interface ErrorResponse {
  success: false;
  error: {
    message: string;
    details?: FieldError[];
  };
}

/**
 * Account attributes that identify a person; never written to logs
 */
const SENSITIVE_FIELDS = new Set(['email', 'address', 'phone_number']);

/**
 * Sanitize request body for logging
 * Creates a copy with personal data redacted
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }
  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * Sanitize error messages for production
 *
 * Outside production the full message is returned for debugging.
 * In production, messages mentioning storage or internals are replaced.
 */
export function sanitizeErrorMessage(message: string, nodeEnv: NodeEnv): string {
  if (nodeEnv !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query/i,
    /file|path|directory/i,
    /internal|implementation/i,
    /column|table|constraint/i,
  ];

  if (sensitivePatterns.some((pattern) => pattern.test(message))) {
    return 'An error occurred while processing your request';
  }

  return message;
}

/**
 * Errors raised by express.json() (body-parser) carry a 4xx status and a type
 */
function isBodyParserError(err: unknown): err is Error & { status: number; type?: unknown } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

function bodyParserMessage(err: Error & { type?: unknown }): string {
  switch (err.type) {
    case 'entity.parse.failed':
      return 'Malformed JSON in request body';
    case 'entity.too.large':
      return 'Request body too large';
    default:
      return 'Bad request';
  }
}

/**
 * Global error handler middleware
 * Handles all errors passed to next() or thrown in the application
 */
export function createErrorHandler(logger: ILogger, nodeEnv: NodeEnv): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const error = err instanceof Error ? err : new Error(String(err));
    const status =
      error instanceof AppError
        ? error.statusCode
        : isBodyParserError(error)
          ? error.status
          : 500;

    const logEntry = {
      error: {
        name: error.name,
        message: error.message,
        stack: status >= 500 ? error.stack : undefined,
      },
      request: {
        method: req.method,
        url: req.originalUrl,
        body: sanitizeRequestBody(req.body),
      },
    };

    if (status >= 500) {
      logger.error(logEntry, 'Error occurred');
    } else {
      logger.warn(logEntry, 'Request rejected');
    }

    const body: ErrorResponse = { success: false, error: { message: 'Internal server error' } };

    if (error instanceof AppError) {
      body.error.message = sanitizeErrorMessage(error.message, nodeEnv);

      if (error instanceof ValidationError && error.errors.length > 0) {
        body.error.details = error.errors;
      }
    } else if (isBodyParserError(error)) {
      body.error.message = bodyParserMessage(error);
    }

    res.status(status).json(body);
  };
}
