import { AppError } from './AppError';

/**
 * Unsupported Media Type Error (415)
 */
export class UnsupportedMediaTypeError extends AppError {
  constructor(mediaType: string) {
    super(`Content-Type must be ${mediaType}`, 415);
    Object.setPrototypeOf(this, UnsupportedMediaTypeError.prototype);
  }
}
