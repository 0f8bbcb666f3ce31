import { FieldError, ValidationError } from './ValidationError';

/**
 * Data Validation Error (400 Bad Request)
 * Thrown by deserializeAccount when the payload is not a mapping or has
 * missing or invalid attributes
 */
export class DataValidationError extends ValidationError {
  constructor(message: string, errors: FieldError[] = []) {
    super(message, errors);
    Object.setPrototypeOf(this, DataValidationError.prototype);
  }
}
