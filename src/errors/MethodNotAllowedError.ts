import { AppError } from './AppError';

/**
 * Method Not Allowed Error (405)
 * Thrown when a known path is requested with an unsupported method
 */
export class MethodNotAllowedError extends AppError {
  public readonly allowed: string[];

  constructor(method: string, path: string, allowed: string[]) {
    super(`Method ${method} not allowed on ${path}`, 405);
    this.allowed = allowed;
    Object.setPrototypeOf(this, MethodNotAllowedError.prototype);
  }
}
