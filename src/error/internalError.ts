import { isErrorType } from './isErrorType.js';

/**
 * Application-level error raised outside the HTTP layer.
 */
export class InternalError extends Error {
  /** InternalError error-name */
  name = 'InternalError';

  constructor(message: string, opts?: ErrorOptions) {
    super(`internal client error: ${message}`, opts);
  }
}

/**
 * Type guard for {@link InternalError}.
 */
export function isInternalError(error: unknown): error is InternalError {
  return isErrorType(InternalError, error);
}
