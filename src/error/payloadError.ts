import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the response body stream fails while being read.
 */
export class PayloadError extends Error {
  /** PayloadError error-name */
  name = 'PayloadError';
}

/**
 * Type guard for {@link PayloadError}.
 */
export function isPayloadError(error: unknown): error is PayloadError {
  return isErrorType(PayloadError, error);
}
