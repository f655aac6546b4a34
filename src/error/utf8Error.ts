import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a response body is not valid UTF-8.
 */
export class Utf8Error extends Error {
  /** Utf8Error error-name */
  name = 'Utf8Error';
}

/**
 * Type guard for {@link Utf8Error}.
 */
export function isUtf8Error(error: unknown): error is Utf8Error {
  return isErrorType(Utf8Error, error);
}
