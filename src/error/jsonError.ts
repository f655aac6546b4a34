import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a body is not valid JSON, or a request payload cannot be encoded as JSON.
 */
export class JsonError extends Error {
  /** JsonError error-name */
  name = 'JsonError';
}

/**
 * Type guard for {@link JsonError}.
 */
export function isJsonError(error: unknown): error is JsonError {
  return isErrorType(JsonError, error);
}
