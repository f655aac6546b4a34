import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the request could not be sent or no response arrived
 * (DNS, refused connection, reset socket, ...).
 */
export class SendRequestError extends Error {
  /** SendRequestError error-name */
  name = 'SendRequestError';
  /** URL the request was sent to */
  #url: string;

  /** Creates a new instance of a SendRequestError for the given request URL */
  constructor(url: string, message: string, opts?: ErrorOptions) {
    super(`error requesting ${url}: ${message}`, opts);
    this.#url = url;
  }

  /** URL the request was sent to */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link SendRequestError}.
 */
export function isSendRequestError(error: unknown): error is SendRequestError {
  return isErrorType(SendRequestError, error);
}

/**
 * Extract a {@link SendRequestError} from an unknown error value, following nested causes.
 */
export function getSendRequestError(error: unknown): null | SendRequestError {
  return unwrapErrorType(SendRequestError, error);
}
