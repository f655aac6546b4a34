import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a non-2xx status code.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  name = 'HTTPError';
  /** Status code of the response */
  #status: number;
  /** URL the request was sent to */
  #url: string;
  /** Message extracted from the error body, or the reason it could not be */
  #detail: string;

  /** Creates a new instance of a HTTPError from the response status, request URL and body message */
  constructor(status: number, url: string, detail: string, opts?: ErrorOptions) {
    super(`request for ${url} resulted in HTTP status code: ${status}: ${detail}`, opts);
    this.#status = status;
    this.#url = url;
    this.#detail = detail;
  }

  /** Status code of the response */
  get status(): number {
    return this.#status;
  }

  /** URL the request was sent to */
  get url(): string {
    return this.#url;
  }

  /** Message extracted from the error body */
  get detail(): string {
    return this.#detail;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
