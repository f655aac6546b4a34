import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold,
 * or when the server answers `408 Request Timeout`.
 *
 * The two cases stay apart through {@link TimeoutError.status}: it is `408`
 * for the response case and `null` when the client gave up waiting.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** URL of the timed out request */
  #url: string;
  /** HTTP status when the timeout came from a response */
  #status: number | null;

  /** Creates a new instance of a TimeoutError for the given request URL */
  constructor(url: string, message: string, status: number | null = null, opts?: ErrorOptions) {
    super(`timeout requesting ${url}: ${message}`, opts);
    this.#url = url;
    this.#status = status;
  }

  /** URL of the timed out request */
  get url(): string {
    return this.#url;
  }

  /** `408` when the server reported the timeout, `null` for a client-side timeout */
  get status(): number | null {
    return this.#status;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
