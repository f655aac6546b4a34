import { isErrorType } from './isErrorType.js';

/**
 * Error raised while processing a stream of events (e.g. polled invoice events).
 */
export class EventStreamError extends Error {
  /** EventStreamError error-name */
  name = 'EventStreamError';

  constructor(message: string, opts?: ErrorOptions) {
    super(`event stream error: ${message}`, opts);
  }
}

/**
 * Type guard for {@link EventStreamError}.
 */
export function isEventStreamError(error: unknown): error is EventStreamError {
  return isErrorType(EventStreamError, error);
}
