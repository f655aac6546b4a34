import { isErrorType } from './isErrorType.js';

/** Which half of the header was rejected. */
export type HeaderPart = 'name' | 'value';

/**
 * Error raised when a configured header has an illegal name or value.
 */
export class InvalidHeaderError extends Error {
  /** InvalidHeaderError error-name */
  name = 'InvalidHeaderError';
  /** Name of the offending header */
  #header: string;
  /** Whether the name or the value was rejected */
  #part: HeaderPart;

  /** Creates a new instance of an InvalidHeaderError for the given header */
  constructor(header: string, part: HeaderPart, opts?: ErrorOptions) {
    super(`invalid header ${part}: ${JSON.stringify(header)}`, opts);
    this.#header = header;
    this.#part = part;
  }

  /** Name of the offending header */
  get header(): string {
    return this.#header;
  }

  /** Whether the name or the value was rejected */
  get part(): HeaderPart {
    return this.#part;
  }
}

/**
 * Type guard for {@link InvalidHeaderError}.
 */
export function isInvalidHeaderError(error: unknown): error is InvalidHeaderError {
  return isErrorType(InvalidHeaderError, error);
}
