/** Any error constructor, regardless of its parameter list. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
