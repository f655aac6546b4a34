const EMPTY_BODY_PREFIX = '[ EMPTY BODY (http: ';

/**
 * Value handed to the decoder in place of a body for `204 No Content` and
 * `Content-Length: 0` responses.
 */
export function emptyBody(status: number): string {
  return `${EMPTY_BODY_PREFIX}${status}) ]`;
}

/** Whether a decoded value is the empty-body sentinel. */
export function isEmptyBody(value: unknown): value is string {
  return typeof value === 'string' && value.startsWith(EMPTY_BODY_PREFIX) && value.endsWith(') ]');
}
