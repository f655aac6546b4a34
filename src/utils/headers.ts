import { InvalidHeaderError } from '../error/invalidHeaderError.js';
import type { SafeWrap } from './wrap.js';

/** Header options accepted by the client. `null` removes a header set earlier. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

// RFC 9110 token characters
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** Latin-1 text without control characters; tab is the one allowed exception. */
function isValidHeaderValue(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if ((code < 0x20 && code !== 0x09) || code === 0x7f || code > 0xff) {
      return false;
    }
  }

  return true;
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | null | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge header layers into a single `Headers` instance; later layers win.
 *
 * Names and values are checked before they reach `Headers`, so a bad header
 * comes back as an {@link InvalidHeaderError} instead of a `TypeError`.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): SafeWrap<InvalidHeaderError, Headers> {
  const merged = new Headers();

  for (const layer of layers) {
    for (const [name, value] of toEntries(layer)) {
      if (!HEADER_NAME.test(name)) {
        return [new InvalidHeaderError(name, 'name'), null];
      }

      if (value == null) {
        merged.delete(name);
        continue;
      }

      if (!isValidHeaderValue(value)) {
        return [new InvalidHeaderError(name, 'value'), null];
      }

      merged.set(name, value);
    }
  }

  return [null, merged];
}
