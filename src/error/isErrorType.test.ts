import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { JsonError } from './jsonError.js';
import { PayloadError } from './payloadError.js';

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(JsonError, { message: 'JSON error' })).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(JsonError, new JsonError('JSON error'))).toEqual(true);
  });

  it('expect two layers deep to correctly return true', () => {
    const wrapped = new Error('outer', { cause: new PayloadError('stream closed') });

    expect(isErrorType(PayloadError, wrapped)).toEqual(true);
  });

  it('expect false on a different error type', () => {
    expect(isErrorType(JsonError, new PayloadError('stream closed'))).toEqual(false);
  });

  it('narrows to the given class', () => {
    const err: unknown = new HTTPError(503, 'http://localhost/offers', 'maintenance');

    if (!isErrorType(HTTPError, err)) {
      throw new Error('expected an HTTPError');
    }
    expect(err.status).toBe(503);
    expect(err.detail).toBe('maintenance');
  });
});
