import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('carries status, url and body message', () => {
    const err = new HTTPError(404, 'http://127.0.0.1:7465/payment-api/v1/allocations/a-1', 'allocation not found');

    expect(err.status).toBe(404);
    expect(err.url).toBe('http://127.0.0.1:7465/payment-api/v1/allocations/a-1');
    expect(err.detail).toBe('allocation not found');
    expect(err.name).toBe('HTTPError');
    expect(err.message).toBe(
      'request for http://127.0.0.1:7465/payment-api/v1/allocations/a-1 resulted in HTTP status code: 404: allocation not found',
    );
  });

  it('is recognized directly and through causes', () => {
    const err = new HTTPError(500, 'http://localhost/x', '');

    expect(isHttpError(err)).toBe(true);
    expect(getHttpError(new Error('outer', { cause: err }))).toBe(err);
    expect(isHttpError(new Error('boom'))).toBe(false);
  });
});
