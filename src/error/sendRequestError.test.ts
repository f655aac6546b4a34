import { describe, expect, it } from 'vitest';
import { getSendRequestError, isSendRequestError, SendRequestError } from './sendRequestError.js';

describe('SendRequestError', () => {
  it('names the url and keeps the cause', () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:7465');
    const err = new SendRequestError('http://127.0.0.1:7465/offers', 'fetch failed', { cause });

    expect(err.url).toBe('http://127.0.0.1:7465/offers');
    expect(err.message).toBe('error requesting http://127.0.0.1:7465/offers: fetch failed');
    expect(err.cause).toBe(cause);
  });

  it('is found through causes', () => {
    const err = new SendRequestError('http://localhost', 'fetch failed');

    expect(isSendRequestError(new Error('outer', { cause: err }))).toBe(true);
    expect(getSendRequestError(new Error('outer'))).toBeNull();
  });
});
