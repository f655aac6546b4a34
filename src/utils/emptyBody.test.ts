import { describe, expect, it } from 'vitest';
import { emptyBody, isEmptyBody } from './emptyBody.js';

describe('emptyBody', () => {
  it('names the status of the empty response', () => {
    expect(emptyBody(204)).toBe('[ EMPTY BODY (http: 204) ]');
  });

  it('is recognized by isEmptyBody', () => {
    expect(isEmptyBody(emptyBody(200))).toBe(true);
    expect(isEmptyBody('sub-1')).toBe(false);
    expect(isEmptyBody(null)).toBe(false);
  });
});
