import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { API_URL_ENV_VAR, parseUrl, readEnvVar, restApiUrl } from './env.js';

describe('readEnvVar', () => {
  it('trims the value', () => {
    expect(readEnvVar('URL', { URL: '  http://localhost:8080  ' })).toBe('http://localhost:8080');
  });

  it('reads unset and blank variables as null', () => {
    expect(readEnvVar('URL', {})).toBeNull();
    expect(readEnvVar('URL', { URL: '   ' })).toBeNull();
  });
});

describe('parseUrl', () => {
  it('joins a relative path onto the base', () => {
    const [, url] = parseUrl('offers', new URL('http://localhost:7465/market-api/v1/'));

    expect(url?.href).toBe('http://localhost:7465/market-api/v1/offers');
  });

  it('fails on a malformed URL', () => {
    const [err, url] = parseUrl('not a url');

    expect(url).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.message).toBe('invalid URL: not a url');
    expect(err?.url).toBe('not a url');
  });
});

describe('restApiUrl', () => {
  it('falls back to the local default', () => {
    const [, url] = restApiUrl({});

    expect(url?.href).toBe('http://127.0.0.1:7465/');
  });

  it('prefers the environment variable', () => {
    const [, url] = restApiUrl({ [API_URL_ENV_VAR]: 'http://api.test:8080/root/' });

    expect(url?.href).toBe('http://api.test:8080/root/');
  });

  it('fails on a malformed environment variable', () => {
    const [err] = restApiUrl({ [API_URL_ENV_VAR]: 'http//missing-colon' });

    expect(err).toBeInstanceOf(ConstructURLError);
  });
});
