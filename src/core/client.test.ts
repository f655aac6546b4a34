import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { MarketApi } from '../api/market.js';
import { PaymentApi } from '../api/payment.js';
import { ConstructURLError } from '../error/constructUrlError.js';
import { InternalError } from '../error/internalError.js';
import { InvalidHeaderError } from '../error/invalidHeaderError.js';
import { rebaseServiceUrl, WebClient } from './client.js';
import type { WebClientProps } from './types.js';

function createClient(props: WebClientProps = {}): WebClient {
  const [err, client] = WebClient.create({ apiUrl: 'http://api.test/root/', ...props });
  if (err) {
    throw err;
  }

  return client;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('WebClient.create', () => {
  it('uses the local default when nothing is configured', () => {
    vi.stubEnv('MARKETPAY_API_URL', '');

    const [err, client] = WebClient.create();

    expect(err).toBeNull();
    expect(client?.baseUrl.href).toBe('http://127.0.0.1:7465/');
    expect(client?.timeout).toBeUndefined();
  });

  it('reads the root URL from the environment', () => {
    vi.stubEnv('MARKETPAY_API_URL', 'http://env.test:9000/');

    const [, client] = WebClient.create();

    expect(client?.baseUrl.href).toBe('http://env.test:9000/');
  });

  it('prefers an explicit URL over the environment', () => {
    vi.stubEnv('MARKETPAY_API_URL', 'http://env.test:9000/');

    const [, client] = WebClient.create({ apiUrl: new URL('http://explicit.test/') });

    expect(client?.baseUrl.href).toBe('http://explicit.test/');
  });

  it('fails on a malformed URL', () => {
    const [err, client] = WebClient.create({ apiUrl: 'not a url' });

    expect(client).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
  });

  it('fails on a malformed header', () => {
    const [err] = WebClient.create({ headers: { 'X Trace': '1' } });

    expect(err).toBeInstanceOf(InvalidHeaderError);
  });

  it('fails on a timeout that is not a positive number', () => {
    const [err] = WebClient.create({ timeout: -1 });

    expect(err).toBeInstanceOf(InternalError);
    expect(err?.message).toBe(
      'internal client error: timeout must be greater than 0 and at most 2147483647 milliseconds, got -1',
    );
  });

  it('fails on a timeout longer than a timer can wait', () => {
    const [err, client] = WebClient.create({ timeout: 2_147_483_648 });

    expect(client).toBeNull();
    expect(err).toBeInstanceOf(InternalError);
    expect(err?.message).toBe(
      'internal client error: timeout must be greater than 0 and at most 2147483647 milliseconds, got 2147483648',
    );
  });

  it('accepts the longest timeout a timer can wait', () => {
    expect(createClient({ timeout: 2_147_483_647 }).timeout).toBe(2147483647);
  });

  it('keeps a valid timeout', () => {
    expect(createClient({ timeout: 2500 }).timeout).toBe(2500);
  });
});

describe('headers', () => {
  it('accepts JSON by default', () => {
    expect(createClient().headers.get('accept')).toBe('application/json');
  });

  it('authorizes with a bearer token', () => {
    vi.stubEnv('MARKETPAY_API_URL', '');

    const [, client] = WebClient.withToken('test-token');

    expect(client?.headers.get('authorization')).toBe('Bearer test-token');
    expect(client?.baseUrl.href).toBe('http://127.0.0.1:7465/');
  });

  it('lets auth win over an extra Authorization header', () => {
    const client = createClient({
      headers: { Authorization: 'Basic other', 'X-Trace': 'abc' },
      auth: { type: 'bearer', token: 'test-token' },
    });

    expect(client.headers.get('authorization')).toBe('Bearer test-token');
    expect(client.headers.get('x-trace')).toBe('abc');
  });

  it('removes a default header set to null', () => {
    expect(createClient({ headers: { Accept: null } }).headers.has('accept')).toBe(false);
  });

  it('hands out copies', () => {
    const client = createClient();
    client.headers.set('X-Mutated', '1');
    client.baseUrl.pathname = '/elsewhere/';

    expect(client.headers.has('x-mutated')).toBe(false);
    expect(client.baseUrl.href).toBe('http://api.test/root/');
  });
});

describe('url', () => {
  it('joins a relative path onto the base', () => {
    const [, url] = createClient().url('offers/sub-1?x=1');

    expect(url?.href).toBe('http://api.test/root/offers/sub-1?x=1');
  });

  it('resolves a leading slash against the origin', () => {
    const [, url] = createClient().url('/offers');

    expect(url?.href).toBe('http://api.test/offers');
  });

  it('replaces the last segment of a base without trailing slash', () => {
    const [, url] = createClient({ apiUrl: 'http://api.test/root' }).url('offers');

    expect(url?.href).toBe('http://api.test/offers');
  });
});

describe('requests', () => {
  it('creates a request per verb', () => {
    const client = createClient();

    expect(client.get('a').send().method).toBe('GET');
    expect(client.post('a').send().method).toBe('POST');
    expect(client.put('a').send().method).toBe('PUT');
    expect(client.delete('a').send().method).toBe('DELETE');
    expect(client.request('GET', 'a').send().url).toBe('http://api.test/root/a');
  });
});

describe('rebaseServiceUrl', () => {
  it('joins the sub-API suffix onto the base', () => {
    const [, url] = rebaseServiceUrl(MarketApi, new URL('http://api.test/root/'), {});

    expect(url?.href).toBe('http://api.test/root/market-api/v1/');
  });

  it('prefers the sub-API environment variable', () => {
    const [, url] = rebaseServiceUrl(PaymentApi, new URL('http://api.test/root/'), {
      MARKETPAY_PAYMENT_URL: 'http://payments.test/v9/',
    });

    expect(url?.href).toBe('http://payments.test/v9/');
  });
});

describe('interface', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it('binds a sub-API under the root URL', () => {
    vi.stubEnv('MARKETPAY_MARKET_URL', '');

    const [err, market] = createClient().interface(MarketApi);

    expect(err).toBeNull();
    expect(market).toBeInstanceOf(MarketApi);
    expect(market?.baseUrl.href).toBe('http://api.test/root/market-api/v1/');
  });

  it('binds a sub-API at its environment override', () => {
    vi.stubEnv('MARKETPAY_MARKET_URL', 'http://market.test/');

    const [, market] = createClient().interface(MarketApi);

    expect(market?.baseUrl.href).toBe('http://market.test/');
  });

  it('binds a sub-API at an explicit URL', () => {
    vi.stubEnv('MARKETPAY_PAYMENT_URL', 'http://payments.test/');

    const [, payment] = createClient().interfaceAt(PaymentApi, 'http://explicit.test/pay/');

    expect(payment?.baseUrl.href).toBe('http://explicit.test/pay/');
  });

  it('fails on a malformed sub-API URL', () => {
    const [err] = createClient().interfaceAt(PaymentApi, 'nope');

    expect(err).toBeInstanceOf(ConstructURLError);
  });

  it('shares headers and timeout with the sub-API', async () => {
    vi.stubEnv('MARKETPAY_MARKET_URL', '');
    fetchMock.mockResolvedValueOnce(new Response('"sub-1"', { status: 200 }));

    const [, market] = createClient({ auth: { type: 'bearer', token: 'test-token' }, timeout: 1000 }).interface(
      MarketApi,
    );
    const result = await market?.subscribeOffer({ properties: {}, constraints: '' });

    expect(result).toEqual([null, 'sub-1']);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-token');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('works for any class with the sub-API statics', async () => {
    class StatusApi {
      static readonly API_URL_ENV_VAR = 'MARKETPAY_STATUS_URL';
      static readonly API_SUFFIX = 'status/';

      #client: WebClient;

      constructor(client: WebClient) {
        this.#client = client;
      }

      ping() {
        return this.#client.get('ping').send().json(z.literal('pong'));
      }
    }
    fetchMock.mockResolvedValueOnce(new Response('"pong"', { status: 200 }));

    const [, status] = createClient().interface(StatusApi);

    expect(await status?.ping()).toEqual([null, 'pong']);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://api.test/root/status/ping');
  });
});
