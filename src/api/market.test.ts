import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebClient } from '../core/client.js';
import { HTTPError } from '../error/httpError.js';
import { createDemandOfferBase } from '../models/market/demandOfferBase.js';
import { MarketApi } from './market.js';

function createMarket(): MarketApi {
  const [errClient, client] = WebClient.create({ apiUrl: 'http://api.test/', auth: { type: 'bearer', token: 'test-token' } });
  if (errClient) {
    throw errClient;
  }

  const [err, market] = client.interfaceAt(MarketApi, 'http://api.test/market-api/v1/');
  if (err) {
    throw err;
  }

  return market;
}

const offer = createDemandOfferBase({ 'node.runtime.name': 'vm', 'node.cpu.cores': 2 }, '(node.mem.gib>=4)');

describe('MarketApi', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it('subscribes an offer', async () => {
    fetchMock.mockResolvedValueOnce(new Response('"sub-1"', { status: 201 }));

    const [err, id] = await createMarket().subscribeOffer(offer);

    expect(err).toBeNull();
    expect(id).toBe('sub-1');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://api.test/market-api/v1/offers');
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(
      '{"properties":{"node.runtime.name":"vm","node.cpu.cores":2},"constraints":"(node.mem.gib>=4)"}',
    );
  });

  it('unsubscribes an offer', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const [err, answer] = await createMarket().unsubscribeOffer('sub-1');

    expect(err).toBeNull();
    expect(answer).toBe('[ EMPTY BODY (http: 204) ]');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://api.test/market-api/v1/offers/sub-1');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('DELETE');
  });

  it('subscribes and unsubscribes a demand', async () => {
    fetchMock.mockResolvedValueOnce(new Response('"dem-1"', { status: 201 }));
    fetchMock.mockResolvedValueOnce(new Response('"dem-1"', { status: 200 }));
    const market = createMarket();

    expect(await market.subscribeDemand(offer)).toEqual([null, 'dem-1']);
    expect(await market.unsubscribeDemand('dem-1')).toEqual([null, 'dem-1']);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://api.test/market-api/v1/demands');
    expect(fetchMock.mock.calls[1]?.[0]).toBe('http://api.test/market-api/v1/demands/dem-1');
  });

  it('counters a proposal', async () => {
    fetchMock.mockResolvedValueOnce(new Response('"prop-8"', { status: 201 }));

    const [, id] = await createMarket().counterProposal('dem-1', 'prop-7', offer);

    expect(id).toBe('prop-8');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://api.test/market-api/v1/demands/dem-1/proposals/prop-7');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
  });

  it('passes server errors through', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"message":"subscription expired"}', { status: 404 }));

    const [err] = await createMarket().unsubscribeDemand('dem-9');

    expect(err).toBeInstanceOf(HTTPError);
    expect(err instanceof HTTPError && err.detail).toBe('subscription expired');
  });
});
