import { z } from 'zod';
import type { WebClient } from '../core/client.js';
import type { ClientError } from '../error/clientError.js';
import type { NewDemand, NewOffer, NewProposal } from '../models/market/demandOfferBase.js';
import { urlFormat } from '../utils/urlFormat.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Subscription and proposal ids come back as bare JSON strings. */
const idSchema = z.string();

/**
 * Bindings for the market API: publishing Offers and Demands and
 * answering Proposals.
 */
export class MarketApi {
  static readonly API_URL_ENV_VAR = 'MARKETPAY_MARKET_URL';
  static readonly API_SUFFIX = 'market-api/v1/';

  #client: WebClient;

  constructor(client: WebClient) {
    this.#client = client;
  }

  /** Base URL the bindings are rooted at. */
  get baseUrl(): URL {
    return this.#client.baseUrl;
  }

  /** Publishes an Offer; resolves to its subscription id. */
  subscribeOffer(offer: NewOffer): SafeWrapAsync<ClientError, string> {
    return this.#client.post('offers').sendJson(offer).json(idSchema);
  }

  /** Withdraws an Offer. */
  async unsubscribeOffer(subscriptionId: string): SafeWrapAsync<ClientError, string> {
    const [errUrl, url] = urlFormat('offers/{subscriptionId}', { subscriptionId });
    if (errUrl) {
      return [errUrl, null];
    }

    return this.#client.delete(url).send().json(idSchema);
  }

  /** Publishes a Demand; resolves to its subscription id. */
  subscribeDemand(demand: NewDemand): SafeWrapAsync<ClientError, string> {
    return this.#client.post('demands').sendJson(demand).json(idSchema);
  }

  /** Withdraws a Demand. */
  async unsubscribeDemand(subscriptionId: string): SafeWrapAsync<ClientError, string> {
    const [errUrl, url] = urlFormat('demands/{subscriptionId}', { subscriptionId });
    if (errUrl) {
      return [errUrl, null];
    }

    return this.#client.delete(url).send().json(idSchema);
  }

  /** Answers a Proposal with a counter-Proposal; resolves to the new proposal id. */
  async counterProposal(
    subscriptionId: string,
    proposalId: string,
    proposal: NewProposal,
  ): SafeWrapAsync<ClientError, string> {
    const [errUrl, url] = urlFormat('demands/{subscriptionId}/proposals/{proposalId}', {
      subscriptionId,
      proposalId,
    });
    if (errUrl) {
      return [errUrl, null];
    }

    return this.#client.post(url).sendJson(proposal).json(idSchema);
  }
}
