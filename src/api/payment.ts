import { z } from 'zod';
import type { WebClient } from '../core/client.js';
import type { ClientError } from '../error/clientError.js';
import { type Allocation, AllocationSchema, encodeNewAllocation, type NewAllocation } from '../models/payment/allocation.js';
import { type InvoiceEvent, InvoiceEventSchema } from '../models/payment/invoiceEvent.js';
import type { Timestamp } from '../models/timestamp.js';
import { defaultOnTimeout } from '../utils/defaultOnTimeout.js';
import { urlFormat } from '../utils/urlFormat.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Filters for {@link PaymentApi.getInvoiceEvents}. */
export interface InvoiceEventsQuery {
  /** Seconds the server may wait for new events before answering. */
  timeout?: number;
  /** Only events after this instant. */
  afterTimestamp?: Date | Timestamp;
  /** At most this many events. */
  maxEvents?: number;
}

/**
 * Bindings for the payment API: allocations and invoice events.
 */
export class PaymentApi {
  static readonly API_URL_ENV_VAR = 'MARKETPAY_PAYMENT_URL';
  static readonly API_SUFFIX = 'payment-api/v1/';

  #client: WebClient;

  constructor(client: WebClient) {
    this.#client = client;
  }

  /** Base URL the bindings are rooted at. */
  get baseUrl(): URL {
    return this.#client.baseUrl;
  }

  createAllocation(allocation: NewAllocation): SafeWrapAsync<ClientError, Allocation> {
    return this.#client.post('allocations').sendJson(encodeNewAllocation(allocation)).json(AllocationSchema);
  }

  getAllocations(): SafeWrapAsync<ClientError, Allocation[]> {
    return this.#client.get('allocations').send().json(z.array(AllocationSchema));
  }

  async getAllocation(allocationId: string): SafeWrapAsync<ClientError, Allocation> {
    const [errUrl, url] = urlFormat('allocations/{allocationId}', { allocationId });
    if (errUrl) {
      return [errUrl, null];
    }

    return this.#client.get(url).send().json(AllocationSchema);
  }

  /** Releases the unspent part of an allocation. Resolves to the server's (usually empty) answer. */
  async releaseAllocation(allocationId: string): SafeWrapAsync<ClientError, unknown> {
    const [errUrl, url] = urlFormat('allocations/{allocationId}', { allocationId });
    if (errUrl) {
      return [errUrl, null];
    }

    return this.#client.delete(url).send().json();
  }

  /**
   * Polls invoice events. A timeout, on either side, is an empty batch rather than an error.
   */
  async getInvoiceEvents({ timeout, afterTimestamp, maxEvents }: InvoiceEventsQuery = {}): SafeWrapAsync<
    ClientError,
    InvoiceEvent[]
  > {
    const [errUrl, url] = urlFormat('invoiceEvents', {}, { timeout, afterTimestamp, maxEvents });
    if (errUrl) {
      return [errUrl, null];
    }

    const result = await this.#client.get(url).send().json(z.array(InvoiceEventSchema));
    return defaultOnTimeout(result, () => []);
  }
}
