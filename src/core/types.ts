import type { HeaderOptions } from '../utils/headers.js';
import type { WebClient } from './client.js';

/** HTTP methods the REST bindings use. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Credentials attached to every request of a client. */
export type WebAuth = { type: 'bearer'; token: string };

/** Options accepted by {@link WebClient.create}. Every field is optional. */
export interface WebClientProps {
  /**
   * Root API URL.
   * @default `MARKETPAY_API_URL`, or `http://127.0.0.1:7465` when unset
   */
  apiUrl?: string | URL;
  /** Authorization sent with every request. */
  auth?: WebAuth;
  /** Extra headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, covering both the response and its body.
   * No timeout when unset.
   */
  timeout?: number;
}

/**
 * A sub-API reachable from a {@link WebClient}, e.g. the market or payment API.
 *
 * Implemented by a class: the statics name where the sub-API lives, the
 * constructor receives a client already rebased onto it.
 */
export interface WebInterface<T> {
  /** Environment variable that, when set, is the sub-API's full base URL. */
  readonly API_URL_ENV_VAR: string;
  /** Path joined onto the root API URL otherwise, e.g. `market-api/v1/`. */
  readonly API_SUFFIX: string;
  new (client: WebClient): T;
}
