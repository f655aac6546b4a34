import { parseUrl, readEnvVar, restApiUrl } from '../config/env.js';
import type { ClientError } from '../error/clientError.js';
import type { ConstructURLError } from '../error/constructUrlError.js';
import { InternalError } from '../error/internalError.js';
import { mergeHeaderOptions } from '../utils/headers.js';
import { logger } from '../utils/logger.js';
import type { SafeWrap } from '../utils/wrap.js';
import { WebRequest } from './request.js';
import type { HttpMethod, WebAuth, WebClientProps, WebInterface } from './types.js';

/** Longest delay a timer takes; Node fires anything longer after 1ms. */
const MAX_TIMEOUT = 2_147_483_647;

/**
 * Resolves the base URL of a sub-API: its own environment variable when set,
 * otherwise `API_SUFFIX` joined onto `baseUrl`.
 */
export function rebaseServiceUrl<T>(
  api: WebInterface<T>,
  baseUrl: URL,
  env: NodeJS.ProcessEnv = process.env,
): SafeWrap<ConstructURLError, URL> {
  const override = readEnvVar(api.API_URL_ENV_VAR, env);
  if (override !== null) {
    return parseUrl(override);
  }

  return parseUrl(api.API_SUFFIX, baseUrl);
}

function authHeaders(auth?: WebAuth): Record<string, string> {
  if (!auth) {
    return {};
  }

  switch (auth.type) {
    case 'bearer':
      return { Authorization: `Bearer ${auth.token}` };
  }
}

/**
 * Client for the REST API rooted at a base URL.
 *
 * The configuration (base URL, headers, auth, timeout) is fixed at creation,
 * so one client can be shared by any number of concurrent requests.
 *
 * @example
 * const [err, client] = WebClient.withToken('test-token');
 * const [errOffers, id] = await client.post('offers').sendJson(offer).json(z.string());
 */
export class WebClient {
  /** Base URL every relative path is resolved against. */
  #baseUrl: URL;
  /** Headers sent with every request, auth included. */
  #headers: Headers;
  /** Request timeout in milliseconds. */
  #timeout: number | undefined;

  private constructor(baseUrl: URL, headers: Headers, timeout: number | undefined) {
    this.#baseUrl = baseUrl;
    this.#headers = headers;
    this.#timeout = timeout;
  }

  /**
   * Creates a client. Fails on a malformed URL, header or timeout.
   */
  static create({ apiUrl, auth, headers, timeout }: WebClientProps = {}): SafeWrap<ClientError, WebClient> {
    const [errUrl, baseUrl] = apiUrl === undefined ? restApiUrl() : parseUrl(apiUrl.toString());
    if (errUrl) {
      return [errUrl, null];
    }

    const [errHeaders, merged] = mergeHeaderOptions({ Accept: 'application/json' }, headers, authHeaders(auth));
    if (errHeaders) {
      return [errHeaders, null];
    }

    if (timeout !== undefined && !(Number.isFinite(timeout) && timeout > 0 && timeout <= MAX_TIMEOUT)) {
      return [
        new InternalError(`timeout must be greater than 0 and at most ${MAX_TIMEOUT} milliseconds, got ${timeout}`),
        null,
      ];
    }

    return [null, new WebClient(baseUrl, merged, timeout)];
  }

  /** Client for the default API URL, authorized with a bearer token. */
  static withToken(token: string): SafeWrap<ClientError, WebClient> {
    return WebClient.create({ auth: { type: 'bearer', token } });
  }

  /** Base URL of this client (a copy). */
  get baseUrl(): URL {
    return new URL(this.#baseUrl);
  }

  /** Request timeout in milliseconds, if any. */
  get timeout(): number | undefined {
    return this.#timeout;
  }

  /** Headers sent with every request (a copy). */
  get headers(): Headers {
    return new Headers(this.#headers);
  }

  /**
   * Constructs the endpoint URL in the form `<base_url>/<path>`, following
   * standard URL resolution.
   *
   * `path` should not have a leading slash, ie. `offers` not `/offers`: a
   * leading slash resolves against the origin and drops the base path.
   */
  url(path: string): SafeWrap<ConstructURLError, URL> {
    if (path.startsWith('/')) {
      logger.warn({ base: this.#baseUrl.href, path }, 'path has a leading slash and replaces the whole base path');
    }

    return parseUrl(path, this.#baseUrl);
  }

  /** Starts a request with the client's headers and timeout. */
  request(method: HttpMethod, path: string): WebRequest {
    const url = this.url(path);
    const [, resolved] = url;
    logger.debug({ method, url: resolved?.href ?? path }, `doing ${method} on ${resolved?.href ?? path}`);
    return new WebRequest(method, url, this.headers, this.#timeout);
  }

  /** Starts a GET request. */
  get(path: string): WebRequest {
    return this.request('GET', path);
  }

  /** Starts a POST request. */
  post(path: string): WebRequest {
    return this.request('POST', path);
  }

  /** Starts a PUT request. */
  put(path: string): WebRequest {
    return this.request('PUT', path);
  }

  /** Starts a DELETE request. */
  delete(path: string): WebRequest {
    return this.request('DELETE', path);
  }

  /** Binds a sub-API at its default location, see {@link rebaseServiceUrl}. */
  interface<T>(api: WebInterface<T>): SafeWrap<ConstructURLError, T> {
    return this.interfaceAt(api);
  }

  /**
   * Binds a sub-API at `baseUrl`, or at its default location when omitted.
   * The sub-API client shares this client's headers, auth and timeout.
   */
  interfaceAt<T>(api: WebInterface<T>, baseUrl?: string | URL): SafeWrap<ConstructURLError, T> {
    const [errUrl, url] =
      baseUrl === undefined ? rebaseServiceUrl(api, this.#baseUrl) : parseUrl(baseUrl.toString());
    if (errUrl) {
      return [errUrl, null];
    }

    return [null, new api(new WebClient(url, this.#headers, this.#timeout))];
  }
}
