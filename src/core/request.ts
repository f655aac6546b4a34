import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ClientError } from '../error/clientError.js';
import type { ConstructURLError } from '../error/constructUrlError.js';
import { HTTPError } from '../error/httpError.js';
import { JsonError } from '../error/jsonError.js';
import { PayloadError } from '../error/payloadError.js';
import { SendRequestError } from '../error/sendRequestError.js';
import { getTimeoutError, TimeoutError } from '../error/timeoutError.js';
import { Utf8Error } from '../error/utf8Error.js';
import { ErrorMessageSchema } from '../models/errorMessage.js';
import { emptyBody } from '../utils/emptyBody.js';
import { logger } from '../utils/logger.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { HttpMethod } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Status code the server uses to report that it gave up waiting. */
const REQUEST_TIMEOUT = 408;

/** Everything needed to put a request on the wire. */
interface PendingRequestInit {
  method: HttpMethod;
  url: SafeWrap<ConstructURLError, URL>;
  headers: Headers;
  timeout: number | undefined;
  body?: SafeWrap<JsonError, string>;
}

/**
 * Message of a failed send, with the message of its cause appended
 * (`fetch failed: connect ECONNREFUSED ...`).
 */
function describeFailure(err: Error): string {
  return err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
}

/**
 * Best-effort message out of a non-2xx body: the `message` of the JSON error
 * body, or why that could not be read.
 */
async function readErrorMessage(response: Response): Promise<string> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return `error parsing error msg: ${errText.message}`;
  }

  const [errJson, body] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return `error parsing error msg: ${errJson.message}`;
  }

  const parsed = ErrorMessageSchema.safeParse(body);
  if (!parsed.success) {
    return `error parsing error msg: ${parsed.error.message}`;
  }

  return parsed.data.message ?? '';
}

/**
 * Maps a non-2xx response to its error; `408` counts as a timeout.
 */
async function statusError(url: string, response: Response): Promise<HTTPError | TimeoutError> {
  const detail = await readErrorMessage(response);
  if (response.status === REQUEST_TIMEOUT) {
    return new TimeoutError(url, detail, REQUEST_TIMEOUT);
  }

  return new HTTPError(response.status, url, detail);
}

/**
 * Request with a method, URL and headers, waiting for its body.
 *
 * Created through {@link WebClient.request} and its verb helpers; finish it
 * with {@link WebRequest.send} or {@link WebRequest.sendJson}.
 */
export class WebRequest {
  #method: HttpMethod;
  #url: SafeWrap<ConstructURLError, URL>;
  #headers: Headers;
  #timeout: number | undefined;

  constructor(method: HttpMethod, url: SafeWrap<ConstructURLError, URL>, headers: Headers, timeout?: number) {
    this.#method = method;
    this.#url = url;
    this.#headers = headers;
    this.#timeout = timeout;
  }

  /** Request without a body. */
  send(): PendingRequest {
    return new PendingRequest({
      method: this.#method,
      url: this.#url,
      headers: this.#headers,
      timeout: this.#timeout,
    });
  }

  /**
   * Request with `value` as its JSON body. A value that cannot be encoded
   * surfaces as a {@link JsonError} once the request is awaited.
   */
  sendJson(value: unknown): PendingRequest {
    logger.trace({ payload: value }, 'sending payload');

    const headers = new Headers(this.#headers);
    headers.set('Content-Type', 'application/json');

    const [errEncode, encoded] = safeWrap(() => JSON.stringify(value));
    let body: SafeWrap<JsonError, string>;
    if (errEncode) {
      body = [new JsonError(`error encoding request body: ${errEncode.message}`, { cause: errEncode }), null];
    } else if (typeof encoded !== 'string') {
      body = [new JsonError(`error encoding request body: ${typeof value} has no JSON form`), null];
    } else {
      body = [null, encoded];
    }

    return new PendingRequest({
      method: this.#method,
      url: this.#url,
      headers,
      timeout: this.#timeout,
      body,
    });
  }
}

/**
 * A request ready to go; nothing is sent until {@link PendingRequest.json} is awaited.
 */
export class PendingRequest {
  #init: PendingRequestInit;

  constructor(init: PendingRequestInit) {
    this.#init = init;
  }

  /** Method of the request. */
  get method(): HttpMethod {
    return this.#init.method;
  }

  /** Resolved URL, or `null` when it could not be built. */
  get url(): string | null {
    const [, url] = this.#init.url;
    return url?.href ?? null;
  }

  /**
   * Sends the request and decodes the JSON response.
   *
   * - Non-2xx statuses become an {@link HTTPError} (or a {@link TimeoutError} for `408`).
   * - `204 No Content` and `Content-Length: 0` decode as the empty-body
   *   sentinel (see `emptyBody`) instead of parsing zero bytes.
   * - With a schema, the decoded value is validated against it.
   *
   * @returns A promise resolving to `[error, data]`.
   */
  json(): SafeWrapAsync<ClientError, unknown>;
  json<S extends StandardSchemaV1>(schema: S): SafeWrapAsync<ClientError, StandardSchemaV1.InferOutput<S>>;
  async json(schema?: StandardSchemaV1): SafeWrapAsync<ClientError, unknown> {
    const [errUrl, url] = this.#init.url;
    if (errUrl) {
      return [errUrl, null];
    }

    let body: string | undefined;
    if (this.#init.body) {
      const [errBody, encoded] = this.#init.body;
      if (errBody) {
        return [errBody, null];
      }

      body = encoded;
    }

    const timeout = createTimeoutSignal(url.href, this.#init.timeout);
    const [err, data] = await this.#receive(url.href, body, timeout?.signal).finally(() => timeout?.clear());
    if (err) {
      return [err, null];
    }

    if (!schema) {
      return [null, data];
    }

    return validator(data, schema);
  }

  /**
   * Sends the request, filters the status and reads the body as JSON.
   */
  async #receive(url: string, body: string | undefined, signal?: AbortSignal): SafeWrapAsync<ClientError, unknown> {
    const { method, headers } = this.#init;
    const [errSend, response] = await safeWrapAsync(() =>
      fetch(url, { method, headers, body, ...(signal && { signal }) }),
    );
    if (errSend) {
      const timedOut = getTimeoutError(errSend);
      if (timedOut) {
        return [timedOut, null];
      }

      return [new SendRequestError(url, describeFailure(errSend), { cause: errSend }), null];
    }

    logger.trace({ url, status: response.status, headers: Object.fromEntries(response.headers) }, 'response headers');

    if (!response.ok) {
      return [await statusError(url, response), null];
    }

    // allow empty body and no content (204) to pass smoothly
    if (response.status === 204 || response.headers.get('Content-Length') === '0') {
      return [null, emptyBody(response.status)];
    }

    const [errRead, buffer] = await safeWrapAsync(() => response.arrayBuffer());
    if (errRead) {
      return [
        getTimeoutError(errRead) ?? new PayloadError(`error reading response body: ${errRead.message}`, { cause: errRead }),
        null,
      ];
    }

    const [errDecode, text] = safeWrap(() => utf8.decode(buffer));
    if (errDecode) {
      return [new Utf8Error(`invalid UTF8 string: ${errDecode.message}`, { cause: errDecode }), null];
    }

    logger.debug({ url, body: text }, `WebRequest.json(). url=${url}`);

    const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
    if (errJson) {
      return [new JsonError(`JSON error: ${errJson.message}`, { cause: errJson }), null];
    }

    return [null, json];
  }
}
