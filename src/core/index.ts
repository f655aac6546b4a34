/**
 * Core entrypoint: the web client, its requests and the URL helpers.
 * Import from here if you only need the client without the models or error helpers.
 * @module
 */

export { rebaseServiceUrl, WebClient } from './client.js';
export { PendingRequest, WebRequest } from './request.js';
export type { HttpMethod, WebAuth, WebClientProps, WebInterface } from './types.js';
export { API_URL_ENV_VAR, DEFAULT_API_URL, restApiUrl } from '../config/env.js';
export { defaultOnTimeout } from '../utils/defaultOnTimeout.js';
export { emptyBody, isEmptyBody } from '../utils/emptyBody.js';
export type { HeaderOptions } from '../utils/headers.js';
export {
  formatPath,
  type PathArgs,
  type PathValue,
  type QueryParams,
  QueryParamsBuilder,
  type QueryValue,
  urlFormat,
} from '../utils/urlFormat.js';
export type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
