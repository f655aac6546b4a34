/**
 * Error entrypoint: exports the client error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the core client.
 * @module
 */

export type { ClientError } from './clientError.js';
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
export { EventStreamError, isEventStreamError } from './eventStreamError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { InternalError, isInternalError } from './internalError.js';
export { type HeaderPart, InvalidHeaderError, isInvalidHeaderError } from './invalidHeaderError.js';
export { isErrorType } from './isErrorType.js';
export { isJsonError, JsonError } from './jsonError.js';
export { isPayloadError, PayloadError } from './payloadError.js';
export { getSendRequestError, isSendRequestError, SendRequestError } from './sendRequestError.js';
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { isUtf8Error, Utf8Error } from './utf8Error.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
