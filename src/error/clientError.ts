import type { ConstructURLError } from './constructUrlError.js';
import type { EventStreamError } from './eventStreamError.js';
import type { HTTPError } from './httpError.js';
import type { InternalError } from './internalError.js';
import type { InvalidHeaderError } from './invalidHeaderError.js';
import type { JsonError } from './jsonError.js';
import type { PayloadError } from './payloadError.js';
import type { SendRequestError } from './sendRequestError.js';
import type { TimeoutError } from './timeoutError.js';
import type { Utf8Error } from './utf8Error.js';
import type { ValidationError } from './validationError.js';

/**
 * Every error the client hands back. Branch on it with `instanceof`.
 */
export type ClientError =
  | SendRequestError
  | TimeoutError
  | PayloadError
  | JsonError
  | ValidationError
  | HTTPError
  | InvalidHeaderError
  | ConstructURLError
  | Utf8Error
  | InternalError
  | EventStreamError;
