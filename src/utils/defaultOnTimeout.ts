import type { ClientError } from '../error/clientError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { logger } from './logger.js';
import type { SafeWrap } from './wrap.js';

/**
 * Turns a timed out result into `[null, fallback()]`; every other result is returned as is.
 *
 * Meant for polling endpoints, where "nothing arrived before the timeout" is an
 * ordinary answer rather than a failure.
 *
 * @example
 * const [err, events] = defaultOnTimeout(await request.json(schema), () => []);
 */
export function defaultOnTimeout<T>(result: SafeWrap<ClientError, T>, fallback: () => T): SafeWrap<ClientError, T> {
  const [err] = result;
  if (!(err instanceof TimeoutError)) {
    return result;
  }

  logger.trace({ url: err.url, status: err.status }, `timeout getting url ${err.url}: ${err.message}`);
  return [null, fallback()];
}
