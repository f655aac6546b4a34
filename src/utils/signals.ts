import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal bound to a timer, plus the handle to stop that timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer; call once the guarded work has finished. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * after `timeoutMs` milliseconds.
 *
 * When `timeoutMs` is absent or `0`, no timeout signal is created.
 *
 * @param url - Request URL recorded on the timeout error.
 * @param timeoutMs - Timeout in milliseconds.
 */
export function createTimeoutSignal(url: string, timeoutMs?: number): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(url, `request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer),
  };
}
