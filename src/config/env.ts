import { z } from 'zod';
import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Environment variable overriding the root API URL. */
export const API_URL_ENV_VAR = 'MARKETPAY_API_URL';

/** Root API URL used when neither the caller nor the environment provides one. */
export const DEFAULT_API_URL = 'http://127.0.0.1:7465';

const envUrlSchema = z.string().trim().min(1).optional();

/**
 * Reads `name` from the environment. Unset and blank variables read as `null`.
 */
export function readEnvVar(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const parsed = envUrlSchema.safeParse(env[name]);
  return parsed.success ? (parsed.data ?? null) : null;
}

/**
 * Parses `input` as an absolute URL.
 */
export function parseUrl(input: string, base?: URL): SafeWrap<ConstructURLError, URL> {
  const [err, url] = safeWrap(() => new URL(input, base));
  if (err) {
    return [new ConstructURLError(`invalid URL: ${input}`, input, { cause: err }), null];
  }

  return [null, url];
}

/**
 * Root API URL: `MARKETPAY_API_URL` when set, {@link DEFAULT_API_URL} otherwise.
 */
export function restApiUrl(env: NodeJS.ProcessEnv = process.env): SafeWrap<ConstructURLError, URL> {
  return parseUrl(readEnvVar(API_URL_ENV_VAR, env) ?? DEFAULT_API_URL);
}
