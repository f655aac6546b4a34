import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Values that can be substituted into a path template. */
export type PathValue = string | number | boolean | bigint;

/** Instants (`Date` or a model timestamp) are written with `toISOString()`. */
export type QueryInstant = { toISOString(): string };

/** Values accepted as query parameters; `null` and `undefined` are left out of the query. */
export type QueryValue = string | number | boolean | bigint | QueryInstant | null | undefined;

/**
 * Query parameters in the order they should appear: `[name, value]` pairs, or
 * an object whose names are not integer-like (objects list those first).
 */
export type QueryParams = Iterable<readonly [string, QueryValue]> | Readonly<Record<string, QueryValue>>;

/** Empty object definition */
export type EmptyObject = Record<never, never>;

/** Parse `{param}` segments from a path template into a typed object. */
export type ParsePathParams<Path extends string> = Path extends `${string}{${infer Param}}${infer Rest}`
  ? { [K in Param]: PathValue } & ParsePathParams<Rest>
  : EmptyObject;

/** Arguments for a path template: one entry per `{param}`. */
export type PathArgs<Path extends string> = ParsePathParams<Path> & Readonly<Record<string, PathValue>>;

const PLACEHOLDER = /\{([^{}]*)\}/g;

const ARRAY_INDEX = /^(?:0|[1-9]\d*)$/;

/**
 * Substitutes every `{name}` in `template` with `String(args[name])`, verbatim.
 *
 * A placeholder without an argument, an argument without a placeholder, or an
 * unbalanced brace yields a {@link ConstructURLError}.
 *
 * @example
 * formatPath('foo/{bar}/fuu/{baz}', { bar: 'baara', baz: 0 }); // [null, 'foo/baara/fuu/0']
 */
export function formatPath<Path extends string>(template: Path, args: PathArgs<Path>): SafeWrap<ConstructURLError, string> {
  if (/[{}]/.test(template.replace(PLACEHOLDER, ''))) {
    return [new ConstructURLError(`error formatting path, unbalanced braces in ${template}`, template), null];
  }

  const values: Readonly<Record<string, PathValue>> = args;
  const used = new Set<string>();
  const missing: string[] = [];

  const result = template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.hasOwn(values, name)) {
      missing.push(name);
      return '';
    }

    used.add(name);
    return String(values[name]);
  });

  if (missing.length > 0) {
    return [new ConstructURLError(`error formatting path, no value for {${missing.join('}, {')}}`, template), null];
  }

  const unused = Object.keys(values).filter((name) => !used.has(name));
  if (unused.length > 0) {
    return [new ConstructURLError(`error formatting path, unused arguments ${unused.join(', ')}`, template), null];
  }

  return [null, result];
}

function isQueryPairs(query: QueryParams): query is Iterable<readonly [string, QueryValue]> {
  return Symbol.iterator in query;
}

/** Names an object would enumerate ahead of its other keys. */
function isArrayIndex(name: string): boolean {
  return ARRAY_INDEX.test(name) && Number(name) < 2 ** 32 - 1;
}

function toQueryString(value: Exclude<QueryValue, null | undefined>): string {
  return typeof value === 'object' ? value.toISOString() : String(value);
}

/**
 * Builder for the query part of the URLs.
 *
 * Pairs are `application/x-www-form-urlencoded` and keep the order they were put in.
 */
export class QueryParamsBuilder {
  #params = new URLSearchParams();

  /** Appends `name=value`, unless the value is unset. */
  put(name: string, value: QueryValue): this {
    if (value === null || value === undefined) {
      return this;
    }

    this.#params.append(name, toQueryString(value));
    return this;
  }

  /** Encoded query without the leading `?`; empty when nothing was put. */
  build(): string {
    return this.#params.toString();
  }
}

/**
 * Formats a relative endpoint URL from a path template and optional query parameters.
 *
 * Query parameters keep their order; given as an object, integer-like names
 * are refused with a {@link ConstructURLError}.
 *
 * @example
 * urlFormat('foo/{bar}', { bar: 'qux' }, { limit: 3, after: undefined }); // [null, 'foo/qux?limit=3']
 */
export function urlFormat<Path extends string>(
  template: Path,
  args: PathArgs<Path>,
  query: QueryParams = {},
): SafeWrap<ConstructURLError, string> {
  const [errPath, path] = formatPath(template, args);
  if (errPath) {
    return [errPath, null];
  }

  const builder = new QueryParamsBuilder();
  if (isQueryPairs(query)) {
    for (const [name, value] of query) {
      builder.put(name, value);
    }
  } else {
    const indexLike = Object.keys(query).filter(isArrayIndex);
    if (indexLike.length > 0) {
      const names = indexLike.join(', ');
      const message = `error formatting query, integer-like names ${names} lose their order in an object`;
      return [new ConstructURLError(`${message}, pass [name, value] pairs`, template), null];
    }

    for (const [name, value] of Object.entries(query)) {
      builder.put(name, value);
    }
  }

  const search = builder.build();
  return [null, search ? `${path}?${search}` : path];
}
