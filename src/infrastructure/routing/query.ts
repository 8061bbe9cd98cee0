/**
 * conduit - Query string decoding
 */

import { percentDecode } from './path';

/**
 * Decoded query string. Each key keeps every value it was given, in order.
 */
export type QueryParamValues = Record<string, string[]>;

/**
 * Decode an `application/x-www-form-urlencoded` query string.
 *
 * Pairs are separated by `&` or `;`. `+` stands for a space. A pair whose
 * key or value is not valid percent-encoding is skipped.
 *
 * @example
 * ```typescript
 * parseQueryString('tag=a&tag=b;q=red+shoes&flag');
 * // { tag: ['a', 'b'], q: ['red shoes'], flag: [''] }
 * ```
 */
export function parseQueryString(query: string | undefined): QueryParamValues {
  const values = new Map<string, string[]>();
  if (!query) {
    return {};
  }

  for (const pair of query.split(/[&;]/)) {
    if (pair === '') {
      continue;
    }

    const separator = pair.indexOf('=');
    const rawKey = separator === -1 ? pair : pair.slice(0, separator);
    const rawValue = separator === -1 ? '' : pair.slice(separator + 1);

    const key = formDecode(rawKey);
    const value = formDecode(rawValue);
    if (key === undefined || value === undefined) {
      continue;
    }

    const existing = values.get(key);
    if (existing) {
      existing.push(value);
    } else {
      values.set(key, [value]);
    }
  }

  return Object.fromEntries(values);
}

function formDecode(text: string): string | undefined {
  return percentDecode(text.replace(/\+/g, ' '));
}

/**
 * Shape handed to a query string extractor: keys given once map to their
 * value, repeated keys map to the list of values
 */
export function flattenQuery(values: QueryParamValues): Record<string, string | string[]> {
  return Object.fromEntries(
    Object.entries(values).map(
      ([key, list]): [string, string | string[]] => [key, list.length === 1 ? list[0] : [...list]],
    ),
  );
}
