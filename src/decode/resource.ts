import { assertString } from '../errors.js';
import { FRAGMENT_DELIMITER, QUERY_DELIMITER, ROOT_PATH } from '../specs.js';
import type { HttpResource } from '../types.js';

function toOptional(str: string): string | null {
  return str === '' ? null : str;
}

/**
 * Splits a path+query+fragment tail. Never fails.
 *
 * A `?` only opens a query when it comes before the first `#`; any `?`
 * after the `#` is fragment content, so `/a#y?z` has no query and the
 * fragment `y?z`.
 */
export function parseHttpResource(tail: string): HttpResource {
  assertString(tail, 'resource');

  const queryIndex = tail.indexOf(QUERY_DELIMITER);
  const fragmentIndex = tail.indexOf(FRAGMENT_DELIMITER);
  const hasFragment = fragmentIndex !== -1;
  const hasQuery = queryIndex !== -1 && (!hasFragment || queryIndex < fragmentIndex);
  const queryEnd = hasFragment ? fragmentIndex : tail.length;

  const path = tail.slice(0, hasQuery ? queryIndex : queryEnd);
  const query = hasQuery ? tail.slice(queryIndex + 1, queryEnd) : '';
  const fragment = hasFragment ? tail.slice(fragmentIndex + 1) : '';

  return {
    path: path === '' ? ROOT_PATH : path,
    query: toOptional(query),
    fragment: toOptional(fragment),
  };
}
