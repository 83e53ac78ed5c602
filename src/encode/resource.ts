import { FRAGMENT_DELIMITER, QUERY_DELIMITER } from '../specs.js';
import type { HttpResource } from '../types.js';

export function encodeHttpResource(resource: HttpResource): string {
  const { path, query, fragment } = resource;
  let str = path;

  if (query !== null) {
    str += `${QUERY_DELIMITER}${query}`;
  }

  if (fragment !== null) {
    str += `${FRAGMENT_DELIMITER}${fragment}`;
  }

  return str;
}
