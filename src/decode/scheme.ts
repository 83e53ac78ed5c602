import { assertString, createErrorPreview, HttpUriParseError } from '../errors.js';
import { HTTP_SCHEMES } from '../specs.js';
import type { HttpScheme } from '../types.js';

export function isHttpScheme(value: string): value is HttpScheme {
  return HTTP_SCHEMES.some((scheme) => scheme === value);
}

/**
 * Matches the scheme token exactly and case-sensitively; `HTTP`, `htt`
 * and the empty string are all rejected.
 */
export function parseHttpScheme(token: string): HttpScheme | null {
  assertString(token, 'scheme');
  return isHttpScheme(token) ? token : null;
}

export function decodeHttpScheme(token: string): HttpScheme {
  const scheme = parseHttpScheme(token);
  if (scheme === null) {
    throw new HttpUriParseError(`Unrecognized scheme: "${createErrorPreview(token)}"`);
  }
  return scheme;
}
