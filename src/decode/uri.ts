import { assertString, createErrorPreview, HttpUriParseError } from '../errors.js';
import { PATH_DELIMITER, SCHEME_DELIMITER } from '../specs.js';
import type { HttpUri } from '../types.js';
import { parseHttpResource } from './resource.js';
import { parseHttpScheme } from './scheme.js';

/**
 * Parses an absolute `http://` or `https://` URI as carried in a request
 * line. The input must not contain whitespace; that is not checked here.
 *
 * Returns null when the `://` delimiter is missing, the scheme is not
 * `http`/`https`, or the authority is empty.
 */
export function parseHttpUri(input: string): HttpUri | null {
  assertString(input, 'uri');

  const delimiterIndex = input.indexOf(SCHEME_DELIMITER);
  if (delimiterIndex === -1) {
    return null;
  }

  const scheme = parseHttpScheme(input.slice(0, delimiterIndex));
  if (scheme === null) {
    return null;
  }

  const rest = input.slice(delimiterIndex + SCHEME_DELIMITER.length);
  const pathIndex = rest.indexOf(PATH_DELIMITER);
  const authority = pathIndex === -1 ? rest : rest.slice(0, pathIndex);

  if (authority === '') {
    return null;
  }

  return {
    scheme,
    authority,
    resource: parseHttpResource(pathIndex === -1 ? '' : rest.slice(pathIndex)),
  };
}

export function decodeHttpUri(input: string): HttpUri {
  const uri = parseHttpUri(input);
  if (uri === null) {
    throw new HttpUriParseError(`Failed to parse HTTP URI: "${createErrorPreview(input)}"`);
  }
  return uri;
}
