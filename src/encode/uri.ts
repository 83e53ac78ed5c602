import { SCHEME_DELIMITER } from '../specs.js';
import type { HttpUri } from '../types.js';
import { encodeHttpResource } from './resource.js';
import { encodeHttpScheme } from './scheme.js';

export function encodeHttpUri(uri: HttpUri): string {
  return `${encodeHttpScheme(uri.scheme)}${SCHEME_DELIMITER}${uri.authority}${encodeHttpResource(uri.resource)}`;
}
