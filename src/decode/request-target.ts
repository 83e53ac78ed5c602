import { assertString } from '../errors.js';
import { ASTERISK_TARGET, PATH_DELIMITER } from '../specs.js';
import type { HttpResource, RequestTarget } from '../types.js';
import { parseHttpResource } from './resource.js';
import { parseHttpUri } from './uri.js';

export function parseRequestTarget(target: string): RequestTarget | null {
  assertString(target, 'request target');

  if (target === ASTERISK_TARGET) {
    return { form: 'asterisk' };
  }

  if (target.startsWith(PATH_DELIMITER)) {
    return { form: 'origin', resource: parseHttpResource(target) };
  }

  const uri = parseHttpUri(target);
  if (uri === null) {
    return null;
  }

  return { form: 'absolute', uri };
}

export function getRequestTargetResource(target: RequestTarget): HttpResource | null {
  switch (target.form) {
    case 'origin':
      return target.resource;
    case 'absolute':
      return target.uri.resource;
    case 'asterisk':
      return null;
  }
}
