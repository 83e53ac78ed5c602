export { getRequestTargetResource, parseRequestTarget } from './decode/request-target.js';
export { parseHttpResource } from './decode/resource.js';
export { decodeHttpScheme, isHttpScheme, parseHttpScheme } from './decode/scheme.js';
export { decodeHttpUri, parseHttpUri } from './decode/uri.js';
export { encodeHttpResource } from './encode/resource.js';
export { encodeHttpScheme } from './encode/scheme.js';
export { encodeHttpUri } from './encode/uri.js';
export { HttpUriParseError } from './errors.js';
export { HTTP_SCHEME } from './specs.js';
export type {
  AbsoluteFormTarget,
  AsteriskFormTarget,
  HttpResource,
  HttpScheme,
  HttpUri,
  OriginFormTarget,
  RequestTarget,
  RequestTargetForm,
} from './types.js';
