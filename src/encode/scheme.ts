import type { HttpScheme } from '../types.js';

export function encodeHttpScheme(scheme: HttpScheme): string {
  return scheme;
}
