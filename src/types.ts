import type { HTTP_SCHEMES } from './specs.js';

export type HttpScheme = typeof HTTP_SCHEMES[number];

export interface HttpResource {
  /** Never empty: an empty path is reported as `/`. */
  readonly path: string;
  /** Text after `?`, or null when absent or empty. */
  readonly query: string | null;
  /** Text after `#`, or null when absent or empty. */
  readonly fragment: string | null;
}

export interface HttpUri {
  readonly scheme: HttpScheme;
  /** host[:port], never empty. */
  readonly authority: string;
  readonly resource: HttpResource;
}

export type RequestTargetForm = 'origin' | 'absolute' | 'asterisk';

export interface OriginFormTarget {
  readonly form: 'origin';
  readonly resource: HttpResource;
}

export interface AbsoluteFormTarget {
  readonly form: 'absolute';
  readonly uri: HttpUri;
}

export interface AsteriskFormTarget {
  readonly form: 'asterisk';
}

export type RequestTarget = OriginFormTarget | AbsoluteFormTarget | AsteriskFormTarget;
