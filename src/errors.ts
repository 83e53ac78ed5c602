import { ERROR_PREVIEW_LENGTH } from './specs.js';

function createCustomError(code: string, defaultMessage: string) {
  return class extends Error {
    public readonly code: string;

    constructor(message?: string) {
      super(message ?? defaultMessage);
      this.name = this.constructor.name;
      this.code = code;
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, this.constructor);
      }
    }
  };
}

export class HttpUriParseError extends createCustomError(
  'ERR_HTTP_URI_PARSE',
  'Http Uri Parse Error',
) {};

export function createErrorPreview(str: string, maxLength: number = ERROR_PREVIEW_LENGTH): string {
  return str.length > maxLength
    ? `${str.substring(0, maxLength)}...`
    : str;
}

export function assertString(value: unknown, name: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new TypeError(`${name} must be a string`);
  }
}
