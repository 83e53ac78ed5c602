export const SCHEME_DELIMITER = '://';
export const PATH_DELIMITER = '/';
export const QUERY_DELIMITER = '?';
export const FRAGMENT_DELIMITER = '#';

export const ROOT_PATH = '/';
export const ASTERISK_TARGET = '*';

export const HTTP_SCHEME = {
  HTTP: 'http',
  HTTPS: 'https',
} as const;

export const HTTP_SCHEMES = [
  HTTP_SCHEME.HTTP,
  HTTP_SCHEME.HTTPS,
] as const;

export const ERROR_PREVIEW_LENGTH = 50;
