/**
 * Application constants
 */

export const TIME = {
  CONFIG_RELOAD_DEBOUNCE_MS: 1000,
} as const;

export const HTTP_STATUS = {
  OK: 200,
  MULTIPLE_CHOICES: 300,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * Schema resolution limits
 *
 * MAX_DEPTH bounds nesting below the schema a resolution starts from; deeper
 * subtrees are dropped rather than reported.
 */
export const SCHEMA = {
  MAX_DEPTH: 10,
  ALL_OF_CHILD: 'all_of',
  ANY_OF_CHILD: 'any_of',
  INLINE_NAME: 'inline',
  ITEM_NAME: 'item',
} as const;

/**
 * Tool description formatting
 */
export const DESCRIPTION = {
  ENUM_BUDGET: 100,
  ENUM_TRUNCATED_OPTIONS: 2,
  ELLIPSIS: '...',
} as const;

export const SERVER_INFO = {
  NAME: 'openapi-tool-gateway',
  VERSION: '0.1.0',
} as const;

export const DEFAULTS = {
  CONFIG_PATH: 'servers.yaml',
  HOST: '0.0.0.0',
  PORT: 8000,
  CACHE_DIR_NAME: '.mcp-openapi',
  CASSETTE_DIR: 'cassettes',
} as const;
