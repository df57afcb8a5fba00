/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Default escape character (doubling quotes per RFC 4180)
 */
export const DEFAULT_ESCAPE = '"';

/**
 * Maximum field size for memory safety (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

/**
 * Maximum physical lines a single quoted field may span
 */
export const MAX_FIELD_LINES = 100;
