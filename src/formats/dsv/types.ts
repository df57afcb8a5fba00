/**
 * DSV Format Type Definitions
 */

import type { ParserOptions } from "../../types";

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "," | "\t" | "|" | ";" | string;

/**
 * One data row of a headed table, keyed by header field name
 */
export interface DSVRecord {
  readonly format: "dsv";
  /** Source line number where the row starts, unless line tracking is off */
  readonly lineNumber?: number;
  readonly values: Readonly<Record<string, string>>;
}

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * DSV parser options extending base parser options
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: DelimiterType;

  // Quote handling
  quote?: string;
  escape?: string;

  // Parsing behavior
  skipEmptyLines?: boolean;
  skipComments?: boolean;
  commentPrefix?: string;

  /** Header fields that must be present; checked as soon as the header is read */
  requiredFields?: string[];

  // Ragged row handling
  raggedRows?: "error" | "pad" | "truncate";

  /** Maximum lines a single quoted field can span */
  maxFieldLines?: number;
}

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  delimiter?: DelimiterType;
  quote?: string;
  escapeChar?: string;
  lineEnding?: "\n" | "\r\n";
}

/**
 * Parser state, threaded through line processing
 */
export interface DSVParserState {
  accumulatedRow: string; // Current row being built (may span lines)
  rowStartLine: number;
  inMultiLineField: boolean;
  linesInCurrentField: number;
  currentLineNumber: number;
  headerProcessed: boolean;
  expectedColumns: number;
}
