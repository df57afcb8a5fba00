/**
 * Type definitions for FASTQ parsing
 */

import type { ParserOptions } from "../../types";

/**
 * State machine states for multi-line FASTQ parsing
 */
export enum FastqParsingState {
  WAITING_HEADER, // Looking for @ line to start new record
  READING_SEQUENCE, // Accumulating sequence lines until + separator
  READING_QUALITY, // Accumulating quality until length matches sequence
}

/**
 * State machine parser context
 */
export interface FastqParserContext {
  state: FastqParsingState;
  header?: string;
  headerLine: number;
  sequenceLines: string[];
  qualityLines: string[];
  sequenceLength: number;
  currentQualityLength: number;
}

/**
 * FASTQ-specific parser options
 */
export interface FastqParserOptions extends ParserOptions {
  /** Report malformed records through onWarning and skip them instead of failing */
  lenient?: boolean;
}
