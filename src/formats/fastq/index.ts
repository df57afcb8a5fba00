/**
 * FASTQ format module
 */

export { FastqParser } from "./parser";
export { extractDescription, extractId, isValidHeader, isValidSeparator } from "./primitives";
export { parseFastqLines } from "./state-machine";
export type { FastqParserContext, FastqParserOptions } from "./types";
export { FastqParsingState } from "./types";
