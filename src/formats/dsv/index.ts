/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * @example
 * ```typescript
 * import { CSVParser } from './formats/dsv';
 *
 * const parser = new CSVParser({ requiredFields: ["id", "primer"] });
 * for await (const record of parser.parseFile('classify_report.csv')) {
 *   console.log(record.values.primer);
 * }
 * ```
 */

export type {
  DelimiterType,
  DSVParserOptions,
  DSVParserState,
  DSVRecord,
  DSVWriterOptions,
} from "./types";
export { CSVParseState } from "./types";

export { CSVParser, DSVParser, DSVParserOptionsSchema, TSVParser } from "./parser";
export { CSVWriter, type DSVField, DSVWriter, DSVWriterOptionsSchema } from "./writer";

export { countUnescapedQuotes, hasBalancedQuotes, parseCSVRow } from "./state-machine";
export { handleRaggedRow, removeBOM } from "./utils";

export {
  DEFAULT_DELIMITERS,
  DEFAULT_ESCAPE,
  DEFAULT_QUOTE,
  MAX_FIELD_LINES,
  MAX_FIELD_SIZE,
} from "./constants";
