/**
 * @module formats/dsv/parser
 * @description Headed DSV (Delimiter-Separated Values) parser
 *
 * The first non-empty line is the header; every following row becomes a
 * record keyed by header field. Handles:
 * - RFC 4180 quoting and multi-line fields
 * - BOM, CRLF line endings and NUL bytes
 * - Transparent gzip input
 * - Required-field checks at header time
 */

import { type } from "arktype";
import { DSVParseError, FormatError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import {
  DEFAULT_DELIMITERS,
  DEFAULT_ESCAPE,
  DEFAULT_QUOTE,
  MAX_FIELD_LINES,
  MAX_FIELD_SIZE,
} from "./constants";
import { hasBalancedQuotes, parseCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVParserState, DSVRecord } from "./types";
import { handleRaggedRow, removeBOM } from "./utils";

/**
 * ArkType schema for DSV parser options
 */
export const DSVParserOptionsSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "escape?": "string",
  "skipEmptyLines?": "boolean",
  "skipComments?": "boolean",
  "commentPrefix?": "string",
  "requiredFields?": "string[]",
  "raggedRows?": '"error"|"pad"|"truncate"',
  "maxFieldLines?": "number>0",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }
  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote"],
      expected: "quote character different from delimiter",
      actual: JSON.stringify(options.quote),
    });
  }
  return true;
});

/**
 * DSVParser - headed CSV/TSV parser
 *
 * @example
 * ```typescript
 * const parser = new TSVParser({ requiredFields: ["id", "is_fl", "pbid"] });
 * for await (const row of parser.parseFile("mapped.read_stat.txt")) {
 *   console.log(row.values.pbid);
 * }
 * ```
 */
export class DSVParser extends AbstractParser<DSVRecord, DSVParserOptions> {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly escapeChar: string;
  private readonly commentPrefix: string;
  private headers: string[] | null = null;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      quote: DEFAULT_QUOTE,
      escape: DEFAULT_ESCAPE,
      skipEmptyLines: true,
      skipComments: false,
      commentPrefix: "#",
      raggedRows: "pad",
      maxFieldLines: MAX_FIELD_LINES,
      onError: (error: string, lineNumber?: number): void => {
        throw new DSVParseError(error, lineNumber);
      },
    };
  }

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    super(options);

    this.delimiter = this.options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.quote = this.options.quote ?? DEFAULT_QUOTE;
    this.escapeChar = this.options.escape ?? DEFAULT_ESCAPE;
    this.commentPrefix = this.options.commentPrefix ?? "#";
  }

  protected getFormatName(): string {
    switch (this.delimiter) {
      case ",":
        return "CSV";
      case "\t":
        return "TSV";
      default:
        return "DSV";
    }
  }

  /**
   * Header fields of the last parsed input, or null before the header is read
   */
  getHeaders(): readonly string[] | null {
    return this.headers;
  }

  /**
   * Parse a DSV file from a path; `.gz` and gzip content are inflated first
   */
  async *parseFile(path: string): AsyncIterable<DSVRecord> {
    const content = await readToString(path);
    yield* this.parseString(content);
  }

  /**
   * Parse DSV data from a string
   */
  async *parseString(data: string): AsyncIterable<DSVRecord> {
    this.headers = null;
    const state: DSVParserState = {
      accumulatedRow: "",
      rowStartLine: 1,
      inMultiLineField: false,
      linesInCurrentField: 0,
      currentLineNumber: 1,
      headerProcessed: false,
      expectedColumns: 0,
    };

    const lines = data.split(/\r?\n/).map((line) => line.replace(/\0/g, ""));
    if (lines.length > 0) {
      lines[0] = removeBOM(lines[0] ?? "");
    }

    yield* this.processLines(lines, state);
  }

  private *processLines(lines: string[], state: DSVParserState): Generator<DSVRecord> {
    for (const line of lines) {
      this.checkAborted();

      if (line.length > this.options.maxLineLength) {
        this.options.onError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          state.currentLineNumber
        );
      }

      if (!state.inMultiLineField) {
        const skipEmpty = this.options.skipEmptyLines === true && line.trim() === "";
        const skipComment =
          this.options.skipComments === true && line.startsWith(this.commentPrefix);
        if (skipEmpty || skipComment) {
          state.currentLineNumber++;
          continue;
        }
        state.accumulatedRow = line;
        state.rowStartLine = state.currentLineNumber;
        state.linesInCurrentField = 1;
      } else {
        state.linesInCurrentField++;
        const maxFieldLines = this.options.maxFieldLines ?? MAX_FIELD_LINES;
        if (state.linesInCurrentField > maxFieldLines) {
          throw new DSVParseError(
            `Field starting at line ${state.rowStartLine} exceeds maximum line limit (${maxFieldLines})`,
            state.rowStartLine
          );
        }
        state.accumulatedRow += `\n${line}`;
      }

      if (hasBalancedQuotes(state.accumulatedRow, this.quote, this.escapeChar)) {
        state.inMultiLineField = false;
        const record = this.processRow(state);
        if (record !== null) {
          yield record;
        }
        state.accumulatedRow = "";
        state.linesInCurrentField = 0;
      } else {
        state.inMultiLineField = true;
      }

      state.currentLineNumber++;
    }

    if (state.inMultiLineField) {
      throw new DSVParseError(
        `Unclosed quote in field starting at line ${state.rowStartLine}`,
        state.rowStartLine,
        undefined,
        state.accumulatedRow
      );
    }

    // No header at all: an empty table must not pass as one with zero rows
    const required = this.options.requiredFields ?? [];
    if (!state.headerProcessed && required.length > 0) {
      throw FormatError.forMissingFields(this.getFormatName(), required, []);
    }
  }

  /**
   * Turn a complete logical row into the header or a record
   */
  private processRow(state: DSVParserState): DSVRecord | null {
    const fields = parseCSVRow(state.accumulatedRow, this.delimiter, this.quote, this.escapeChar);

    for (const [column, field] of fields.entries()) {
      if (field.length > MAX_FIELD_SIZE) {
        throw new DSVParseError(
          `Field exceeds maximum size of ${MAX_FIELD_SIZE} characters`,
          state.rowStartLine,
          column + 1
        );
      }
    }

    if (!state.headerProcessed) {
      this.acceptHeader(fields);
      state.expectedColumns = fields.length;
      state.headerProcessed = true;
      return null;
    }

    let processedFields = fields;
    try {
      processedFields = handleRaggedRow(fields, state.expectedColumns, this.options.raggedRows);
    } catch (error) {
      this.options.onError(
        error instanceof Error ? error.message : String(error),
        state.rowStartLine
      );
      return null;
    }

    return this.createRecord(processedFields, state.rowStartLine);
  }

  private acceptHeader(fields: string[]): void {
    const headers = fields.map((field) => field.trim());
    const required = this.options.requiredFields ?? [];
    const missing = required.filter((name) => !headers.includes(name));
    if (missing.length > 0) {
      throw FormatError.forMissingFields(this.getFormatName(), missing, headers);
    }
    this.headers = headers;
  }

  private createRecord(fields: string[], lineNumber: number): DSVRecord {
    const values: Record<string, string> = {};
    (this.headers ?? []).forEach((column, i) => {
      values[column] = fields[i] ?? "";
    });

    return {
      format: "dsv",
      ...(this.options.trackLineNumbers && { lineNumber }),
      values,
    };
  }
}

/**
 * CSVParser - Convenience class for CSV files
 */
export class CSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "," });
  }
}

/**
 * TSVParser - Convenience class for TSV files
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "\t" });
  }
}
