/**
 * @module formats/dsv/writer
 * @description DSV writer: RFC 4180 quoting, configurable delimiter
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import { DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import type { DSVWriterOptions } from "./types";

export const DSVWriterOptionsSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "escapeChar?": "string",
  "lineEnding?": type.enumerated("\n", "\r\n"),
});

export type DSVField = string | number | boolean | null | undefined;

/**
 * DSVWriter - CSV/TSV row formatting
 *
 * Fields are quoted only when they contain the delimiter, the quote
 * character or a line break.
 *
 * @example
 * ```typescript
 * const writer = new CSVWriter();
 * writer.formatRow(["id", "Sample A", 'say "hi"']); // id,Sample A,"say ""hi"""
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly escapeChar: string;
  private readonly lineEnding: string;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? "\t";
    this.quote = options.quote ?? DEFAULT_QUOTE;
    this.escapeChar = options.escapeChar ?? DEFAULT_ESCAPE;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Format a single field with proper escaping
   */
  private formatField(value: DSVField): string {
    if (value === null || value === undefined) return "";

    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) {
      return field;
    }

    const escaped = field.split(this.quote).join(this.escapeChar + this.quote);
    return this.quote + escaped + this.quote;
  }

  /**
   * Format a row of fields (no line ending)
   */
  formatRow(fields: readonly DSVField[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format rows into a document, each row terminated by the line ending
   */
  formatRows(rows: Iterable<readonly DSVField[]>): string {
    let output = "";
    for (const row of rows) {
      output += this.formatRow(row) + this.lineEnding;
    }
    return output;
  }

  /**
   * Write rows to a file (`.gz` paths are gzip compressed)
   */
  async writeFile(path: string, rows: Iterable<readonly DSVField[]>): Promise<void> {
    await writeString(path, this.formatRows(rows));
  }
}

/**
 * CSVWriter - comma-delimited output
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "," });
  }
}
