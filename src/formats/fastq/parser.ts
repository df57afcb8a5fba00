/**
 * FASTQ format parser
 *
 * Reads whole files (gzip handled transparently) and yields records through
 * a length-matching state machine.
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { FastqSequence } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { parseFastqLines } from "./state-machine";
import type { FastqParserOptions } from "./types";

const FastqParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "lenient?": "boolean",
});

/**
 * FASTQ parser
 *
 * @example
 * ```typescript
 * const parser = new FastqParser();
 * for await (const seq of parser.parseFile('mapped.fastq')) {
 *   console.log(`${seq.id}: ${seq.length} bp`);
 * }
 * ```
 */
export class FastqParser extends AbstractParser<FastqSequence, FastqParserOptions> {
  protected getDefaultOptions(): Partial<FastqParserOptions> {
    return {
      maxLineLength: 10_000_000, // PacBio transcripts run to tens of kb
      lenient: false,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, "FASTQ", lineNumber);
      },
    };
  }

  constructor(options: FastqParserOptions = {}) {
    const validation = FastqParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid FASTQ parser options: ${validation.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "FASTQ";
  }

  async *parseString(data: string): AsyncIterable<FastqSequence> {
    const onError = this.options.lenient === true ? this.options.onWarning : this.options.onError;

    yield* parseFastqLines(data.split(/\r?\n/), {
      maxLineLength: this.options.maxLineLength,
      trackLineNumbers: this.options.trackLineNumbers,
      onError,
      checkAborted: () => this.checkAborted(),
    });
  }

  async *parseFile(filePath: string): AsyncIterable<FastqSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    const content = await readToString(filePath);
    yield* this.parseString(content);
  }
}
