/**
 * State machine for FASTQ parsing
 *
 * Record boundaries come from matching quality length against sequence
 * length, not from line markers: '@' and '+' are legal quality characters.
 * Handles both the common 4-line layout and wrapped records.
 */

import type { FastqSequence } from "../../types";
import { extractDescription, extractId, isValidHeader, isValidSeparator } from "./primitives";
import type { FastqParserContext } from "./types";
import { FastqParsingState } from "./types";

/**
 * Parse FASTQ lines into records
 *
 * @param onError - Called with a message and line number for malformed input;
 *   the default parser options make it throw
 */
export function* parseFastqLines(
  lines: Iterable<string>,
  options: {
    maxLineLength: number;
    trackLineNumbers: boolean;
    onError: (msg: string, line?: number) => void;
    checkAborted: () => void;
  }
): Generator<FastqSequence> {
  let lineNumber = 0;
  const context: FastqParserContext = {
    state: FastqParsingState.WAITING_HEADER,
    headerLine: 0,
    sequenceLines: [],
    qualityLines: [],
    sequenceLength: 0,
    currentQualityLength: 0,
  };

  for (const line of lines) {
    lineNumber++;
    options.checkAborted();

    const trimmedLine = line.trim();
    if (trimmedLine === "") continue;

    if (line.length > options.maxLineLength) {
      options.onError(`Line too long (${line.length} > ${options.maxLineLength})`, lineNumber);
      continue;
    }

    switch (context.state) {
      case FastqParsingState.WAITING_HEADER:
        if (isValidHeader(trimmedLine)) {
          context.header = trimmedLine;
          context.headerLine = lineNumber;
          context.sequenceLines = [];
          context.state = FastqParsingState.READING_SEQUENCE;
        } else {
          options.onError(`Expected FASTQ header starting with @, got: ${trimmedLine}`, lineNumber);
        }
        break;

      case FastqParsingState.READING_SEQUENCE:
        if (isValidSeparator(trimmedLine)) {
          context.sequenceLength = context.sequenceLines.join("").length;
          context.qualityLines = [];
          context.currentQualityLength = 0;
          context.state = FastqParsingState.READING_QUALITY;

          // Empty record: its quality line is blank too, so nothing follows
          if (context.sequenceLength === 0) {
            yield emptyRecord(context.header ?? "@", context.headerLine, options.trackLineNumbers);
            context.state = FastqParsingState.WAITING_HEADER;
          }
        } else {
          context.sequenceLines.push(trimmedLine);
        }
        break;

      case FastqParsingState.READING_QUALITY:
        context.qualityLines.push(trimmedLine);
        context.currentQualityLength += trimmedLine.length;

        if (context.currentQualityLength >= context.sequenceLength) {
          const sequence = context.sequenceLines.join("");
          const quality = context.qualityLines.join("");
          const header = context.header ?? "@";

          if (quality.length !== sequence.length) {
            options.onError(
              `FASTQ quality length (${quality.length}) != sequence length (${sequence.length})`,
              lineNumber
            );
          } else {
            const description = extractDescription(header);
            yield {
              format: "fastq",
              id: extractId(header),
              ...(description !== undefined && { description }),
              sequence,
              quality,
              length: sequence.length,
              ...(options.trackLineNumbers && { lineNumber: context.headerLine }),
            };
          }

          context.state = FastqParsingState.WAITING_HEADER;
        }
        break;
    }
  }

  if (context.state !== FastqParsingState.WAITING_HEADER) {
    options.onError(`Incomplete FASTQ record: started at line ${context.headerLine}`, lineNumber);
  }
}

function emptyRecord(header: string, headerLine: number, trackLineNumbers: boolean): FastqSequence {
  const description = extractDescription(header);
  return {
    format: "fastq",
    id: extractId(header),
    ...(description !== undefined && { description }),
    sequence: "",
    quality: "",
    length: 0,
    ...(trackLineNumbers && { lineNumber: headerLine }),
  };
}
