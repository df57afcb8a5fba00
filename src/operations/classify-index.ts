/**
 * Classify report index
 *
 * Reduces the classification report to the distinct primer tokens of
 * full-length reads and a read id → primer lookup. Two report layouts exist:
 *
 * ```
 * (IsoSeq1/2) id,strand,fiveseen,polyAseen,threeseen,fiveend,polyAend,threeend,primer,chimera
 * (IsoSeq3)   id,strand,fivelen,threelen,polyAlen,insertlen,primer_index,primer
 * ```
 *
 * The primer token is `primer_index` when the row has that field, else
 * `primer`. Rows whose `primer` is `NA` are non-full-length and stay out of
 * both the primer set and the lookup.
 */

import { FormatError, MissingFileError } from "../errors";
import { CSVParser, type DSVRecord } from "../formats/dsv";
import { exists } from "../io/file-reader";
import type { ClassifyIndex, PrimerId, ReadId } from "../types";

/** Primer value marking a non-full-length / unclassifiable read */
export const NON_FULL_LENGTH_PRIMER = "NA";

export const CLASSIFY_REQUIRED_FIELDS = ["id", "primer"] as const;

/**
 * Build the index from classify report rows
 *
 * A read id seen twice maps to its last row's primer.
 *
 * @throws {FormatError} When a row has no `id` or `primer` field
 */
export async function buildClassifyIndex(
  rows: AsyncIterable<DSVRecord> | Iterable<DSVRecord>
): Promise<ClassifyIndex> {
  const primers = new Set<PrimerId>();
  const lookup = new Map<ReadId, PrimerId>();
  const excluded = new Set<ReadId>();
  let duplicates = 0;

  for await (const row of rows) {
    const { id, primer, primer_index: primerIndex } = row.values;
    if (id === undefined || primer === undefined) {
      throw new FormatError(
        "Classify report row lacks the id or primer field",
        "classify report",
        [...CLASSIFY_REQUIRED_FIELDS].filter((field) => row.values[field] === undefined),
        row.lineNumber
      );
    }

    if (primer === NON_FULL_LENGTH_PRIMER) {
      excluded.add(id);
      continue;
    }

    const token = primerIndex ?? primer;
    primers.add(token);
    if (lookup.has(id)) {
      duplicates++;
    }
    lookup.set(id, token);
  }

  return { primers, lookup, excluded, duplicates };
}

/**
 * Read a comma-delimited classify report (optionally gzipped) into an index
 *
 * @throws {MissingFileError} When the file does not exist
 * @throws {FormatError} When the header lacks `id` or `primer`
 */
export async function readClassifyReport(path: string): Promise<ClassifyIndex> {
  if (!(await exists(path))) {
    throw new MissingFileError(path, "Classify report");
  }
  const parser = new CSVParser({ requiredFields: [...CLASSIFY_REQUIRED_FIELDS] });
  return buildClassifyIndex(parser.parseFile(path));
}
