/**
 * Full-length read counting
 *
 * Folds the read-status table into per-isoform, per-primer counts:
 *
 * ```
 * id                                          length  is_fl  stat    pbid
 * m54006_170729_232022/43123426/1712_71_CCS   1641    Y      unique  PB.3811.1
 * ```
 */

import { FormatError, MissingFileError, MissingReadError } from "../errors";
import { type DSVRecord, TSVParser } from "../formats/dsv";
import { exists } from "../io/file-reader";
import type { ClassifyIndex, CountMatrix, FLCountResult, IsoformId, PrimerId } from "../types";

/** `is_fl` value of a full-length read */
export const FULL_LENGTH_FLAG = "Y";

export const READ_STAT_REQUIRED_FIELDS = ["id", "is_fl", "pbid"] as const;

/**
 * Count for one isoform/primer pair; zero when never incremented
 */
export function getCount(counts: CountMatrix, isoform: IsoformId, primer: PrimerId): number {
  return counts.get(isoform)?.get(primer) ?? 0;
}

/**
 * Add one to an isoform/primer counter, creating the isoform's row on first touch
 */
export function incrementCount(counts: CountMatrix, isoform: IsoformId, primer: PrimerId): void {
  let row = counts.get(isoform);
  if (row === undefined) {
    row = new Map<PrimerId, number>();
    counts.set(isoform, row);
  }
  row.set(primer, (row.get(primer) ?? 0) + 1);
}

/**
 * Aggregate full-length reads by isoform and primer
 *
 * Rows with `is_fl` other than `Y` are ignored. A full-length read the
 * classify report marks `NA` is skipped and tallied in `skippedExcluded`.
 *
 * @throws {MissingReadError} When a full-length read is absent from the classify report
 * @throws {FormatError} When a row lacks `id`, `is_fl` or `pbid`
 */
export async function aggregateFLCounts(
  rows: AsyncIterable<DSVRecord> | Iterable<DSVRecord>,
  index: ClassifyIndex
): Promise<FLCountResult> {
  const counts: CountMatrix = new Map();
  let flReads = 0;
  let counted = 0;
  let skippedExcluded = 0;

  for await (const row of rows) {
    const { id, is_fl: isFl, pbid } = row.values;
    if (id === undefined || isFl === undefined || pbid === undefined) {
      throw new FormatError(
        "Read-status row lacks the id, is_fl or pbid field",
        "read-status table",
        [...READ_STAT_REQUIRED_FIELDS].filter((field) => row.values[field] === undefined),
        row.lineNumber
      );
    }
    if (isFl !== FULL_LENGTH_FLAG) continue;
    flReads++;

    const primer = index.lookup.get(id);
    if (primer === undefined) {
      if (index.excluded.has(id)) {
        skippedExcluded++;
        continue;
      }
      throw new MissingReadError(id, pbid, row.lineNumber);
    }

    incrementCount(counts, pbid, primer);
    counted++;
  }

  return { counts, flReads, counted, skippedExcluded };
}

/**
 * Read a tab-delimited read-status table (optionally gzipped) and aggregate it
 *
 * @throws {MissingFileError} When the file does not exist
 */
export async function readReadStat(path: string, index: ClassifyIndex): Promise<FLCountResult> {
  if (!(await exists(path))) {
    throw new MissingFileError(path, "Read-status table");
  }
  const parser = new TSVParser({ requiredFields: [...READ_STAT_REQUIRED_FIELDS] });
  return aggregateFLCounts(parser.parseFile(path), index);
}
