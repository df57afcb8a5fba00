/**
 * Count matrix output
 *
 * Rows follow the mapped-read FASTQ (first appearance of each isoform),
 * columns follow the primer-name override when there is one, otherwise the
 * sorted primer set.
 */

import { FileError } from "../errors";
import { CSVWriter, type DSVField } from "../formats/dsv";
import { FastqParser } from "../formats/fastq";
import type {
  CountMatrix,
  FastqSequence,
  IsoformId,
  PrimerColumn,
  PrimerId,
  PrimerNameOverride,
} from "../types";
import { getCount } from "./fl-count";

/** Writing to this path sends the matrix to standard output */
export const STDOUT_PATH = "-";

/**
 * Isoform id of a mapped read: its identifier up to the first `|`
 *
 * @example
 * ```typescript
 * isoformIdFromRecordId("PB.1.1|chr1:100-2000(+)|transcript/12"); // "PB.1.1"
 * ```
 */
export function isoformIdFromRecordId(recordId: string): IsoformId {
  const pipe = recordId.indexOf("|");
  return pipe === -1 ? recordId : recordId.slice(0, pipe);
}

/**
 * Ordered, duplicate-free isoform ids from mapped-read records
 */
export async function collectIsoformIds(
  records: AsyncIterable<FastqSequence> | Iterable<FastqSequence>
): Promise<IsoformId[]> {
  const seen = new Set<IsoformId>();
  for await (const record of records) {
    seen.add(isoformIdFromRecordId(record.id));
  }
  return [...seen];
}

/**
 * Read isoform ids from a mapped-read FASTQ file
 */
export async function readIsoformIds(path: string): Promise<IsoformId[]> {
  return collectIsoformIds(new FastqParser().parseFile(path));
}

/**
 * Decide output columns
 *
 * Without an override: sorted primer ids, each labelled with itself. With
 * one: the override's entries in insertion order (primers never observed
 * included), then every observed primer the override leaves out, sorted and
 * labelled with itself.
 */
export function resolvePrimerColumns(
  primers: Iterable<PrimerId>,
  override?: PrimerNameOverride
): PrimerColumn[] {
  const sorted = [...new Set(primers)].sort(comparePrimerIds);
  if (override === undefined) {
    return sorted.map((primer) => ({ primer, label: primer }));
  }

  const columns: PrimerColumn[] = [...override].map(([primer, label]) => ({ primer, label }));
  for (const primer of sorted) {
    if (!override.has(primer)) {
      columns.push({ primer, label: primer });
    }
  }
  return columns;
}

/**
 * Code-unit order, matching a plain string sort
 */
function comparePrimerIds(a: PrimerId, b: PrimerId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Matrix rows: header then one row per isoform, missing counts as 0
 */
export function* countMatrixRows(
  isoforms: Iterable<IsoformId>,
  counts: CountMatrix,
  columns: readonly PrimerColumn[]
): Generator<DSVField[]> {
  yield ["id", ...columns.map((column) => column.label)];
  for (const isoform of isoforms) {
    yield [isoform, ...columns.map((column) => getCount(counts, isoform, column.primer))];
  }
}

/**
 * Render the matrix as CSV text, one `\n`-terminated line per row
 */
export function formatCountMatrix(
  isoforms: Iterable<IsoformId>,
  counts: CountMatrix,
  columns: readonly PrimerColumn[]
): string {
  return new CSVWriter().formatRows(countMatrixRows(isoforms, counts, columns));
}

/**
 * Write the matrix to a file (`.gz` compressed by extension) or to stdout for `-`
 *
 * @throws {FileError} When the output cannot be written
 */
export async function writeCountMatrix(
  path: string,
  isoforms: Iterable<IsoformId>,
  counts: CountMatrix,
  columns: readonly PrimerColumn[]
): Promise<void> {
  if (path === STDOUT_PATH) {
    await writeToStdout(formatCountMatrix(isoforms, counts, columns));
    return;
  }
  await new CSVWriter().writeFile(path, countMatrixRows(isoforms, counts, columns));
}

function writeToStdout(content: string): Promise<void> {
  return new Promise((resolve, reject) => {
    process.stdout.write(content, (error) => {
      if (error) {
        reject(FileError.fromSystemError("write", STDOUT_PATH, error));
      } else {
        resolve();
      }
    });
  });
}
