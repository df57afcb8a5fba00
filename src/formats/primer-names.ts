/**
 * Primer-name override file
 *
 * Plain text, one `<primer> <label>` pair per line, whitespace separated:
 *
 * ```
 * 0--1  liver
 * 0--2  brain
 * ```
 *
 * Line order becomes the output column order.
 */

import { FormatError } from "../errors";
import { readToString } from "../io/file-reader";
import type { PrimerNameOverride } from "../types";

/**
 * Parse primer-name override text
 *
 * Blank lines are skipped. A repeated primer keeps its first position and
 * takes the later label.
 *
 * @throws {FormatError} When a line does not hold exactly two tokens
 */
export function parsePrimerNames(content: string): PrimerNameOverride {
  const names: PrimerNameOverride = new Map();

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === "") return;

    const tokens = trimmed.split(/\s+/);
    const [primer, label] = tokens;
    if (tokens.length !== 2 || primer === undefined || label === undefined) {
      throw new FormatError(
        `Expected "<primer> <label>", found ${tokens.length} token${tokens.length === 1 ? "" : "s"}`,
        "primer names",
        [],
        index + 1,
        line
      );
    }
    names.set(primer, label);
  });

  return names;
}

/**
 * Read and parse a primer-name override file
 */
export async function readPrimerNames(path: string): Promise<PrimerNameOverride> {
  return parsePrimerNames(await readToString(path));
}
