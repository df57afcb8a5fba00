/**
 * DSV helpers
 */

/**
 * Remove byte order mark from start of text
 */
export function removeBOM(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/**
 * Handle ragged rows (rows with inconsistent column counts)
 *
 * @throws {Error} When handling is "error" and the column count differs
 */
export function handleRaggedRow(
  fields: string[],
  expectedColumns: number,
  handling: "error" | "pad" | "truncate" = "pad"
): string[] {
  if (fields.length === expectedColumns) {
    return fields;
  }

  switch (handling) {
    case "error":
      throw new Error(`Row has ${fields.length} columns, expected ${expectedColumns}`);
    case "pad": {
      const padded = [...fields];
      while (padded.length < expectedColumns) {
        padded.push("");
      }
      return padded;
    }
    case "truncate":
      return fields.slice(0, expectedColumns);
  }
}
