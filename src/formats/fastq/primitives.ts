/**
 * Small FASTQ line predicates and header extractors
 */

/**
 * Header lines start with '@'
 */
export function isValidHeader(line: string): boolean {
  return line.startsWith("@") && line.length > 1;
}

/**
 * Separator lines start with '+' (optionally repeating the ID)
 */
export function isValidSeparator(line: string): boolean {
  return line.startsWith("+");
}

/**
 * Extract sequence ID from a header line: text after '@' up to the first whitespace
 */
export function extractId(headerLine: string): string {
  return headerLine.substring(1).split(/\s/)[0] ?? "";
}

/**
 * Extract description from a header line, or undefined if none
 */
export function extractDescription(headerLine: string): string | undefined {
  const match = /\s/.exec(headerLine);
  if (match === null) return undefined;
  const description = headerLine.substring(match.index + 1).trim();
  return description === "" ? undefined : description;
}
