/**
 * Shared helpers for tests that touch the filesystem
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T> | Iterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

/**
 * Fresh directory under the OS temp dir
 */
export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `fl-demux-${prefix}-`));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

/**
 * Write a text fixture, creating parent directories
 */
export async function writeFixture(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
  return path;
}

/** Classify report: five reads, one of them non-full-length */
export const CLASSIFY_CSV = [
  "id,strand,fiveseen,polyAseen,threeseen,fiveend,polyAend,threeend,primer,chimera",
  "read-a,+,1,1,1,30,1500,1530,2,0",
  "read-b,+,1,1,1,31,1200,1231,3,0",
  "read-c,-,1,1,1,29,900,929,2,0",
  "read-d,+,0,1,1,NA,800,830,NA,NA",
  "read-e,+,1,1,1,30,700,730,3,0",
  "",
].join("\n");

/** Read-status table: read-a and read-b full-length in PB.1.1, read-d excluded */
export const READ_STAT_TSV = [
  "id\tlength\tis_fl\tstat\tpbid",
  "read-a\t1530\tY\tunique\tPB.1.1",
  "read-b\t1231\tY\tunique\tPB.1.1",
  "read-c\t929\tN\tunique\tPB.1.1",
  "read-d\t830\tY\tunique\tPB.2.1",
  "",
].join("\n");

/** Mapped reads: PB.1.1 twice (collapsed twice on the genome), then PB.2.1 */
export const MAPPED_FASTQ = [
  "@PB.1.1|chr1:100-1630(+)|transcript/1 full_length_coverage=2",
  "ACGTACGT",
  "+",
  "IIIIIIII",
  "@PB.1.1|chr1:5000-6530(+)|transcript/1",
  "ACGT",
  "+",
  "IIII",
  "@PB.2.1|chr2:10-840(-)|transcript/7",
  "GGCC",
  "+",
  "@III",
  "",
].join("\n");
