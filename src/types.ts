/**
 * Core type definitions for FL count demultiplexing
 *
 * Primer, read and isoform identifiers are plain strings. The aliases name
 * the role a string plays at each seam of the join.
 */

import { type } from "arktype";

/** Barcode/primer token, e.g. `"3"` (IsoSeq1/2) or `"0--7"` (IsoSeq3). Never parsed. */
export type PrimerId = string;

/** Sequencing read identifier; join key between classify report and read-status table */
export type ReadId = string;

/** Collapsed transcript identifier ("pbid"), e.g. `PB.3811.1` */
export type IsoformId = string;

/**
 * Sparse isoform × primer counts. Absent pairs read as zero.
 */
export type CountMatrix = Map<IsoformId, Map<PrimerId, number>>;

/**
 * Primer display labels. Insertion order is the output column order.
 */
export type PrimerNameOverride = Map<PrimerId, string>;

/**
 * One output column
 */
export interface PrimerColumn {
  readonly primer: PrimerId;
  readonly label: string;
}

/**
 * Index built from the classification report
 */
export interface ClassifyIndex {
  /** Distinct primer tokens of full-length reads */
  readonly primers: ReadonlySet<PrimerId>;
  /** read id → primer token, last row wins */
  readonly lookup: ReadonlyMap<ReadId, PrimerId>;
  /** Reads the report marks `NA` (non-full-length or unclassifiable) */
  readonly excluded: ReadonlySet<ReadId>;
  /** Number of rows that overwrote an earlier lookup entry */
  readonly duplicates: number;
}

/**
 * Result of folding the read-status table into counts
 */
export interface FLCountResult {
  readonly counts: CountMatrix;
  /** Rows flagged full-length */
  readonly flReads: number;
  /** Full-length rows that incremented a counter */
  readonly counted: number;
  /** Full-length rows skipped because the classify report marks them `NA` */
  readonly skippedExcluded: number;
}

/**
 * Base parser options shared by all text parsers
 */
export interface ParserOptions {
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to record source line numbers on records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Minimal FASTQ record
 */
export interface FastqSequence {
  readonly format: "fastq";
  readonly id: string;
  readonly description?: string;
  readonly sequence: string;
  readonly quality: string;
  readonly length: number;
  readonly lineNumber?: number;
}

/**
 * Compression formats handled transparently on read and write
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** 0-1 */
  readonly confidence: number;
  readonly detectionMethod: "extension" | "magic-bytes";
}

/**
 * Branded file path, produced by FilePathSchema
 */
export type FilePath = string & { readonly __brand: "FilePath" };

export interface FileReaderOptions {
  /** Maximum file size accepted by readToString, in bytes */
  maxFileSize?: number;
  /** Decompress `.gz` / gzip-magic input */
  autoDecompress?: boolean;
}

export interface WriteOptions {
  /** Compress when the path ends in `.gz` */
  autoCompress?: boolean;
  /** gzip level, 1-9 */
  compressionLevel?: number;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

/**
 * File path validation; rejects empty paths and embedded NUL bytes
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionLevel?": "1<=number<=9",
});
