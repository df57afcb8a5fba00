/**
 * fl-demux: demultiplex full-length read counts by primer
 *
 * Joins a long-read pipeline's classify report and read-status table into a
 * per-isoform, per-primer count matrix.
 */

// Compression
export { CompressionDetector, compressGzip, decompressGzip } from "./compression";
// Error types
export {
  CompressionError,
  DSVParseError,
  FileError,
  FlDemuxError,
  FormatError,
  MissingFileError,
  MissingReadError,
  ParseError,
  ValidationError,
} from "./errors";
// Delimited text
export {
  CSVParser,
  CSVWriter,
  DSVParser,
  DSVWriter,
  TSVParser,
} from "./formats/dsv";
export type { DSVParserOptions, DSVRecord, DSVWriterOptions } from "./formats/dsv";
// FASTQ
export { FastqParser } from "./formats/fastq";
export type { FastqParserOptions } from "./formats/fastq";
// Primer names
export { parsePrimerNames, readPrimerNames } from "./formats/primer-names";
// File I/O
export { exists, isDirectory, readBytes, readToString } from "./io/file-reader";
export { makeDirectory, makeSymlink, writeBytes, writeString } from "./io/file-writer";
// Logging
export { createConsoleLogger, type Logger, silentLogger } from "./logger";
// Operations
export * from "./operations";
// Core types
export type {
  ClassifyIndex,
  CountMatrix,
  FastqSequence,
  FLCountResult,
  IsoformId,
  PrimerColumn,
  PrimerId,
  PrimerNameOverride,
  ReadId,
} from "./types";
export { VERSION } from "./version";
