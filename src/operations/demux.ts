/**
 * FL count demultiplexing
 *
 * Joins the classify report (read → primer) with the read-status table
 * (read → isoform, full-length flag) and writes one row of per-primer
 * full-length counts for every isoform in the mapped-read FASTQ.
 */

import { type } from "arktype";
import { MissingFileError, ValidationError } from "../errors";
import { readPrimerNames } from "../formats/primer-names";
import { exists } from "../io/file-reader";
import { createConsoleLogger, type Logger } from "../logger";
import type { PrimerColumn, PrimerNameOverride } from "../types";
import { readClassifyReport } from "./classify-index";
import { readIsoformIds, resolvePrimerColumns, STDOUT_PATH, writeCountMatrix } from "./count-matrix";
import { readReadStat } from "./fl-count";
import { type IsoSeqVersion, linkJobFiles, resolveJobDirectory } from "./job-dir";

export interface DemuxOptions {
  /** Job directory; when given, the three input paths are located inside it */
  jobDir?: string;
  mappedFastq?: string;
  readStat?: string;
  classifyCsv?: string;
  /** Primer-name override file */
  primerNames?: string;
  /** In-memory override, used when `primerNames` is not given */
  primerNameOverride?: PrimerNameOverride;
  /** Output path, `-` for stdout */
  output: string;
  /** Symlink job-directory inputs here and read them through the links */
  linkDir?: string;
  logger?: Logger;
}

export interface DemuxInputs {
  readonly mappedFastq: string;
  readonly readStat: string;
  readonly classifyCsv: string;
  readonly primerNames?: string;
  readonly isoseqVersion?: IsoSeqVersion;
}

export interface DemuxSummary {
  readonly output: string;
  readonly inputs: DemuxInputs;
  readonly isoforms: number;
  readonly primers: number;
  readonly columns: readonly PrimerColumn[];
  readonly flReads: number;
  readonly counted: number;
  readonly skippedExcluded: number;
  readonly duplicateReadIds: number;
}

/**
 * ArkType schema for demultiplexing options
 */
export const DemuxOptionsSchema = type({
  "jobDir?": "string>0",
  "mappedFastq?": "string>0",
  "readStat?": "string>0",
  "classifyCsv?": "string>0",
  "primerNames?": "string>0",
  output: "string>0",
  "linkDir?": "string>0",
}).narrow((options, ctx) => {
  const explicit = [options.mappedFastq, options.readStat, options.classifyCsv];
  if (options.jobDir === undefined && explicit.some((path) => path === undefined)) {
    return ctx.reject({
      expected: "jobDir, or all of mappedFastq, readStat and classifyCsv",
      actual: "an incomplete set of input files",
    });
  }
  if (options.linkDir !== undefined && options.jobDir === undefined) {
    return ctx.reject({
      path: ["linkDir"],
      expected: "linkDir only together with jobDir",
      actual: options.linkDir,
    });
  }
  return true;
});

/**
 * Work out input paths from a job directory or the explicit options
 */
async function resolveInputs(options: DemuxOptions, logger: Logger): Promise<DemuxInputs> {
  const primerNames = options.primerNames !== undefined ? { primerNames: options.primerNames } : {};

  if (options.jobDir !== undefined) {
    let files = await resolveJobDirectory(options.jobDir);
    logger.info(`Detecting IsoSeq${files.version} task directories...`);
    if (options.linkDir !== undefined) {
      files = await linkJobFiles(files, options.linkDir);
    }
    return {
      mappedFastq: files.mappedFastq,
      readStat: files.readStat,
      classifyCsv: files.classifyCsv,
      isoseqVersion: files.version,
      ...primerNames,
    };
  }

  const { mappedFastq, readStat, classifyCsv } = options;
  if (mappedFastq === undefined || readStat === undefined || classifyCsv === undefined) {
    throw new ValidationError("mappedFastq, readStat and classifyCsv are required without jobDir");
  }
  return { mappedFastq, readStat, classifyCsv, ...primerNames };
}

/**
 * Fail before any parsing if an input is missing
 */
async function checkInputsExist(inputs: DemuxInputs): Promise<void> {
  const required: [string | undefined, string][] = [
    [inputs.classifyCsv, "Classify report"],
    [inputs.readStat, "Read-status table"],
    [inputs.mappedFastq, "Mapped-read FASTQ"],
    [inputs.primerNames, "Primer-name file"],
  ];
  for (const [path, role] of required) {
    if (path !== undefined && !(await exists(path))) {
      throw new MissingFileError(path, role);
    }
  }
}

/**
 * Produce the per-isoform, per-primer full-length count matrix
 *
 * @throws {ValidationError} On an invalid option set
 * @throws {MissingFileError} When an input file is missing
 * @throws {FormatError} When a table lacks a required field
 * @throws {MissingReadError} When a full-length read is not in the classify report
 * @throws {FileError} When the output cannot be written
 *
 * @example
 * ```typescript
 * const summary = await demultiplex({
 *   mappedFastq: "mapped.fastq",
 *   readStat: "mapped.read_stat.txt",
 *   classifyCsv: "classify_report.csv",
 *   output: "fl_count.csv",
 * });
 * console.log(`${summary.isoforms} isoforms × ${summary.columns.length} primers`);
 * ```
 */
export async function demultiplex(options: DemuxOptions): Promise<DemuxSummary> {
  const validation = DemuxOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid demultiplex options: ${validation.summary}`);
  }
  const logger = options.logger ?? createConsoleLogger();

  const inputs = await resolveInputs(options, logger);
  await checkInputsExist(inputs);

  logger.info(`Reading ${inputs.classifyCsv}....`);
  const index = await readClassifyReport(inputs.classifyCsv);
  if (index.duplicates > 0) {
    logger.warn(
      `${index.duplicates} read id(s) appear more than once in ${inputs.classifyCsv}; the last row wins`
    );
  }

  logger.info(`Reading ${inputs.readStat}....`);
  const fl = await readReadStat(inputs.readStat, index);
  if (fl.skippedExcluded > 0) {
    logger.warn(
      `${fl.skippedExcluded} full-length read(s) are marked NA in the classify report and were not counted`
    );
  }

  let override = options.primerNameOverride;
  if (inputs.primerNames !== undefined) {
    logger.info(`Reading ${inputs.primerNames}....`);
    override = await readPrimerNames(inputs.primerNames);
  }
  const columns = resolvePrimerColumns(index.primers, override);

  logger.info(`Reading ${inputs.mappedFastq}....`);
  const isoforms = await readIsoformIds(inputs.mappedFastq);

  await writeCountMatrix(options.output, isoforms, fl.counts, columns);
  if (options.output !== STDOUT_PATH) {
    logger.info(`Count file written to ${options.output}.`);
  }

  return {
    output: options.output,
    inputs,
    isoforms: isoforms.length,
    primers: index.primers.size,
    columns,
    flReads: fl.flReads,
    counted: fl.counted,
    skippedExcluded: fl.skippedExcluded,
    duplicateReadIds: index.duplicates,
  };
}
