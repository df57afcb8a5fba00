/**
 * Job-directory resolution
 *
 * Finds the mapped FASTQ, read-status table and classify report inside an
 * IsoSeq1 or IsoSeq2 job directory. The version is told apart by which task
 * directory holds the mapped FASTQ.
 */

import { join, resolve } from "node:path";
import { MissingFileError } from "../errors";
import { exists, isDirectory } from "../io/file-reader";
import { makeDirectory, makeSymlink } from "../io/file-writer";

export type IsoSeqVersion = "1" | "2";

export interface ResolvedJobFiles {
  readonly version: IsoSeqVersion;
  readonly mappedFastq: string;
  readonly mappedGff: string;
  readonly readStat: string;
  readonly classifyCsv: string;
}

/**
 * Task directory (relative to the job directory) holding the mapped outputs
 */
export const POST_MAPPING_TASK_DIRS: Readonly<Record<IsoSeqVersion, string>> = {
  "1": join("tasks", "pbtranscript.tasks.post_mapping_to_genome-0"),
  "2": join("tasks", "pbtranscript2tools.tasks.post_mapping_to_genome-0"),
};

export const CLASSIFY_REPORT_PATH = join("tasks", "pbcoretools.tasks.gather_csv-1", "file.csv");

const MAPPED_FASTQ = "output_mapped.fastq";
const MAPPED_GFF = "output_mapped.gff";
const READ_STAT = "output_mapped.no5merge.collapsed.read_stat.txt";

/**
 * Link names used when staging job files into a working directory
 */
export const LINK_NAMES = {
  mappedFastq: "mapped.fastq",
  mappedGff: "mapped.gff",
  readStat: "mapped.read_stat.txt",
  classifyCsv: "classify_report.csv",
} as const;

function jobFilesFor(jobDir: string, version: IsoSeqVersion): ResolvedJobFiles {
  const root = resolve(jobDir);
  const taskDir = join(root, POST_MAPPING_TASK_DIRS[version]);
  return {
    version,
    mappedFastq: join(taskDir, MAPPED_FASTQ),
    mappedGff: join(taskDir, MAPPED_GFF),
    readStat: join(taskDir, READ_STAT),
    classifyCsv: join(root, CLASSIFY_REPORT_PATH),
  };
}

/**
 * Locate input files in a job directory
 *
 * IsoSeq1 wins when its mapped FASTQ exists; otherwise IsoSeq2 paths are
 * returned. Paths are absolute and not checked for existence here.
 *
 * @throws {MissingFileError} When the job directory itself does not exist
 */
export async function resolveJobDirectory(jobDir: string): Promise<ResolvedJobFiles> {
  if (!(await isDirectory(jobDir))) {
    throw new MissingFileError(jobDir, "Job directory");
  }

  const isoseq1 = jobFilesFor(jobDir, "1");
  if (await exists(isoseq1.mappedFastq)) {
    return isoseq1;
  }
  return jobFilesFor(jobDir, "2");
}

/**
 * Symlink resolved job files into `outDir` under the standard link names
 *
 * @returns Paths of the created links
 * @throws {FileError} When a link name is already taken
 */
export async function linkJobFiles(
  files: ResolvedJobFiles,
  outDir: string
): Promise<ResolvedJobFiles> {
  await makeDirectory(outDir);
  const linked: ResolvedJobFiles = {
    version: files.version,
    mappedFastq: join(outDir, LINK_NAMES.mappedFastq),
    mappedGff: join(outDir, LINK_NAMES.mappedGff),
    readStat: join(outDir, LINK_NAMES.readStat),
    classifyCsv: join(outDir, LINK_NAMES.classifyCsv),
  };

  await makeSymlink(files.mappedFastq, linked.mappedFastq);
  await makeSymlink(files.mappedGff, linked.mappedGff);
  await makeSymlink(files.readStat, linked.readStat);
  await makeSymlink(files.classifyCsv, linked.classifyCsv);

  return linked;
}
