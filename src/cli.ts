/**
 * Command-line interface for fl-demux
 *
 * Usage: fl-demux [-j JOB_DIR] [--mapped_fastq F] [--read_stat F]
 *                 [--classify_csv F] [--primer_names F] [--link_dir D]
 *                 [--quiet] -o OUTPUT
 */

import { parseArgs } from "node:util";
import { FlDemuxError } from "./errors";
import { createConsoleLogger, type Logger } from "./logger";
import { type DemuxOptions, demultiplex } from "./operations/demux";
import { VERSION } from "./version";

/** Where the CLI writes its own text; swapped out in tests */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

const consoleOutput: CliOutput = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/** Argument definitions for node:util parseArgs */
const argConfig = {
  options: {
    job_dir: { type: "string" as const, short: "j" },
    mapped_fastq: { type: "string" as const },
    read_stat: { type: "string" as const },
    classify_csv: { type: "string" as const },
    primer_names: { type: "string" as const },
    link_dir: { type: "string" as const },
    output: { type: "string" as const, short: "o" },
    quiet: { type: "boolean" as const, short: "q", default: false },
    version: { type: "boolean" as const, short: "v", default: false },
    help: { type: "boolean" as const, short: "h", default: false },
  },
  strict: true,
  allowPositionals: false,
} as const;

export const USAGE = `fl-demux ${VERSION}: per-isoform, per-primer full-length read counts

Usage:
  fl-demux -j JOB_DIR -o OUTPUT [options]
  fl-demux --mapped_fastq F --read_stat F --classify_csv F -o OUTPUT [options]

Inputs:
  -j, --job_dir <dir>       Pipeline job directory; input paths are found inside it
  --mapped_fastq <file>     Mapped-read FASTQ (isoform ids before the first "|")
  --read_stat <file>        Tab-delimited read-status table (id, is_fl, pbid)
  --classify_csv <file>     Comma-delimited classify report (id, primer[, primer_index])
  --primer_names <file>     Primer-name overrides, "<primer> <label>" per line

Output:
  -o, --output <file>       Count matrix CSV ("-" for stdout, ".gz" to compress)
  --link_dir <dir>          Symlink job-directory inputs here (with --job_dir)

Other:
  -q, --quiet               Only print warnings and errors
  -v, --version             Print version and exit
  -h, --help                Print this help and exit`;

/**
 * Map parsed flags onto demultiplex options, dropping absent ones
 */
function toDemuxOptions(
  values: ReturnType<typeof parseArgs<typeof argConfig>>["values"],
  output: string,
  logger: Logger
): DemuxOptions {
  const options: DemuxOptions = { output, logger };
  if (values.job_dir !== undefined) options.jobDir = values.job_dir;
  if (values.mapped_fastq !== undefined) options.mappedFastq = values.mapped_fastq;
  if (values.read_stat !== undefined) options.readStat = values.read_stat;
  if (values.classify_csv !== undefined) options.classifyCsv = values.classify_csv;
  if (values.primer_names !== undefined) options.primerNames = values.primer_names;
  if (values.link_dir !== undefined) options.linkDir = values.link_dir;
  return options;
}

/**
 * Run the CLI against an argument vector and resolve to the exit code
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(process.argv.slice(2));
 * ```
 */
export async function runCli(
  argv: readonly string[],
  out: CliOutput = consoleOutput,
  logger?: Logger
): Promise<number> {
  let parsed: ReturnType<typeof parseArgs<typeof argConfig>>;
  try {
    parsed = parseArgs({ ...argConfig, args: [...argv] });
  } catch (error) {
    out.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    out.stderr(USAGE);
    return 1;
  }

  const { values } = parsed;

  if (values.help) {
    out.stdout(USAGE);
    return 0;
  }

  if (values.version) {
    out.stdout(VERSION);
    return 0;
  }

  if (values.output === undefined) {
    out.stderr("Error: -o/--output is required");
    out.stderr(USAGE);
    return 1;
  }

  try {
    await demultiplex(
      toDemuxOptions(values, values.output, logger ?? createConsoleLogger({ quiet: values.quiet }))
    );
    return 0;
  } catch (error) {
    if (error instanceof FlDemuxError) {
      out.stderr(error.toString());
      return 1;
    }
    throw error;
  }
}
