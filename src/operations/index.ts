/**
 * FL count operations
 */

export {
  buildClassifyIndex,
  CLASSIFY_REQUIRED_FIELDS,
  NON_FULL_LENGTH_PRIMER,
  readClassifyReport,
} from "./classify-index";
export {
  collectIsoformIds,
  countMatrixRows,
  formatCountMatrix,
  isoformIdFromRecordId,
  readIsoformIds,
  resolvePrimerColumns,
  STDOUT_PATH,
  writeCountMatrix,
} from "./count-matrix";
export {
  type DemuxInputs,
  type DemuxOptions,
  DemuxOptionsSchema,
  type DemuxSummary,
  demultiplex,
} from "./demux";
export {
  aggregateFLCounts,
  FULL_LENGTH_FLAG,
  getCount,
  incrementCount,
  READ_STAT_REQUIRED_FIELDS,
  readReadStat,
} from "./fl-count";
export {
  CLASSIFY_REPORT_PATH,
  type IsoSeqVersion,
  LINK_NAMES,
  linkJobFiles,
  POST_MAPPING_TASK_DIRS,
  type ResolvedJobFiles,
  resolveJobDirectory,
} from "./job-dir";
