/**
 * Compression module: gzip detection and whole-buffer (de)compression
 */

export { CompressionDetector } from "./detector";
export { compress as compressGzip, decompress as decompressGzip } from "./gzip";

export type { CompressionDetection, CompressionFormat } from "../types";
