/**
 * Gzip compression and decompression through node:zlib
 */

import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { CompressionError } from "../errors";

const gunzipAsync = promisify(gunzip);
const gzipAsync = promisify(gzip);

/**
 * Inflate a complete gzip buffer
 *
 * @throws {CompressionError} If the data is not valid gzip
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (compressed.length < 2 || compressed[0] !== 0x1f || compressed[1] !== 0x8b) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress"
    );
  }

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "decompress", err);
  }
}

/**
 * Deflate a buffer into gzip format
 */
export async function compress(data: Uint8Array, level = 6): Promise<Uint8Array> {
  try {
    const result = await gzipAsync(data, { level });
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "compress", err);
  }
}
