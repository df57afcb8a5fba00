/**
 * Compression format detection for pipeline output files
 *
 * Classify reports and read-status tables are often shipped gzipped; the
 * detector decides from the extension or the first bytes whether to inflate.
 */

import { CompressionError } from "../errors";
import type { CompressionDetection, CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Gzip detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("classify_report.csv.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])).format; // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from magic bytes
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const matches =
      bytes.length >= GZIP_MAGIC_BYTES.length &&
      GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte);

    if (matches) {
      return { format: "gzip", confidence: 1.0, detectionMethod: "magic-bytes" };
    }
    // Empty input says nothing either way
    return {
      format: "none",
      confidence: bytes.length === 0 ? 0.5 : 0.9,
      detectionMethod: "magic-bytes",
    };
  }

  /**
   * Combine extension and magic bytes. Magic bytes win when they disagree.
   */
  static hybrid(filePath: string, bytes?: Uint8Array): CompressionDetection {
    const fromExtension = CompressionDetector.fromExtension(filePath);
    if (bytes === undefined) {
      return { format: fromExtension, confidence: 0.6, detectionMethod: "extension" };
    }
    return CompressionDetector.fromMagicBytes(bytes);
  }
}
