/**
 * Tests for compression format detection
 *
 * Validates magic byte detection, extension-based detection, and the hybrid
 * approach used when reading pipeline tables.
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test("should detect gzip compression from .gz extension", () => {
      expect(CompressionDetector.fromExtension("classify_report.csv.gz")).toBe("gzip");
    });

    test("should detect gzip compression from .gzip extension", () => {
      expect(CompressionDetector.fromExtension("mapped.fastq.gzip")).toBe("gzip");
    });

    test("should return none for uncompressed files", () => {
      expect(CompressionDetector.fromExtension("mapped.read_stat.txt")).toBe("none");
    });

    test("should handle case insensitive extensions", () => {
      expect(CompressionDetector.fromExtension("MAPPED.FASTQ.GZ")).toBe("gzip");
    });

    test("should reject an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });

  describe("fromMagicBytes", () => {
    test("should detect gzip magic bytes with full confidence", () => {
      const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08, 0x00]));
      expect(detection).toEqual({ format: "gzip", confidence: 1.0, detectionMethod: "magic-bytes" });
    });

    test("should report plain text as uncompressed", () => {
      const detection = CompressionDetector.fromMagicBytes(new TextEncoder().encode("id,"));
      expect(detection.format).toBe("none");
      expect(detection.confidence).toBe(0.9);
    });

    test("should lower confidence for empty input", () => {
      expect(CompressionDetector.fromMagicBytes(new Uint8Array()).confidence).toBe(0.5);
    });
  });

  describe("hybrid", () => {
    test("magic bytes win over the extension", () => {
      const detection = CompressionDetector.hybrid("table.csv.gz", new TextEncoder().encode("id"));
      expect(detection.format).toBe("none");
      expect(detection.detectionMethod).toBe("magic-bytes");
    });

    test("falls back to the extension without bytes", () => {
      expect(CompressionDetector.hybrid("table.csv.gz")).toEqual({
        format: "gzip",
        confidence: 0.6,
        detectionMethod: "extension",
      });
    });
  });
});
