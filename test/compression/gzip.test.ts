/**
 * Tests for gzip compression through node:zlib
 */

import { describe, expect, test } from "vitest";
import { compress, decompress } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";

describe("gzip", () => {
  test("compressed output starts with the gzip magic bytes", async () => {
    const compressed = await compress(new TextEncoder().encode("id,0--1\nPB.1.1,3\n"));
    expect(compressed[0]).toBe(0x1f);
    expect(compressed[1]).toBe(0x8b);
  });

  test("decompress restores the original text", async () => {
    const text = "id\tis_fl\tpbid\nread-1\tY\tPB.1.1\n";
    const restored = await decompress(await compress(new TextEncoder().encode(text), 9));
    expect(new TextDecoder().decode(restored)).toBe(text);
  });

  test("rejects data without gzip magic bytes", async () => {
    await expect(decompress(new TextEncoder().encode("plain text"))).rejects.toThrow(
      "Invalid gzip magic bytes"
    );
  });

  test("reports truncated gzip data as a CompressionError", async () => {
    const compressed = await compress(new TextEncoder().encode("x".repeat(1000)));
    await expect(decompress(compressed.subarray(0, 12))).rejects.toBeInstanceOf(CompressionError);
  });
});
