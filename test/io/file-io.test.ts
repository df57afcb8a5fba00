/**
 * File I/O through the Effect Platform FileSystem service
 */

import { readFile, symlink } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { CompressionError, FileError, ValidationError } from "../../src/errors";
import { exists, getSize, isDirectory, readBytes, readToString } from "../../src/io/file-reader";
import { makeDirectory, makeSymlink, writeBytes, writeString } from "../../src/io/file-writer";
import { makeTempDir, removeTempDir, writeFixture } from "../utils/fixtures";

describe("file I/O", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir("io");
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  describe("exists / isDirectory", () => {
    test("true for a regular file", async () => {
      const path = await writeFixture(join(dir, "plain.txt"), "x");
      expect(await exists(path)).toBe(true);
      expect(await isDirectory(path)).toBe(false);
    });

    test("false for a directory or a missing path", async () => {
      expect(await exists(dir)).toBe(false);
      expect(await isDirectory(dir)).toBe(true);
      expect(await exists(join(dir, "nope.txt"))).toBe(false);
    });

    test("follows symlinks", async () => {
      const target = await writeFixture(join(dir, "target.txt"), "x");
      const link = join(dir, "link.txt");
      await symlink(target, link);
      expect(await exists(link)).toBe(true);
    });

    test("rejects paths with NUL bytes", async () => {
      await expect(exists("bad\0path")).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("reading", () => {
    test("reads text and reports size", async () => {
      const path = await writeFixture(join(dir, "table.tsv"), "id\tpbid\n");
      expect(await readToString(path)).toBe("id\tpbid\n");
      expect(await getSize(path)).toBe(8);
    });

    test("enforces maxFileSize", async () => {
      const path = await writeFixture(join(dir, "big.txt"), "0123456789");
      await expect(readBytes(path, { maxFileSize: 5 })).rejects.toThrow(
        "File too large: 10 bytes exceeds limit of 5 bytes"
      );
    });

    test("throws FileError for a missing file", async () => {
      await expect(readToString(join(dir, "missing.csv"))).rejects.toBeInstanceOf(FileError);
    });

    test("rejects a .gz file that is not gzip", async () => {
      const path = await writeFixture(join(dir, "fake.csv.gz"), "id,primer\n");
      await expect(readToString(path)).rejects.toBeInstanceOf(CompressionError);
    });
  });

  describe("writing", () => {
    test("writeString round-trips through readToString", async () => {
      const path = join(dir, "out.csv");
      await writeString(path, "id,2\nPB.1.1,1\n");
      expect(await readToString(path)).toBe("id,2\nPB.1.1,1\n");
    });

    test("compresses .gz paths and inflates them on read", async () => {
      const path = join(dir, "out.csv.gz");
      await writeString(path, "id,3\nPB.1.1,4\n");
      const raw = await readFile(path);
      expect([raw[0], raw[1]]).toEqual([0x1f, 0x8b]);
      expect(await readToString(path)).toBe("id,3\nPB.1.1,4\n");
    });

    test("autoCompress false writes .gz paths as-is", async () => {
      const path = join(dir, "raw.csv.gz");
      await writeBytes(path, new TextEncoder().encode("abc"), { autoCompress: false });
      expect((await readFile(path)).toString("utf8")).toBe("abc");
      expect(new TextDecoder().decode(await readBytes(path, { autoDecompress: false }))).toBe("abc");
    });

    test("rejects an out-of-range compression level", async () => {
      await expect(
        writeString(join(dir, "bad.gz"), "x", { compressionLevel: 12 })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test("makeDirectory creates parents", async () => {
      const nested = join(dir, "a", "b", "c");
      await makeDirectory(nested);
      expect(await isDirectory(nested)).toBe(true);
    });

    test("makeSymlink links to the target and refuses to overwrite", async () => {
      const target = await writeFixture(join(dir, "linked-target.txt"), "payload");
      const link = join(dir, "made-link.txt");
      await makeSymlink(target, link);
      expect(await readToString(link)).toBe("payload");
      await expect(makeSymlink(target, link)).rejects.toBeInstanceOf(FileError);
    });
  });
});
