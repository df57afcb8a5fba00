/**
 * Full-length read counting
 */

import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { MissingFileError, MissingReadError } from "../../src/errors";
import type { DSVRecord } from "../../src/formats/dsv";
import { aggregateFLCounts, getCount, incrementCount, readReadStat } from "../../src/operations/fl-count";
import type { ClassifyIndex, CountMatrix } from "../../src/types";
import { makeTempDir, READ_STAT_TSV, removeTempDir, writeFixture } from "../utils/fixtures";

function row(lineNumber: number, id: string, isFl: string, pbid: string): DSVRecord {
  return { format: "dsv", lineNumber, values: { id, is_fl: isFl, pbid } };
}

const index: ClassifyIndex = {
  primers: new Set(["2", "3"]),
  lookup: new Map([
    ["read-a", "2"],
    ["read-b", "3"],
    ["read-c", "2"],
    ["read-e", "3"],
  ]),
  excluded: new Set(["read-d"]),
  duplicates: 0,
};

describe("count helpers", () => {
  test("getCount reads zero for untouched pairs", () => {
    const counts: CountMatrix = new Map();
    expect(getCount(counts, "PB.1.1", "2")).toBe(0);
    incrementCount(counts, "PB.1.1", "2");
    incrementCount(counts, "PB.1.1", "2");
    expect(getCount(counts, "PB.1.1", "2")).toBe(2);
    expect(getCount(counts, "PB.1.1", "3")).toBe(0);
  });
});

describe("aggregateFLCounts", () => {
  test("counts full-length reads by isoform and primer", async () => {
    const result = await aggregateFLCounts(
      [
        row(2, "read-a", "Y", "PB.1.1"),
        row(3, "read-b", "Y", "PB.1.1"),
        row(4, "read-e", "Y", "PB.1.1"),
        row(5, "read-c", "Y", "PB.2.1"),
      ],
      index
    );
    expect(getCount(result.counts, "PB.1.1", "2")).toBe(1);
    expect(getCount(result.counts, "PB.1.1", "3")).toBe(2);
    expect(getCount(result.counts, "PB.2.1", "2")).toBe(1);
    expect(result.flReads).toBe(4);
    expect(result.counted).toBe(4);
  });

  test("ignores rows whose is_fl is not Y", async () => {
    const result = await aggregateFLCounts(
      [row(2, "read-a", "N", "PB.1.1"), row(3, "read-b", "y", "PB.1.1"), row(4, "unknown", "N", "PB.9.1")],
      index
    );
    expect(result.counts.size).toBe(0);
    expect(result.flReads).toBe(0);
  });

  test("skips full-length reads the classify report marks NA", async () => {
    const result = await aggregateFLCounts([row(2, "read-d", "Y", "PB.2.1")], index);
    expect(result.counts.size).toBe(0);
    expect(result.flReads).toBe(1);
    expect(result.skippedExcluded).toBe(1);
  });

  test("throws MissingReadError for an unknown full-length read", async () => {
    const error = await aggregateFLCounts(
      [row(2, "read-a", "Y", "PB.1.1"), row(3, "stranger", "Y", "PB.4.1")],
      index
    ).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MissingReadError);
    expect(error).toMatchObject({ readId: "stranger", isoformId: "PB.4.1", lineNumber: 3 });
  });

  test("rejects rows without pbid", async () => {
    const rows: DSVRecord[] = [{ format: "dsv", lineNumber: 2, values: { id: "read-a", is_fl: "Y" } }];
    await expect(aggregateFLCounts(rows, index)).rejects.toMatchObject({
      name: "FormatError",
      missingFields: ["pbid"],
    });
  });
});

describe("readReadStat", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir("readstat");
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test("aggregates a tab-delimited read-status table", async () => {
    const path = await writeFixture(join(dir, "read_stat.txt"), READ_STAT_TSV);
    const result = await readReadStat(path, index);
    expect([...(result.counts.get("PB.1.1") ?? [])]).toEqual([
      ["2", 1],
      ["3", 1],
    ]);
    expect(result.flReads).toBe(3);
    expect(result.counted).toBe(2);
    expect(result.skippedExcluded).toBe(1);
  });

  test("requires id, is_fl and pbid in the header", async () => {
    const path = await writeFixture(join(dir, "bad.txt"), "id\tlength\tstat\nr1\t10\tunique\n");
    await expect(readReadStat(path, index)).rejects.toThrow(
      "TSV is missing required fields: is_fl, pbid"
    );
  });

  test("fails on an empty table instead of counting nothing", async () => {
    const path = await writeFixture(join(dir, "empty.txt"), "");
    await expect(readReadStat(path, index)).rejects.toMatchObject({
      name: "FormatError",
      missingFields: ["id", "is_fl", "pbid"],
    });
  });

  test("fails when the file is missing", async () => {
    await expect(readReadStat(join(dir, "absent.txt"), index)).rejects.toBeInstanceOf(
      MissingFileError
    );
  });
});
