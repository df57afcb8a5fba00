/**
 * Classify report indexing
 */

import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FormatError, MissingFileError } from "../../src/errors";
import type { DSVRecord } from "../../src/formats/dsv";
import { buildClassifyIndex, readClassifyReport } from "../../src/operations/classify-index";
import { CLASSIFY_CSV, makeTempDir, removeTempDir, writeFixture } from "../utils/fixtures";

function row(lineNumber: number, values: Record<string, string>): DSVRecord {
  return { format: "dsv", lineNumber, values };
}

describe("buildClassifyIndex", () => {
  test("maps reads to primers and collects the primer set", async () => {
    const index = await buildClassifyIndex([
      row(2, { id: "r1", primer: "2" }),
      row(3, { id: "r2", primer: "3" }),
      row(4, { id: "r3", primer: "2" }),
    ]);
    expect([...index.primers]).toEqual(["2", "3"]);
    expect([...index.lookup]).toEqual([
      ["r1", "2"],
      ["r2", "3"],
      ["r3", "2"],
    ]);
    expect(index.duplicates).toBe(0);
  });

  test("keeps NA reads out of the primers and lookup", async () => {
    const index = await buildClassifyIndex([
      row(2, { id: "r1", primer: "NA" }),
      row(3, { id: "r2", primer: "1" }),
    ]);
    expect([...index.primers]).toEqual(["1"]);
    expect(index.lookup.has("r1")).toBe(false);
    expect([...index.excluded]).toEqual(["r1"]);
  });

  test("prefers primer_index when present", async () => {
    const index = await buildClassifyIndex([
      row(2, { id: "r1", primer: "1", primer_index: "0--1" }),
      row(3, { id: "r2", primer: "7", primer_index: "0--7" }),
    ]);
    expect([...index.primers]).toEqual(["0--1", "0--7"]);
    expect(index.lookup.get("r2")).toBe("0--7");
  });

  test("last row wins for a repeated read id", async () => {
    const index = await buildClassifyIndex([
      row(2, { id: "r1", primer: "2" }),
      row(3, { id: "r1", primer: "3" }),
    ]);
    expect(index.lookup.get("r1")).toBe("3");
    expect(index.duplicates).toBe(1);
    expect([...index.primers]).toEqual(["2", "3"]);
  });

  test("rejects rows without a primer", async () => {
    await expect(buildClassifyIndex([row(5, { id: "r1" })])).rejects.toMatchObject({
      name: "FormatError",
      missingFields: ["primer"],
      lineNumber: 5,
    });
  });

  test("empty input gives an empty index", async () => {
    const index = await buildClassifyIndex([]);
    expect(index.primers.size).toBe(0);
    expect(index.lookup.size).toBe(0);
  });
});

describe("readClassifyReport", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir("classify");
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test("indexes a legacy classify report", async () => {
    const path = await writeFixture(join(dir, "classify_report.csv"), CLASSIFY_CSV);
    const index = await readClassifyReport(path);
    expect([...index.primers].sort()).toEqual(["2", "3"]);
    expect(index.lookup.size).toBe(4);
    expect(index.lookup.get("read-e")).toBe("3");
    expect([...index.excluded]).toEqual(["read-d"]);
  });

  test("indexes an IsoSeq3 report by primer_index", async () => {
    const path = await writeFixture(
      join(dir, "isoseq3.csv"),
      "id,strand,fivelen,threelen,polyAlen,insertlen,primer_index,primer\n" +
        "m1/1/ccs,+,30,40,20,1500,0--1,1\n" +
        "m1/2/ccs,+,30,40,20,1400,0--2,2\n"
    );
    const index = await readClassifyReport(path);
    expect([...index.primers]).toEqual(["0--1", "0--2"]);
    expect(index.lookup.get("m1/2/ccs")).toBe("0--2");
  });

  test("fails on a header without primer", async () => {
    const path = await writeFixture(join(dir, "noprimer.csv"), "id,strand\nr1,+\n");
    await expect(readClassifyReport(path)).rejects.toThrow(FormatError);
    await expect(readClassifyReport(path)).rejects.toThrow("CSV is missing required field: primer");
  });

  test("fails on an empty report instead of indexing nothing", async () => {
    const path = await writeFixture(join(dir, "empty.csv"), "");
    await expect(readClassifyReport(path)).rejects.toMatchObject({
      name: "FormatError",
      missingFields: ["id", "primer"],
    });
  });

  test("fails on a report of blank lines", async () => {
    const path = await writeFixture(join(dir, "blank.csv"), "\n\n\n");
    await expect(readClassifyReport(path)).rejects.toThrow("CSV is missing required fields: id, primer");
  });

  test("fails when the file is missing", async () => {
    await expect(readClassifyReport(join(dir, "absent.csv"))).rejects.toBeInstanceOf(
      MissingFileError
    );
  });
});
