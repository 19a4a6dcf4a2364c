/**
 * Unit tests for the result table CSV codec
 */

import { describe, it, expect, afterEach } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import {
  appendCsvFile,
  createTable,
  csvToTable,
  inferColumnType,
  parseCell,
  readCsvFile,
  tableToCsv,
  writeCsvFile,
} from "@/table";
import { createTempDir } from "../helpers/testDb";

const BOM = "\uFEFF";

const table = createTable(
  ["page", "clicks"],
  [
    { page: "/a", clicks: 1 },
    { page: "x,y", clicks: null },
  ],
);

describe("inferColumnType", () => {
  it("infers number, date and string columns ignoring nulls", () => {
    expect(inferColumnType([1, null, 2.5])).toBe("number");
    expect(inferColumnType(["2026-03-01", null])).toBe("date");
    expect(inferColumnType(["2026-03-01", "20260302"])).toBe("string");
    expect(inferColumnType([1, "a"])).toBe("string");
    expect(inferColumnType([null])).toBe("string");
  });
});

describe("parseCell", () => {
  it("maps empty text to null and numeric text to numbers", () => {
    expect(parseCell("")).toBeNull();
    expect(parseCell("12")).toBe(12);
    expect(parseCell("-1.5")).toBe(-1.5);
    expect(parseCell("1e3")).toBe(1000);
    expect(parseCell(".")).toBe(".");
    expect(parseCell("/a")).toBe("/a");
  });
});

describe("tableToCsv / csvToTable", () => {
  it("writes a BOM, a header and quoted fields", () => {
    expect(tableToCsv(table)).toBe(`${BOM}page,clicks\n/a,1\n"x,y",\n`);
    expect(tableToCsv(table, { header: false, bom: false })).toBe(`/a,1\n"x,y",\n`);
  });

  it("reads back the same rows and types", () => {
    const parsed = csvToTable(tableToCsv(table));
    expect(parsed).toEqual(table);
  });

  it("returns an empty table for empty input", () => {
    expect(csvToTable("")).toEqual({ columns: [], rows: [] });
  });

  it("parses cells by declared column type", () => {
    const columns = [
      { name: "date", type: "string" as const },
      { name: "day", type: "date" as const },
      { name: "sessions", type: "number" as const },
    ];
    const parsed = csvToTable("date,day,sessions\n20240115,2024-01-15,4\n,,\n", columns);
    expect(parsed).toEqual({
      columns,
      rows: [
        { date: "20240115", day: "2024-01-15", sessions: 4 },
        { date: null, day: null, sessions: null },
      ],
    });
  });

  it("keeps declared columns for a header-only file", () => {
    expect(csvToTable("page\n", [{ name: "page", type: "string" }])).toEqual({
      columns: [{ name: "page", type: "string" }],
      rows: [],
    });
  });

  it("rejects a header that differs from the declared columns", () => {
    expect(() => csvToTable("page,clicks\n/a,1\n", [{ name: "page", type: "string" }])).toThrow(
      "CSV header (page, clicks) does not match columns (page)",
    );
  });
});

describe("CSV files", () => {
  let cleanup: (() => void) | undefined;

  afterEach(() => {
    cleanup?.();
    cleanup = undefined;
  });

  it("creates parent directories and overwrites", () => {
    const temp = createTempDir("csv");
    cleanup = temp.cleanup;
    const path = join(temp.dir, "nested", "out.csv");

    writeCsvFile(path, table);
    writeCsvFile(path, createTable(["page"], [{ page: "/z" }]));

    expect(readFileSync(path, "utf-8")).toBe(`${BOM}page\n/z\n`);
  });

  it("writes the header only once when appending", () => {
    const temp = createTempDir("csv");
    cleanup = temp.cleanup;
    const path = join(temp.dir, "out.csv");

    appendCsvFile(path, table);
    appendCsvFile(path, table);

    expect(readFileSync(path, "utf-8")).toBe(`${BOM}page,clicks\n/a,1\n"x,y",\n/a,1\n"x,y",\n`);
    expect(readCsvFile(path).rows).toHaveLength(4);
  });
});
