import { describe, expect, it } from "vitest";
import type { DatasetTable } from "@/types/dataset";
import { findTimeColumn, numericColumns, toTimeSeries, toUnixSeconds } from "./timeseries";

const JAN_1_2024 = 1704067200;
const MAR_1_2024 = 1709251200;

const table: DatasetTable = {
  columns: ["Date", "staked", "label"],
  rows: [
    { Date: "2024-03-01", staked: 3, label: "c" },
    { Date: "2024-01-01", staked: 1, label: "a" },
    { Date: "2024-01-01", staked: 9, label: "dup" },
    { Date: "not a date", staked: 4, label: "bad" },
    { Date: "2024-02-01", staked: null, label: "empty" },
  ],
};

describe("findTimeColumn", () => {
  it("matches time-like column names case-insensitively", () => {
    expect(findTimeColumn(table)).toBe("Date");
    expect(findTimeColumn({ columns: ["assets", "TIMESTAMP"], rows: [] })).toBe("TIMESTAMP");
  });

  it("returns null without a time column", () => {
    expect(findTimeColumn({ columns: ["assets", "price"], rows: [] })).toBeNull();
  });
});

describe("numericColumns", () => {
  it("lists columns holding numbers", () => {
    expect(numericColumns(table, ["Date"])).toEqual(["staked"]);
  });
});

describe("toUnixSeconds", () => {
  it("treats large numbers as milliseconds", () => {
    expect(toUnixSeconds(1700000000000)).toBe(1700000000);
    expect(toUnixSeconds(1700000000)).toBe(1700000000);
  });

  it("parses date strings and rejects the rest", () => {
    expect(toUnixSeconds("2024-01-01")).toBe(JAN_1_2024);
    expect(toUnixSeconds("soon")).toBeNull();
    expect(toUnixSeconds(null)).toBeNull();
  });
});

describe("toTimeSeries", () => {
  it("sorts points, drops unusable rows and keeps the first duplicate", () => {
    expect(toTimeSeries(table, "Date", "staked")).toEqual([
      { time: JAN_1_2024, value: 1 },
      { time: MAR_1_2024, value: 3 },
    ]);
  });
});
