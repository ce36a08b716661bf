import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DataDirectoryNotFoundError, DatasetNotFoundError } from "./errors";
import { cachedDatasetPaths, clearDatasetCache, listDatasets, loadDataset } from "./store";

const PRICES = "assets,price,circulating_supply,Earnings\nETH,3120.5,120200000,2450000000\nSOL,148.2,468000000,612000000\nADA,0.452,35800000000,21500000\n";

describe("dataset store", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "datasets-"));
    clearDatasetCache();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("loads a CSV without losing rows or columns", async () => {
    fs.writeFileSync(path.join(dir, "prices.csv"), PRICES);

    const dataset = await loadDataset("prices", dir);

    expect(dataset.name).toBe("prices");
    expect(dataset.file).toBe("prices.csv");
    expect(dataset.columns).toEqual(["assets", "price", "circulating_supply", "Earnings"]);
    expect(dataset.rows).toHaveLength(3);
    expect(dataset.rows[2]).toEqual({
      assets: "ADA",
      price: 0.452,
      circulating_supply: 35800000000,
      Earnings: 21500000,
    });
  });

  it("returns the same table for an unchanged file", async () => {
    fs.writeFileSync(path.join(dir, "prices.csv"), PRICES);

    const first = await loadDataset("prices", dir);
    const second = await loadDataset("prices", dir);
    expect(second).toBe(first);

    clearDatasetCache();
    const reparsed = await loadDataset("prices", dir);
    expect(reparsed).not.toBe(first);
    expect(reparsed).toEqual(first);
  });

  it("re-reads a file whose content changed", async () => {
    const file = path.join(dir, "prices.csv");
    fs.writeFileSync(file, PRICES);
    await loadDataset("prices", dir);

    fs.writeFileSync(file, "assets,price\nETH,1\n");
    const dataset = await loadDataset("prices", dir);

    expect(dataset.columns).toEqual(["assets", "price"]);
    expect(dataset.rows).toEqual([{ assets: "ETH", price: 1 }]);
  });

  it("fails clearly when the directory is missing", async () => {
    const missing = path.join(dir, "nope");
    await expect(loadDataset("prices", missing)).rejects.toBeInstanceOf(DataDirectoryNotFoundError);
    await expect(listDatasets(missing)).rejects.toThrow(`Data directory not found: ${missing}`);
  });

  it("fails clearly when the file is missing", async () => {
    await expect(loadDataset("missing", dir)).rejects.toBeInstanceOf(DatasetNotFoundError);
    await expect(loadDataset("missing", dir)).rejects.toThrow("Dataset not found: missing");
  });

  it("rejects names that leave the data directory", async () => {
    await expect(loadDataset("../outside", dir)).rejects.toBeInstanceOf(DatasetNotFoundError);
    await expect(loadDataset("..", dir)).rejects.toBeInstanceOf(DatasetNotFoundError);
  });

  it("lists every CSV, including broken ones", async () => {
    fs.writeFileSync(path.join(dir, "b_prices.csv"), PRICES);
    fs.writeFileSync(path.join(dir, "a_broken.csv"), "x,y\n1\n");
    fs.writeFileSync(path.join(dir, "notes.txt"), "not a dataset");

    const summaries = await listDatasets(dir);

    expect(summaries.map((s) => s.name)).toEqual(["a_broken", "b_prices"]);
    expect(summaries[0]).toMatchObject({
      file: "a_broken.csv",
      rows: null,
      columns: [],
      error: "Failed to parse a_broken.csv: expected 2 fields but found 1 at row 1",
    });
    expect(summaries[1]).toMatchObject({
      file: "b_prices.csv",
      rows: 3,
      columns: ["assets", "price", "circulating_supply", "Earnings"],
    });
    expect(summaries[1].error).toBeUndefined();
  });

  it("lists an empty directory as no datasets", async () => {
    await expect(listDatasets(dir)).resolves.toEqual([]);
  });

  it("skips a broken file that disappears while listing", async () => {
    const file = path.join(dir, "gone.csv");
    fs.writeFileSync(file, PRICES);
    vi.spyOn(fs.promises, "readFile").mockImplementation(async () => {
      fs.rmSync(file);
      return "x,y\n1\n";
    });

    await expect(listDatasets(dir)).resolves.toEqual([]);
  });

  it("drops cached tables for deleted files", async () => {
    const kept = path.join(dir, "kept.csv");
    const removed = path.join(dir, "removed.csv");
    fs.writeFileSync(kept, PRICES);
    fs.writeFileSync(removed, PRICES);
    await listDatasets(dir);
    expect(cachedDatasetPaths()).toEqual([kept, removed]);

    fs.rmSync(removed);
    await listDatasets(dir);
    expect(cachedDatasetPaths()).toEqual([kept]);
  });

  it("forgets a cached table once its file is gone", async () => {
    const file = path.join(dir, "prices.csv");
    fs.writeFileSync(file, PRICES);
    await loadDataset("prices", dir);

    fs.rmSync(file);
    await expect(loadDataset("prices", dir)).rejects.toBeInstanceOf(DatasetNotFoundError);
    expect(cachedDatasetPaths()).toEqual([]);
  });
});
