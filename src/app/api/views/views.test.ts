import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clearDatasetCache } from "@/lib/data/store";
import type { PriceView, StakingView } from "@/types/metrics";
import { GET as priceRoute } from "./price/route";
import { GET as stakingRoute } from "./staking/route";

const STAKING = "assets,staking_marketcap,reward_rate\nETH,98400000000,0.0342\nSOL,52300000000,0.0695\n";
const PRICES =
  'assets,price,circulating_supply,reward_rate,Earnings\nAAA,2,400000000,"0,05",1000000000\n';

describe("/api/views", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "views-api-"));
    vi.stubEnv("DATA_DIR", dir);
    clearDatasetCache();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("serves the staking view", async () => {
    fs.writeFileSync(path.join(dir, "staking_data.csv"), STAKING);

    const response = await stakingRoute();
    expect(response.status).toBe(200);

    const view: StakingView = await response.json();
    expect(view.table.rows[1]).toEqual({
      assets: "SOL",
      staking_marketcap: "$52.3B",
      reward_rate: "6.95%",
    });
    expect(view.charts.map((c) => c.metric)).toEqual(["staking_marketcap", "reward_rate"]);
  });

  it("returns 422 when the staking data has no assets column", async () => {
    fs.writeFileSync(path.join(dir, "staking_data.csv"), "coin,reward_rate\nETH,0.03\n");

    const response = await stakingRoute();
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: "Dataset staking_data is missing required columns: assets",
    });
  });

  it("returns 404 when the price data is missing", async () => {
    const response = await priceRoute(new Request("http://localhost/api/views/price"));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Dataset not found: price_data" });
  });

  it("applies metric parameters from the query", async () => {
    fs.writeFileSync(path.join(dir, "price_data.csv"), PRICES);

    const response = await priceRoute(
      new Request("http://localhost/api/views/price?baseFees=80")
    );
    expect(response.status).toBe(200);

    const view: PriceView = await response.json();
    expect(view.params).toEqual({
      baseFeesPercent: 80,
      preferentialSharesPercent: 25,
      inflationFactor: 166.3,
    });
    expect(view.tables[1].rows[0]["Cash Dividend"]).toBe("200.00M");
    expect(view.tables[1].rows[0]["Cash Dividend Yield"]).toBe("100.00%");
  });

  it("rejects invalid query parameters", async () => {
    fs.writeFileSync(path.join(dir, "price_data.csv"), PRICES);

    const response = await priceRoute(
      new Request("http://localhost/api/views/price?baseFees=150")
    );
    expect(response.status).toBe(400);
    const body: { error: string } = await response.json();
    expect(body.error).toMatch(/^baseFees: /);
  });

  it("uses the defaults for blank query parameters", async () => {
    fs.writeFileSync(path.join(dir, "price_data.csv"), PRICES);

    const response = await priceRoute(
      new Request("http://localhost/api/views/price?baseFees=&inflationFactor=")
    );
    expect(response.status).toBe(200);

    const view: PriceView = await response.json();
    expect(view.params).toEqual({
      baseFeesPercent: 90,
      preferentialSharesPercent: 25,
      inflationFactor: 166.3,
    });
  });

  it("skips price rows without an asset", async () => {
    fs.writeFileSync(
      path.join(dir, "price_data.csv"),
      `${PRICES},3,100,"0,1",50\n`
    );

    const response = await priceRoute(new Request("http://localhost/api/views/price"));
    expect(response.status).toBe(200);

    const view: PriceView = await response.json();
    expect(view.tables[0].rows.map((row) => row.Asset)).toEqual(["AAA"]);
    expect(view.charts[0].points).toEqual([{ asset: "AAA", value: 2 }]);
    expect(view.colors).toEqual({ AAA: "#636efa" });
  });

  it("returns 422 for a malformed price file", async () => {
    fs.writeFileSync(path.join(dir, "price_data.csv"), "assets,price\nAAA,1,2\n");

    const response = await priceRoute(new Request("http://localhost/api/views/price"));
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: "Failed to parse price_data.csv: expected 2 fields but found 3 at row 1",
    });
  });

  it("returns 500 for an invalid server configuration", async () => {
    fs.writeFileSync(path.join(dir, "staking_data.csv"), STAKING);
    vi.stubEnv("BASE_FEES_PERCENT", "abc");

    const response = await stakingRoute();
    expect(response.status).toBe(500);

    const body: { error: string } = await response.json();
    expect(body.error).toContain("BASE_FEES_PERCENT");
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[API\] GET \/api\/views\/staking: /)
    );
  });
});
