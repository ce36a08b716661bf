import { describe, expect, it } from "vitest";
import { DatasetSchemaError } from "@/lib/data/errors";
import type { DatasetTable } from "@/types/dataset";
import { buildStakingView } from "./staking";

const staking: DatasetTable = {
  columns: ["assets", "staking_marketcap", "net_issuance", "inflation_rate", "reward_rate", "staking_ratio"],
  rows: [
    {
      assets: "ETH",
      staking_marketcap: 98400000000,
      net_issuance: -1200000000,
      inflation_rate: 0.0071,
      reward_rate: 0.0342,
      staking_ratio: 0.281,
    },
    {
      assets: "SOL",
      staking_marketcap: 52300000000,
      net_issuance: 3100000000,
      inflation_rate: 0.0482,
      reward_rate: "n/a",
      staking_ratio: 0.652,
    },
  ],
};

describe("buildStakingView", () => {
  it("formats amounts and rates for the table", () => {
    const view = buildStakingView(staking);

    expect(view.table.columns).toEqual(staking.columns);
    expect(view.table.rows).toHaveLength(2);
    expect(view.table.rows[0]).toEqual({
      assets: "ETH",
      staking_marketcap: "$98.4B",
      net_issuance: "$-1.2B",
      inflation_rate: "0.71%",
      reward_rate: "3.42%",
      staking_ratio: 0.281,
    });
    expect(view.table.rows[1].reward_rate).toBe("n/a");
  });

  it("builds one linear chart per metric from raw values", () => {
    const view = buildStakingView(staking);

    expect(view.charts.map((c) => c.metric)).toEqual([
      "staking_marketcap",
      "net_issuance",
      "inflation_rate",
      "reward_rate",
      "staking_ratio",
    ]);
    expect(view.charts[0]).toEqual({
      metric: "staking_marketcap",
      heading: "Staking marketcap Comparison",
      title: "Staking marketcap Comparison between Assets",
      scale: "linear",
      points: [
        { asset: "ETH", value: 98400000000 },
        { asset: "SOL", value: 52300000000 },
      ],
    });
    expect(view.charts[3].points).toEqual([
      { asset: "ETH", value: 0.0342 },
      { asset: "SOL", value: null },
    ]);
    expect(view.colors).toEqual({ ETH: "#636efa", SOL: "#ef553b" });
  });

  it("keeps one chart point per row when an asset repeats", () => {
    const table: DatasetTable = {
      columns: ["assets", "reward_rate"],
      rows: [
        { assets: "ETH", reward_rate: 0.03 },
        { assets: "ETH", reward_rate: 0.04 },
      ],
    };
    const view = buildStakingView(table);

    expect(view.table.rows).toHaveLength(2);
    expect(view.charts[0].points).toEqual([
      { asset: "ETH", value: 0.03 },
      { asset: "ETH", value: 0.04 },
    ]);
    expect(view.colors).toEqual({ ETH: "#636efa" });
  });

  it("requires an assets column", () => {
    const table: DatasetTable = { columns: ["coin", "reward_rate"], rows: [] };
    expect(() => buildStakingView(table)).toThrow(DatasetSchemaError);
    expect(() => buildStakingView(table)).toThrow(
      "Dataset staking_data is missing required columns: assets"
    );
  });
});
