import type { CellValue, DatasetRow, DatasetTable } from "@/types/dataset";
import type { MetricChart, MetricRecord, StakingView } from "@/types/metrics";
import { DatasetSchemaError } from "@/lib/data/errors";
import { formatBillions, formatPercent, humanizeMetric } from "./format";
import { assetColorMap } from "./palette";

export const ASSET_COLUMN = "assets";

const BILLION_COLUMNS = ["staking_marketcap", "net_issuance"];
const PERCENT_COLUMNS = ["inflation_rate", "reward_rate"];

export function assetLabel(row: DatasetRow): string {
  const value = row[ASSET_COLUMN];
  return value === null || value === undefined ? "" : String(value);
}

function formatStakingCell(column: string, value: CellValue): CellValue {
  if (typeof value !== "number") return value;
  if (BILLION_COLUMNS.includes(column)) return formatBillions(value);
  if (PERCENT_COLUMNS.includes(column)) return formatPercent(value);
  return value;
}

/**
 * 스테이킹 데이터: 표시용 테이블 + 지표별 자산 비교 차트 (선형 축).
 * 차트는 포맷 전 원본 값을 쓴다.
 */
export function buildStakingView(table: DatasetTable, name = "staking_data"): StakingView {
  if (!table.columns.includes(ASSET_COLUMN)) {
    throw new DatasetSchemaError(name, [ASSET_COLUMN]);
  }

  const rows: MetricRecord[] = table.rows.map((row) => {
    const display: MetricRecord = {};
    for (const column of table.columns) {
      display[column] = formatStakingCell(column, row[column] ?? null);
    }
    return display;
  });

  const metrics = table.columns.filter((column) => column !== ASSET_COLUMN);
  const charts: MetricChart[] = metrics.map((metric): MetricChart => {
    const heading = humanizeMetric(metric);
    return {
      metric,
      heading: `${heading} Comparison`,
      title: `${heading} Comparison between Assets`,
      scale: "linear",
      points: table.rows.map((row) => {
        const value = row[metric];
        return {
          asset: assetLabel(row),
          value: typeof value === "number" ? value : null,
        };
      }),
    };
  });

  return {
    table: {
      title: "Staking Metrics Data (with percentages for inflation and reward rates)",
      columns: table.columns,
      rows,
    },
    charts,
    colors: assetColorMap(table.rows.map(assetLabel)),
  };
}
