import type { CellValue, DatasetRow, DatasetTable } from "@/types/dataset";
import type {
  DisplayTable,
  MetricChart,
  MetricParams,
  MetricRecord,
  PriceView,
  ShareholderMetrics,
} from "@/types/metrics";
import { DatasetSchemaError } from "@/lib/data/errors";
import { formatValue, humanizeMetric } from "./format";
import { assetColorMap } from "./palette";
import { ASSET_COLUMN, assetLabel } from "./staking";

export const REQUIRED_PRICE_COLUMNS = [ASSET_COLUMN, "price", "circulating_supply", "Earnings"];

// 지표 레코드에서 빠지는 원본 컬럼
const SKIPPED_COLUMNS = ["Market Cap"];

const PRICE_TABLE = {
  title: "Price and Earnings Metrics",
  columns: [
    "Asset",
    "price",
    "circulating_supply",
    "reward_rate",
    "Earnings",
    "earnings_per_share",
    "price_to_earnings",
  ],
};

const SHAREHOLDER_TABLE = {
  title: "Shareholder and Dilution Metrics",
  columns: [
    "Asset",
    "Cash Dividend",
    "Cash Dividend Yield",
    "Preferential Shares Staker",
    "Scrip Dividend",
    "Scrip Dividend Yield",
    "Participant Dilution",
  ],
};

/** "0,35" 처럼 쉼표 소수점 문자열을 숫자로. 변환 불가면 null */
export function toNumeric(value: CellValue): number | null {
  if (typeof value === "number") return value;
  if (typeof value !== "string") return null;
  const text = value.trim().replaceAll(",", ".");
  if (text === "") return null;
  const parsed = Number(text);
  return Number.isNaN(parsed) ? null : parsed;
}

/** 자산 컬럼을 뺀 모든 컬럼을 숫자로 정리한 새 테이블 */
export function cleanNumericColumns(table: DatasetTable): DatasetTable {
  const rows = table.rows.map((row) => {
    const cleaned: DatasetRow = {};
    for (const column of table.columns) {
      const value = row[column] ?? null;
      cleaned[column] = column === ASSET_COLUMN ? value : toNumeric(value);
    }
    return cleaned;
  });
  return { columns: table.columns, rows };
}

/**
 * 수익(earnings)을 바이백과 현금 배당으로 나누고,
 * 우선주(스테이커) / 보통주 관점의 수익률과 희석도를 계산한다.
 */
export function calculateShareholderMetrics(
  price: number,
  circulatingSupply: number,
  earnings: number,
  params: MetricParams
): ShareholderMetrics {
  const baseFees = params.baseFeesPercent / 100;
  const preferentialShare = params.preferentialSharesPercent / 100;

  const buybackNominalAmount = earnings * baseFees;
  const cashDividend = earnings * (1 - baseFees);

  const preferentialSharesAmount = circulatingSupply * preferentialShare;
  const ordinaryShares = circulatingSupply * (1 - preferentialShare);

  const cashDividendYield = cashDividend / (price * preferentialSharesAmount);

  const scripDividend = params.inflationFactor * Math.sqrt(preferentialSharesAmount);
  const scripDividendYield = scripDividend / preferentialSharesAmount;

  const buybackYield = buybackNominalAmount / (circulatingSupply * price);

  const preferentialSharesStaker = cashDividendYield + scripDividendYield;
  const ordinarySharesStaker = (cashDividendYield - buybackYield) / buybackYield;

  return {
    buybackNominalAmount,
    cashDividend,
    ordinaryShares,
    cashDividendYield,
    scripDividend,
    scripDividendYield,
    buybackYield,
    preferentialSharesStaker,
    ordinarySharesStaker,
    participantDilution: Math.abs(preferentialSharesStaker - ordinarySharesStaker),
  };
}

/** 자산 하나의 원본 값 + 계산 지표 (보통주 스테이커 수익률은 표시하지 않는다) */
export function buildAssetMetrics(
  row: DatasetRow,
  columns: string[],
  params: MetricParams
): MetricRecord {
  const calculated = calculateShareholderMetrics(
    toNumeric(row.price ?? null) ?? Number.NaN,
    toNumeric(row.circulating_supply ?? null) ?? Number.NaN,
    toNumeric(row.Earnings ?? null) ?? Number.NaN,
    params
  );

  const record: MetricRecord = { Asset: assetLabel(row) };
  for (const column of columns) {
    if (column === ASSET_COLUMN || SKIPPED_COLUMNS.includes(column)) continue;
    record[column] = row[column] ?? null;
  }

  record["Cash Dividend"] = calculated.cashDividend;
  record["Cash Dividend Yield"] = calculated.cashDividendYield;
  record["Preferential Shares Staker"] = calculated.preferentialSharesStaker;
  record["Scrip Dividend"] = calculated.scripDividend;
  record["Scrip Dividend Yield"] = calculated.scripDividendYield;
  record["Participant Dilution"] = calculated.participantDilution;
  return record;
}

export function formatMetricRecord(record: MetricRecord): MetricRecord {
  const formatted: MetricRecord = {};
  for (const [column, value] of Object.entries(record)) {
    formatted[column] =
      column === "Asset" ? value : formatValue(typeof value === "number" ? value : null, column);
  }
  return formatted;
}

// 로그 축에 올릴 수 없는 값은 null
function logScaleValue(value: CellValue): number | null {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;
}

// available 이 null 이면 (행이 없을 때) 모든 컬럼 헤더를 유지
function pickTable(
  layout: { title: string; columns: string[] },
  records: MetricRecord[],
  available: string[] | null
): DisplayTable {
  const columns = available
    ? layout.columns.filter((column) => available.includes(column))
    : layout.columns;
  return {
    title: layout.title,
    columns,
    rows: records.map((record) => {
      const row: MetricRecord = {};
      for (const column of columns) row[column] = record[column] ?? null;
      return row;
    }),
  };
}

/**
 * 가격 데이터: 자산별 첫 행으로 지표를 계산해
 * 두 개의 포맷된 테이블과 지표별 비교 차트 (로그 축)를 만든다.
 */
export function buildPriceView(
  table: DatasetTable,
  params: MetricParams,
  name = "price_data"
): PriceView {
  const missing = REQUIRED_PRICE_COLUMNS.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new DatasetSchemaError(name, missing);
  }

  const cleaned = cleanNumericColumns(table);

  // 자산별 첫 행만 사용
  const firstRows = new Map<string, DatasetRow>();
  for (const row of cleaned.rows) {
    const asset = assetLabel(row);
    if (asset === "" || firstRows.has(asset)) continue;
    firstRows.set(asset, row);
  }

  const rawRecords = Array.from(firstRows.values()).map((row) =>
    buildAssetMetrics(row, cleaned.columns, params)
  );
  const formattedRecords = rawRecords.map(formatMetricRecord);

  const metricColumns = rawRecords[0] ? Object.keys(rawRecords[0]) : null;
  const charts: MetricChart[] = (metricColumns ?? [])
    .filter((metric) => metric !== "Asset")
    .map((metric): MetricChart => {
      const heading = humanizeMetric(metric);
      return {
        metric,
        heading: `${heading} Comparison`,
        title: `${heading} Comparison between Assets`,
        scale: "log",
        points: rawRecords.map((record) => ({
          asset: String(record.Asset),
          value: logScaleValue(record[metric] ?? null),
        })),
      };
    });

  return {
    params,
    tables: [
      pickTable(PRICE_TABLE, formattedRecords, metricColumns),
      pickTable(SHAREHOLDER_TABLE, formattedRecords, metricColumns),
    ],
    charts,
    colors: assetColorMap(Array.from(firstRows.keys())),
  };
}
