const MISSING = "—";

const DOLLAR_COLUMNS = [
  "scrip_dividend",
  "price",
  "earnings_per_share",
  "price_to_earnings",
  "scrip dividend",
];

const PERCENT_COLUMNS = [
  "scrip_dividend_yield",
  "reward_rate",
  "cash dividend yield",
  "scrip dividend yield",
  "buyback yield",
  "preferential shares staker",
  "ordinary shares staker",
  "participant dilution",
];

const MILLION_COLUMNS = [
  "circulating_supply",
  "buyback_nominal_amount",
  "cash dividend",
  "buyback nominal amount",
  "earnings",
  "ordinary shares",
];

const compactFormatter = new Intl.NumberFormat("en-US", {
  notation: "compact",
  maximumFractionDigits: 2,
});

/** 천 단위 구분자 + 고정 소수점 */
export function formatNumber(value: number, decimals: number): string {
  return value.toLocaleString("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}

/** 1 = 100% */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function formatBillions(value: number): string {
  return `$${(value / 1e9).toFixed(1)}B`;
}

export function formatCompact(value: number): string {
  return compactFormatter.format(value);
}

/**
 * 컬럼 종류에 따라 값을 포맷한다 (달러 / 퍼센트 / 백만 단위 / 기본).
 * 0 으로 나눈 결과 같은 비유한 값은 "—".
 */
export function formatValue(value: number | null, column: string): string {
  if (value === null || !Number.isFinite(value)) return MISSING;

  const key = column.toLowerCase();
  if (DOLLAR_COLUMNS.includes(key)) return `$${formatNumber(value, 3)}`;
  if (PERCENT_COLUMNS.includes(key)) return formatPercent(value);
  if (MILLION_COLUMNS.includes(key)) return `${formatNumber(value / 1_000_000, 2)}M`;
  return formatNumber(value, 2);
}

/** staking_marketcap -> Staking marketcap */
export function humanizeMetric(metric: string): string {
  const text = metric.charAt(0).toUpperCase() + metric.slice(1).toLowerCase();
  return text.replaceAll("_", " ");
}
