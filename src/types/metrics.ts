import type { CellValue } from "./dataset";

export interface MetricParams {
  /** 수수료 중 바이백에 쓰이는 비율 (%) */
  baseFeesPercent: number;
  /** 유통량 중 스테이킹된 우선주 비율 (%) */
  preferentialSharesPercent: number;
  /** 스크립 배당 인플레이션 계수 */
  inflationFactor: number;
}

export interface ShareholderMetrics {
  buybackNominalAmount: number;
  cashDividend: number;
  ordinaryShares: number;
  cashDividendYield: number;
  scripDividend: number;
  scripDividendYield: number;
  buybackYield: number;
  preferentialSharesStaker: number;
  ordinarySharesStaker: number;
  participantDilution: number;
}

export type MetricRecord = Record<string, CellValue>;

export interface DisplayTable {
  title: string;
  columns: string[];
  rows: MetricRecord[];
}

export type ChartScale = "linear" | "log";

export interface ChartPoint {
  asset: string;
  value: number | null;
}

export interface MetricChart {
  metric: string;
  heading: string;
  title: string;
  scale: ChartScale;
  points: ChartPoint[];
}

export interface StakingView {
  table: DisplayTable;
  charts: MetricChart[];
  colors: Record<string, string>;
}

export interface PriceView {
  params: MetricParams;
  tables: DisplayTable[];
  charts: MetricChart[];
  colors: Record<string, string>;
}
