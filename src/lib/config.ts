import path from "path";
import { z } from "zod";
import type { MetricParams } from "@/types/metrics";
import { blankAsUndefined } from "./env";

const envSchema = z.object({
  DATA_DIR: z.preprocess(blankAsUndefined, z.string().default("offline_data")),
  BASE_FEES_PERCENT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().min(0).max(100).default(90)
  ),
  PREFERENTIAL_SHARES_PERCENT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().gt(0).max(100).default(25)
  ),
  INFLATION_FACTOR: z.preprocess(blankAsUndefined, z.coerce.number().min(0).default(166.3)),
});

export interface DashboardConfig {
  /** CSV 파일 디렉토리 (절대 경로) */
  dataDir: string;
  stakingDataset: string;
  priceDataset: string;
  metricDefaults: MetricParams;
}

/** 환경변수에서 설정을 읽는다. 요청마다 호출해도 될 만큼 가볍다 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  const parsed = envSchema.parse(env);
  return {
    dataDir: path.resolve(process.cwd(), parsed.DATA_DIR),
    stakingDataset: "staking_data",
    priceDataset: "price_data",
    metricDefaults: {
      baseFeesPercent: parsed.BASE_FEES_PERCENT,
      preferentialSharesPercent: parsed.PREFERENTIAL_SHARES_PERCENT,
      inflationFactor: parsed.INFLATION_FACTOR,
    },
  };
}
