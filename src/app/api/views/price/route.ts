import { NextResponse } from "next/server";
import { z } from "zod";
import { badRequest, errorResponse } from "@/lib/api";
import { loadConfig } from "@/lib/config";
import { blankAsUndefined } from "@/lib/env";
import { loadDataset } from "@/lib/data/store";
import { buildPriceView } from "@/lib/metrics/price";

const querySchema = z.object({
  baseFees: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(100).optional()),
  preferentialShares: z.preprocess(
    blankAsUndefined,
    z.coerce.number().gt(0).max(100).optional()
  ),
  inflationFactor: z.preprocess(blankAsUndefined, z.coerce.number().min(0).optional()),
});

// 가격 / 주주 지표. 쿼리로 계산 파라미터를 덮어쓸 수 있다
export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const parsed = querySchema.safeParse(Object.fromEntries(searchParams));
    if (!parsed.success) return badRequest(parsed.error);
    const query = parsed.data;

    const config = loadConfig();
    const params = {
      baseFeesPercent: query.baseFees ?? config.metricDefaults.baseFeesPercent,
      preferentialSharesPercent:
        query.preferentialShares ?? config.metricDefaults.preferentialSharesPercent,
      inflationFactor: query.inflationFactor ?? config.metricDefaults.inflationFactor,
    };

    const dataset = await loadDataset(config.priceDataset, config.dataDir);
    return NextResponse.json(buildPriceView(dataset, params, dataset.name));
  } catch (error) {
    return errorResponse("GET /api/views/price", error);
  }
}
