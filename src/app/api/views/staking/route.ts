import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/api";
import { loadConfig } from "@/lib/config";
import { loadDataset } from "@/lib/data/store";
import { buildStakingView } from "@/lib/metrics/staking";

// 스테이킹 지표 테이블 + 차트
export async function GET() {
  try {
    const config = loadConfig();
    const dataset = await loadDataset(config.stakingDataset, config.dataDir);
    return NextResponse.json(buildStakingView(dataset, dataset.name));
  } catch (error) {
    return errorResponse("GET /api/views/staking", error);
  }
}
