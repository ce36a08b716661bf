import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/api";
import { loadConfig } from "@/lib/config";
import { listDatasets } from "@/lib/data/store";
import type { DatasetListResponse } from "@/types/dataset";

// 데이터 디렉토리의 CSV 목록
export async function GET() {
  try {
    const { dataDir } = loadConfig();
    const datasets = await listDatasets(dataDir);
    return NextResponse.json<DatasetListResponse>({ dataDir, datasets });
  } catch (error) {
    return errorResponse("GET /api/datasets", error);
  }
}
