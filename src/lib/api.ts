import { NextResponse } from "next/server";
import type { ZodError } from "zod";
import { isDatasetError } from "@/lib/data/errors";

/** 라우트 공통 에러 응답: { error } + 상태 코드 */
export function errorResponse(route: string, error: unknown): NextResponse<{ error: string }> {
  if (isDatasetError(error)) {
    console.error(`[API] ${route}: ${error.message}`);
    return NextResponse.json({ error: error.message }, { status: error.status });
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`[API] ${route}: ${message}`);
  return NextResponse.json({ error: message }, { status: 500 });
}

/** 쿼리 검증 실패: 400 */
export function badRequest(error: ZodError): NextResponse<{ error: string }> {
  const message = error.issues
    .map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`)
    .join("; ");
  return NextResponse.json({ error: message }, { status: 400 });
}
