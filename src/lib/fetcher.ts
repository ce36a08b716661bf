import { z } from "zod";
import { blankAsUndefined } from "./env";

const clientEnvSchema = z.object({
  NEXT_PUBLIC_REFRESH_SECONDS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().positive().default(30)
  ),
});

/** 클라이언트 폴링 주기 (ms) */
export function refreshIntervalMs(env: Record<string, string | undefined>): number {
  return clientEnvSchema.parse(env).NEXT_PUBLIC_REFRESH_SECONDS * 1000;
}

// NEXT_PUBLIC_* 는 빌드 때 문자 그대로 치환되므로 키를 직접 적는다
export const REFRESH_INTERVAL_MS = refreshIntervalMs({
  NEXT_PUBLIC_REFRESH_SECONDS: process.env.NEXT_PUBLIC_REFRESH_SECONDS,
});

function errorMessage(body: unknown, status: number): string {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return `Request failed (${status})`;
}

// SWR fetcher. 실패 응답의 { error } 를 그대로 에러 메시지로 쓴다
export async function fetcher<T>(url: string): Promise<T> {
  const res = await fetch(url);
  const body = await res.json();
  if (!res.ok) {
    throw new Error(errorMessage(body, res.status));
  }
  return body;
}
