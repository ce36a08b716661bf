/** `KEY=` 처럼 빈 값은 설정하지 않은 것으로 본다 (zod preprocess 용) */
export function blankAsUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}
