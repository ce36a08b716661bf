import type { CellValue, DatasetTable, TimePoint } from "@/types/dataset";

const TIME_COLUMNS = ["timestamp", "time", "date", "datetime"];

// 이보다 큰 숫자 시각은 ms 로 본다
const EPOCH_MS_THRESHOLD = 1e12;

export function findTimeColumn(table: DatasetTable): string | null {
  return table.columns.find((column) => TIME_COLUMNS.includes(column.toLowerCase())) ?? null;
}

/** 시간 컬럼을 제외하고 숫자 값이 하나라도 있는 컬럼 */
export function numericColumns(table: DatasetTable, exclude: string[] = []): string[] {
  return table.columns.filter(
    (column) =>
      !exclude.includes(column) && table.rows.some((row) => typeof row[column] === "number")
  );
}

/** 셀 값을 Unix 초로 변환. 해석 불가면 null */
export function toUnixSeconds(value: CellValue): number | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    return value > EPOCH_MS_THRESHOLD ? Math.floor(value / 1000) : value;
  }
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : Math.floor(parsed / 1000);
  }
  return null;
}

/**
 * 행들을 시간 오름차순 포인트로 변환한다.
 * 시간이나 값이 없는 행은 버리고, 같은 시각은 첫 행만 남긴다.
 */
export function toTimeSeries(
  table: DatasetTable,
  timeColumn: string,
  valueColumn: string
): TimePoint[] {
  const points: TimePoint[] = [];
  for (const row of table.rows) {
    const time = toUnixSeconds(row[timeColumn] ?? null);
    const value = row[valueColumn];
    if (time === null || typeof value !== "number") continue;
    points.push({ time, value });
  }

  // 안정 정렬이라 같은 시각이면 원래 순서가 유지된다
  points.sort((a, b) => a.time - b.time);

  const seen = new Set<number>();
  return points.filter((point) => {
    if (seen.has(point.time)) return false;
    seen.add(point.time);
    return true;
  });
}
