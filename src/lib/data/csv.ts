import Papa from "papaparse";
import type { CellValue, DatasetRow, DatasetTable } from "@/types/dataset";
import { DatasetParseError } from "./errors";

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;

/**
 * 숫자 형태의 텍스트는 number, 빈 필드는 null.
 * 정밀도를 잃는 큰 정수 (2^53 이상) 는 텍스트로 둔다.
 */
export function toCellValue(raw: string): CellValue {
  const text = raw.trim();
  if (text === "") return null;
  if (NUMERIC_PATTERN.test(text)) {
    const value = Number(text);
    if (INTEGER_PATTERN.test(text) && !Number.isSafeInteger(value)) return text;
    if (Number.isFinite(value)) return value;
  }
  return text;
}

// 모든 필드가 공백뿐인 레코드 (skipEmptyLines: "greedy" 와 같은 기준)
function isBlankRecord(record: string[]): boolean {
  return record.every((field) => field.trim() === "");
}

// 빈 헤더는 col_N, 중복 헤더는 name_2, name_3 ...
function normalizeHeader(header: string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((cell, i) => {
    const base = cell.trim() || `col_${i + 1}`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

/**
 * CSV 텍스트를 테이블로 파싱한다. 첫 줄은 헤더.
 * 모든 행은 헤더와 같은 수의 필드를 가져야 한다.
 */
export function parseCsv(text: string, file: string): DatasetTable {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  // 빈 줄은 직접 걸러서, 에러 행 번호를 데이터 행 기준으로 센다
  const result = Papa.parse<string[]>(input, {
    delimiter: ",",
    skipEmptyLines: false,
    dynamicTyping: false,
  });

  // papaparse 레코드 인덱스 -> 1-based 데이터 행 번호 (헤더는 0)
  const lineNumbers: number[] = [];
  const records: string[][] = [];
  let count = 0;
  result.data.forEach((record) => {
    lineNumbers.push(count);
    if (isBlankRecord(record)) return;
    records.push(record);
    count++;
  });

  const firstError = result.errors[0];
  if (firstError) {
    const index = firstError.row ?? undefined;
    const row = index === undefined ? undefined : (lineNumbers[index] ?? count);
    throw new DatasetParseError(file, firstError.message, row === 0 ? undefined : row);
  }

  const [header, ...dataRecords] = records;
  if (!header) {
    throw new DatasetParseError(file, "no header row");
  }

  const columns = normalizeHeader(header);
  const rows: DatasetRow[] = dataRecords.map((record, i) => {
    if (record.length !== columns.length) {
      throw new DatasetParseError(
        file,
        `expected ${columns.length} fields but found ${record.length}`,
        i + 1
      );
    }
    const row: DatasetRow = {};
    columns.forEach((column, j) => {
      row[column] = toCellValue(record[j] ?? "");
    });
    return row;
  });

  return { columns, rows };
}
