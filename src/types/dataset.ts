/** CSV 셀 값. 빈 필드는 null */
export type CellValue = string | number | null;

export type DatasetRow = Record<string, CellValue>;

export interface DatasetTable {
  columns: string[];
  rows: DatasetRow[];
}

export interface Dataset extends DatasetTable {
  name: string; // 확장자 없는 파일명 (e.g. price_data)
  file: string;
  modifiedAt: number; // Unix ms
}

export interface DatasetSummary {
  name: string;
  file: string;
  modifiedAt: number;
  rows: number | null;
  columns: string[];
  error?: string;
}

export interface DatasetListResponse {
  dataDir: string;
  datasets: DatasetSummary[];
}

export interface TimePoint {
  time: number; // Unix seconds
  value: number;
}
