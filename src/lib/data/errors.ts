/**
 * 데이터셋 로드 실패. status 는 API 응답 코드로 그대로 쓰인다.
 */
export class DatasetError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "DatasetError";
    this.status = status;
  }
}

export class DataDirectoryNotFoundError extends DatasetError {
  constructor(dir: string) {
    super(`Data directory not found: ${dir}`, 404);
    this.name = "DataDirectoryNotFoundError";
  }
}

export class DatasetNotFoundError extends DatasetError {
  constructor(dataset: string) {
    super(`Dataset not found: ${dataset}`, 404);
    this.name = "DatasetNotFoundError";
  }
}

// row 는 헤더를 뺀 1-based 데이터 행 번호
export class DatasetParseError extends DatasetError {
  constructor(file: string, detail: string, row?: number) {
    super(
      `Failed to parse ${file}: ${detail}${row !== undefined ? ` at row ${row}` : ""}`,
      422
    );
    this.name = "DatasetParseError";
  }
}

export class DatasetSchemaError extends DatasetError {
  constructor(dataset: string, missing: string[]) {
    super(`Dataset ${dataset} is missing required columns: ${missing.join(", ")}`, 422);
    this.name = "DatasetSchemaError";
  }
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError;
}
