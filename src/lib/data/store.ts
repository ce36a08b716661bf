import fs from "fs";
import path from "path";
import { loadConfig } from "@/lib/config";
import type { Dataset, DatasetSummary } from "@/types/dataset";
import { parseCsv } from "./csv";
import {
  DataDirectoryNotFoundError,
  DatasetNotFoundError,
  isDatasetError,
} from "./errors";

const CSV_EXTENSION = ".csv";
const DATASET_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

interface CacheEntry {
  dir: string;
  mtimeMs: number;
  size: number;
  dataset: Dataset;
}

// 파싱된 테이블 캐시. 경로 + mtime + size 가 같으면 재사용
const cache = new Map<string, CacheEntry>();

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function statIfExists(filePath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

async function ensureDirectory(dir: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(dir);
    if (!stat.isDirectory()) throw new DataDirectoryNotFoundError(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new DataDirectoryNotFoundError(dir);
    }
    throw error;
  }
}

function datasetPath(dir: string, name: string): string {
  if (!DATASET_NAME_PATTERN.test(name) || name.includes("..")) {
    throw new DatasetNotFoundError(name);
  }
  return path.join(dir, `${name}${CSV_EXTENSION}`);
}

/**
 * 데이터셋 하나를 읽는다. 파일이 바뀌지 않았으면 캐시된 테이블을 돌려준다.
 */
export async function loadDataset(
  name: string,
  dir: string = loadConfig().dataDir
): Promise<Dataset> {
  await ensureDirectory(dir);
  const filePath = datasetPath(dir, name);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      cache.delete(filePath);
      throw new DatasetNotFoundError(name);
    }
    throw error;
  }
  if (!stat.isFile()) {
    cache.delete(filePath);
    throw new DatasetNotFoundError(name);
  }

  const cached = cache.get(filePath);
  if (cached && cached.mtimeMs === stat.mtimeMs && cached.size === stat.size) {
    return cached.dataset;
  }

  const file = path.basename(filePath);
  const text = await fs.promises.readFile(filePath, "utf8");
  const table = parseCsv(text, file);
  const dataset: Dataset = {
    name,
    file,
    modifiedAt: Math.round(stat.mtimeMs),
    columns: table.columns,
    rows: table.rows,
  };

  cache.set(filePath, { dir, mtimeMs: stat.mtimeMs, size: stat.size, dataset });
  console.log(`[Datasets] ${file} 로드: ${dataset.rows.length} rows x ${dataset.columns.length} columns`);
  return dataset;
}

/** 디렉토리의 모든 CSV 요약. 파싱 실패한 파일도 error 와 함께 포함 */
export async function listDatasets(
  dir: string = loadConfig().dataDir
): Promise<DatasetSummary[]> {
  await ensureDirectory(dir);

  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(CSV_EXTENSION))
    .map((entry) => entry.name.slice(0, -CSV_EXTENSION.length))
    .filter((name) => DATASET_NAME_PATTERN.test(name))
    .sort();

  // 디렉토리에서 사라진 파일의 캐시 정리
  const listed = new Set(names.map((name) => path.join(dir, `${name}${CSV_EXTENSION}`)));
  for (const [key, entry] of cache) {
    if (entry.dir === dir && !listed.has(key)) cache.delete(key);
  }

  const summaries: DatasetSummary[] = [];
  for (const name of names) {
    try {
      const dataset = await loadDataset(name, dir);
      summaries.push({
        name,
        file: dataset.file,
        modifiedAt: dataset.modifiedAt,
        rows: dataset.rows.length,
        columns: dataset.columns,
      });
    } catch (error) {
      if (!isDatasetError(error)) throw error;
      console.error(`[Datasets] ${name}${CSV_EXTENSION} 로드 실패: ${error.message}`);
      const stat = await statIfExists(path.join(dir, `${name}${CSV_EXTENSION}`));
      // 목록을 읽은 뒤 지워진 파일
      if (!stat) continue;
      summaries.push({
        name,
        file: `${name}${CSV_EXTENSION}`,
        modifiedAt: Math.round(stat.mtimeMs),
        rows: null,
        columns: [],
        error: error.message,
      });
    }
  }
  return summaries;
}

/** 캐시에 올라간 파일 경로 */
export function cachedDatasetPaths(): string[] {
  return Array.from(cache.keys()).sort();
}

export function clearDatasetCache(): void {
  cache.clear();
}
