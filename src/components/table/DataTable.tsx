"use client";

import type { CellValue } from "@/types/dataset";

interface DataTableProps {
  columns: string[];
  rows: Record<string, CellValue>[];
  /** 표시할 최대 행 수 (나머지는 개수만 표시) */
  limit?: number;
  emptyMessage?: string;
}

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "-";
  if (typeof value === "number") {
    return value.toLocaleString("en-US", { maximumFractionDigits: 6 });
  }
  return value;
}

export function DataTable({ columns, rows, limit, emptyMessage = "No rows." }: DataTableProps) {
  if (rows.length === 0) {
    return (
      <div className="text-center py-12 text-[var(--color-text-muted)]">{emptyMessage}</div>
    );
  }

  const visible = limit !== undefined ? rows.slice(0, limit) : rows;

  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead>
          <tr className="border-b border-[var(--color-border)] text-[var(--color-text-muted)] text-left">
            {columns.map((column) => (
              <th key={column} className="py-2 px-3 whitespace-nowrap">
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {visible.map((row, i) => (
            <tr
              key={i}
              className="border-b border-[var(--color-border)] hover:bg-[var(--color-surface)]"
            >
              {columns.map((column, j) => {
                const value = row[column];
                return (
                  <td
                    key={column}
                    className={`py-2 px-3 whitespace-nowrap ${
                      j === 0 ? "font-medium" : "text-right font-mono"
                    }`}
                  >
                    {formatCell(value)}
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
      {visible.length < rows.length && (
        <p className="pt-2 text-xs text-[var(--color-text-muted)]">
          Showing {visible.length} of {rows.length} rows
        </p>
      )}
    </div>
  );
}
