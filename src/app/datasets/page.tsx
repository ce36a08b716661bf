"use client";

import Link from "next/link";
import useSWR from "swr";
import { Card } from "@/components/common/Card";
import { fetcher, REFRESH_INTERVAL_MS } from "@/lib/fetcher";
import type { DatasetListResponse } from "@/types/dataset";

function formatDate(ts: number): string {
  return new Date(ts).toLocaleString("en-US", {
    year: "numeric", month: "2-digit", day: "2-digit",
    hour: "2-digit", minute: "2-digit",
  });
}

export default function DatasetsPage() {
  const { data, error } = useSWR<DatasetListResponse, Error>("/api/datasets", fetcher, {
    refreshInterval: REFRESH_INTERVAL_MS,
  });
  const datasets = data?.datasets ?? [];

  return (
    <div className="space-y-4">
      <h1 className="text-xl font-bold">Datasets</h1>

      <Card title={data ? data.dataDir : "Data directory"} error={error?.message}>
        {datasets.length === 0 ? (
          <p className="text-sm text-[var(--color-text-muted)] py-4 text-center">
            {data ? "No CSV files found." : "Loading..."}
          </p>
        ) : (
          <div className="overflow-x-auto">
            <table className="w-full text-sm">
              <thead>
                <tr className="border-b border-[var(--color-border)] text-[var(--color-text-muted)] text-left">
                  <th className="py-2 px-3">File</th>
                  <th className="py-2 px-3 text-right">Rows</th>
                  <th className="py-2 px-3 text-right">Columns</th>
                  <th className="py-2 px-3">Modified</th>
                  <th className="py-2 px-3">Status</th>
                </tr>
              </thead>
              <tbody>
                {datasets.map((d) => (
                  <tr key={d.name} className="border-b border-[var(--color-border)]">
                    <td className="py-2 px-3">
                      <Link
                        href={`/datasets/${encodeURIComponent(d.name)}`}
                        className="text-[var(--color-accent)] hover:underline font-mono"
                      >
                        {d.file}
                      </Link>
                    </td>
                    <td className="py-2 px-3 text-right font-mono">{d.rows ?? "-"}</td>
                    <td className="py-2 px-3 text-right font-mono">
                      {d.error ? "-" : d.columns.length}
                    </td>
                    <td className="py-2 px-3 font-mono text-xs">{formatDate(d.modifiedAt)}</td>
                    <td className="py-2 px-3">
                      {d.error ? (
                        <span className="text-xs text-[var(--color-red)]">{d.error}</span>
                      ) : (
                        <span className="text-xs px-1.5 py-0.5 rounded bg-[var(--color-border)] text-[var(--color-text-muted)]">
                          OK
                        </span>
                      )}
                    </td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        )}
      </Card>
    </div>
  );
}
