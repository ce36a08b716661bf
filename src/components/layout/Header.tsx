"use client";

import useSWR from "swr";
import { fetcher, REFRESH_INTERVAL_MS } from "@/lib/fetcher";
import type { DatasetListResponse } from "@/types/dataset";

export function Header() {
  const { data, error } = useSWR<DatasetListResponse, Error>("/api/datasets", fetcher, {
    refreshInterval: REFRESH_INTERVAL_MS,
  });

  return (
    <header className="h-12 border-b border-[var(--color-border)] bg-[var(--color-surface)] flex items-center justify-between px-4">
      <span className="text-sm font-bold">Cryptocurrency Asset Metrics</span>
      <div className="flex items-center gap-2 text-sm">
        <span className="text-[var(--color-text-muted)]">Data:</span>
        {error ? (
          <span className="text-xs text-[var(--color-red)]">{error.message}</span>
        ) : (
          <span className="font-mono text-xs">{data?.dataDir ?? "-"}</span>
        )}
      </div>
    </header>
  );
}
