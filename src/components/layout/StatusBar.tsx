"use client";

import { useEffect, useState } from "react";
import useSWR from "swr";
import { fetcher, REFRESH_INTERVAL_MS } from "@/lib/fetcher";
import type { DatasetListResponse } from "@/types/dataset";

function formatTime(ts: number): string {
  return new Date(ts).toLocaleTimeString("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
}

export function StatusBar() {
  // 같은 키라 Header 와 요청을 공유한다
  const { data, error } = useSWR<DatasetListResponse, Error>("/api/datasets", fetcher, {
    refreshInterval: REFRESH_INTERVAL_MS,
  });
  const [updatedAt, setUpdatedAt] = useState<number | null>(null);

  // 목록 내용이 바뀔 때만 갱신된다
  useEffect(() => {
    if (data) setUpdatedAt(Date.now());
  }, [data]);

  const total = data?.datasets.length ?? 0;
  const broken = data?.datasets.filter((d) => d.error).length ?? 0;
  const healthy = !error && broken === 0;

  return (
    <footer className="h-8 border-t border-[var(--color-border)] bg-[var(--color-surface)] flex items-center px-4 text-xs text-[var(--color-text-muted)] gap-6">
      <div className="flex items-center gap-1.5">
        <span
          className={`w-1.5 h-1.5 rounded-full ${
            healthy ? "bg-[var(--color-green)]" : "bg-[var(--color-red)]"
          }`}
        />
        <span>{error ? "Data directory unavailable" : "Data directory OK"}</span>
      </div>
      <div>
        Datasets: <span className="text-[var(--color-text)]">{total}</span>
      </div>
      {broken > 0 && (
        <div>
          Failed: <span className="text-[var(--color-red)]">{broken}</span>
        </div>
      )}
      <div>
        Updated:{" "}
        <span className="text-[var(--color-text)]">
          {updatedAt ? formatTime(updatedAt) : "-"}
        </span>
      </div>
    </footer>
  );
}

