"use client";

import useSWR from "swr";
import { Card } from "@/components/common/Card";
import { DataTable } from "@/components/table/DataTable";
import { fetcher, REFRESH_INTERVAL_MS } from "@/lib/fetcher";
import type { StakingView } from "@/types/metrics";
import { ChartGrid } from "./ChartGrid";

export function StakingMetrics() {
  const { data, error, isLoading } = useSWR<StakingView, Error>("/api/views/staking", fetcher, {
    refreshInterval: REFRESH_INTERVAL_MS,
  });

  if (error) {
    return <Card title="Staking Metrics" error={error.message} />;
  }
  if (isLoading || !data) {
    return <p className="text-sm text-[var(--color-text-muted)]">Loading staking data...</p>;
  }

  return (
    <div className="space-y-4">
      <Card title={data.table.title}>
        <DataTable columns={data.table.columns} rows={data.table.rows} />
      </Card>
      <ChartGrid charts={data.charts} colors={data.colors} />
    </div>
  );
}
