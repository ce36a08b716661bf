"use client";

import { useState } from "react";
import useSWR from "swr";
import { Card } from "@/components/common/Card";
import { DataTable } from "@/components/table/DataTable";
import { fetcher, REFRESH_INTERVAL_MS } from "@/lib/fetcher";
import type { PriceView } from "@/types/metrics";
import { ChartGrid } from "./ChartGrid";

interface ParamInput {
  key: "baseFees" | "preferentialShares" | "inflationFactor";
  label: string;
  step: number;
}

const PARAM_INPUTS: ParamInput[] = [
  { key: "baseFees", label: "Base fees (%)", step: 1 },
  { key: "preferentialShares", label: "Preferential shares (%)", step: 1 },
  { key: "inflationFactor", label: "Inflation factor", step: 0.1 },
];

type ParamState = Record<ParamInput["key"], string>;

function toQuery(params: ParamState): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value.trim() !== "") search.set(key, value.trim());
  }
  const qs = search.toString();
  return qs ? `?${qs}` : "";
}

export function PriceMetrics() {
  // 빈 값이면 서버 기본값 사용
  const [params, setParams] = useState<ParamState>({
    baseFees: "",
    preferentialShares: "",
    inflationFactor: "",
  });

  const { data, error, isLoading } = useSWR<PriceView, Error>(
    `/api/views/price${toQuery(params)}`,
    fetcher,
    { refreshInterval: REFRESH_INTERVAL_MS, keepPreviousData: true }
  );

  const controls = (
    <div className="flex items-center gap-3">
      {PARAM_INPUTS.map((input) => {
        const defaultValue =
          input.key === "baseFees"
            ? data?.params.baseFeesPercent
            : input.key === "preferentialShares"
              ? data?.params.preferentialSharesPercent
              : data?.params.inflationFactor;
        return (
          <label key={input.key} className="flex items-center gap-1.5 text-xs text-[var(--color-text-muted)]">
            {input.label}
            <input
              type="number"
              step={input.step}
              placeholder={defaultValue !== undefined ? String(defaultValue) : ""}
              value={params[input.key]}
              onChange={(e) => setParams((prev) => ({ ...prev, [input.key]: e.target.value }))}
              className="bg-[var(--color-surface)] border border-[var(--color-border)] rounded px-2 py-1 text-sm w-20 font-mono text-[var(--color-text)]"
            />
          </label>
        );
      })}
    </div>
  );

  if (error) {
    return (
      <Card title="Price Metrics" actions={controls} error={error.message} />
    );
  }
  if (isLoading || !data) {
    return <p className="text-sm text-[var(--color-text-muted)]">Loading price data...</p>;
  }

  return (
    <div className="space-y-4">
      <Card title="Calculation parameters" actions={controls}>
        <p className="text-xs text-[var(--color-text-muted)]">
          Base fees {data.params.baseFeesPercent}% · Preferential shares{" "}
          {data.params.preferentialSharesPercent}% · Inflation factor {data.params.inflationFactor}
        </p>
      </Card>
      {data.tables.map((table) => (
        <Card key={table.title} title={table.title}>
          <DataTable columns={table.columns} rows={table.rows} />
        </Card>
      ))}
      <ChartGrid charts={data.charts} colors={data.colors} />
    </div>
  );
}
