"use client";

import { useState } from "react";
import { PriceMetrics } from "@/components/views/PriceMetrics";
import { StakingMetrics } from "@/components/views/StakingMetrics";

const VIEWS = ["Staking Metrics", "Price Metrics"] as const;
type DataView = (typeof VIEWS)[number];

function isDataView(value: string): value is DataView {
  return VIEWS.some((view) => view === value);
}

export default function DashboardPage() {
  const [view, setView] = useState<DataView>("Staking Metrics");

  return (
    <div className="space-y-4">
      <div className="flex items-center justify-between">
        <h1 className="text-xl font-bold">Cryptocurrency Asset Metrics</h1>

        <label className="flex items-center gap-2 text-sm text-[var(--color-text-muted)]">
          Select Data View
          <select
            value={view}
            onChange={(e) => {
              if (isDataView(e.target.value)) setView(e.target.value);
            }}
            className="bg-[var(--color-surface)] border border-[var(--color-border)] rounded px-3 py-1 text-sm text-[var(--color-text)]"
          >
            {VIEWS.map((v) => (
              <option key={v} value={v}>
                {v}
              </option>
            ))}
          </select>
        </label>
      </div>

      {view === "Staking Metrics" ? <StakingMetrics /> : <PriceMetrics />}
    </div>
  );
}
