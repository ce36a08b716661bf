"use client";

import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import { formatCompact } from "@/lib/metrics/format";
import type { MetricChart } from "@/types/metrics";

interface Props {
  chart: MetricChart;
  colors: Record<string, string>;
  height?: number;
}

const FALLBACK_COLOR = "#636efa";

export function MetricBarChart({ chart, colors, height = 280 }: Props) {
  const plotted = chart.points.filter((point) => point.value !== null);

  if (plotted.length === 0) {
    return (
      <p className="text-sm text-[var(--color-text-muted)] py-4 text-center">
        No plottable values{chart.scale === "log" ? " (log scale needs positive values)" : ""}.
      </p>
    );
  }

  return (
    <div className="w-full">
      <p className="text-xs text-[var(--color-text-muted)] mb-2">{chart.title}</p>
      <ResponsiveContainer width="100%" height={height}>
        <BarChart data={chart.points} baseValue={chart.scale === "log" ? "dataMin" : 0}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="asset" stroke="#888" tick={{ fontSize: 12 }} />
          <YAxis
            scale={chart.scale}
            domain={["auto", "auto"]}
            allowDataOverflow
            stroke="#888"
            tick={{ fontSize: 12 }}
            tickFormatter={(value: number) => formatCompact(value)}
          />
          <Tooltip
            cursor={{ fill: "rgba(255,255,255,0.05)" }}
            contentStyle={{ background: "#12121a", border: "1px solid #1e1e2e" }}
            formatter={(value) => (typeof value === "number" ? formatCompact(value) : String(value))}
          />
          <Bar dataKey="value" name={chart.metric} isAnimationActive={false}>
            {/* 스테이킹 뷰는 같은 자산이 여러 행일 수 있어 인덱스를 키로 쓴다 */}
            {chart.points.map((point, i) => (
              <Cell key={i} fill={colors[point.asset] ?? FALLBACK_COLOR} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
