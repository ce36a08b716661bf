"use client";

import { Card } from "@/components/common/Card";
import { MetricBarChart } from "@/components/chart/MetricBarChart";
import type { MetricChart } from "@/types/metrics";

interface Props {
  charts: MetricChart[];
  colors: Record<string, string>;
}

export function ChartGrid({ charts, colors }: Props) {
  return (
    <div className="grid grid-cols-1 xl:grid-cols-2 gap-3">
      {charts.map((chart) => (
        <Card key={chart.metric} title={chart.heading}>
          <MetricBarChart chart={chart} colors={colors} />
        </Card>
      ))}
    </div>
  );
}
