"use client";

import { useEffect, useRef } from "react";
import {
  createChart,
  LineSeries,
  type IChartApi,
  type ISeriesApi,
  type LineData,
  type Time,
  ColorType,
} from "lightweight-charts";
import type { TimePoint } from "@/types/dataset";

interface Props {
  points: TimePoint[];
  label: string;
  color?: string;
  height?: number;
}

function toChartTime(seconds: number): Time {
  return seconds as Time;
}

export function TimeSeriesChart({ points, label, color = "#636efa", height = 320 }: Props) {
  const containerRef = useRef<HTMLDivElement>(null);
  const chartRef = useRef<IChartApi | null>(null);
  const seriesRef = useRef<ISeriesApi<"Line"> | null>(null);

  // 차트 초기화
  useEffect(() => {
    if (!containerRef.current) return;

    const chart = createChart(containerRef.current, {
      width: containerRef.current.clientWidth,
      height,
      layout: {
        background: { type: ColorType.Solid, color: "#12121a" },
        textColor: "#888",
      },
      grid: {
        vertLines: { color: "#1e1e2e" },
        horzLines: { color: "#1e1e2e" },
      },
      timeScale: {
        timeVisible: false,
        borderColor: "#1e1e2e",
      },
      rightPriceScale: {
        borderColor: "#1e1e2e",
      },
    });

    chartRef.current = chart;
    seriesRef.current = chart.addSeries(LineSeries, { color, lineWidth: 2 });

    // 리사이즈 대응
    const observer = new ResizeObserver((entries) => {
      for (const entry of entries) {
        chart.applyOptions({ width: entry.contentRect.width });
      }
    });
    observer.observe(containerRef.current);

    return () => {
      observer.disconnect();
      chart.remove();
      chartRef.current = null;
      seriesRef.current = null;
    };
  }, [height, color]);

  // 데이터 / 라벨 업데이트
  useEffect(() => {
    const series = seriesRef.current;
    if (!series) return;

    series.applyOptions({ title: label });
    const data: LineData<Time>[] = points.map((p) => ({
      time: toChartTime(p.time),
      value: p.value,
    }));
    series.setData(data);
    chartRef.current?.timeScale().fitContent();
  }, [points, label, height, color]);

  return (
    <div
      ref={containerRef}
      className="w-full rounded border border-[var(--color-border)]"
    />
  );
}
