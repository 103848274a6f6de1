// frontend/src/components/PerformanceChart.tsx
// Distanse som stolper, snittwatt som linje på egen akse.
import { useMemo } from "react";
import {
  Bar,
  CartesianGrid,
  ComposedChart,
  Legend,
  Line,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { TimeSeries } from "../lib/schema";

type Props = {
  series: TimeSeries;
  width?: number;
  height?: number;
};

export default function PerformanceChart({ series, width = 720, height = 300 }: Props) {
  const data = useMemo(
    () =>
      series.labels.map((label, i) => ({
        label,
        distance: series.distance[i] ?? 0,
        power: series.power[i] ?? null,
      })),
    [series]
  );

  if (data.length === 0) {
    return (
      <div className="text-sm text-slate-500" data-testid="chart-empty">
        No rides in the dataset.
      </div>
    );
  }

  return (
    <ComposedChart width={width} height={height} data={data}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="label" />
      <YAxis yAxisId="distance" unit=" km" />
      <YAxis yAxisId="power" orientation="right" unit=" W" />
      <Tooltip />
      <Legend />
      <Bar yAxisId="distance" dataKey="distance" name="Distance (km)" fill="#34d399" />
      <Line
        yAxisId="power"
        type="monotone"
        dataKey="power"
        name="Avg power (W)"
        stroke="#0f172a"
        connectNulls
      />
    </ComposedChart>
  );
}
