// frontend/src/components/Histogram.tsx
import { useMemo } from "react";
import { Bar, BarChart, CartesianGrid, Tooltip, XAxis, YAxis } from "recharts";
import { METRIC_LABELS } from "../lib/formatters";
import type { Distribution } from "../lib/schema";

type Props = {
  distribution: Distribution;
  width?: number;
  height?: number;
};

function binLabel(start: number, end: number): string {
  const digits = end - start < 10 ? 1 : 0;
  return `${start.toFixed(digits)}–${end.toFixed(digits)}`;
}

export default function Histogram({ distribution, width = 720, height = 240 }: Props) {
  const data = useMemo(
    () => distribution.bins.map((b) => ({ bin: binLabel(b.start, b.end), count: b.count })),
    [distribution]
  );

  if (data.length === 0) {
    return (
      <div className="text-sm text-slate-500" data-testid="histogram-empty">
        No values for {METRIC_LABELS[distribution.metric].toLowerCase()}.
      </div>
    );
  }

  return (
    <BarChart width={width} height={height} data={data}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="bin" />
      <YAxis allowDecimals={false} />
      <Tooltip />
      <Bar dataKey="count" name="Rides" fill="#38bdf8" />
    </BarChart>
  );
}
