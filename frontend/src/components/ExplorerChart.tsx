// frontend/src/components/ExplorerChart.tsx
import { useMemo } from "react";
import { CartesianGrid, Legend, Line, LineChart, Tooltip, XAxis, YAxis } from "recharts";
import { pivotRows } from "../lib/pivot";
import type { AggregateResponse } from "../lib/schema";

const COLORS = ["#059669", "#0284c7", "#7c3aed", "#db2777", "#ea580c", "#65a30d", "#0f172a", "#ca8a04"];

type Props = {
  result: AggregateResponse;
  width?: number;
  height?: number;
};

export default function ExplorerChart({ result, width = 720, height = 300 }: Props) {
  const { series, points } = useMemo(
    () => pivotRows(result.rows, result.groupBy),
    [result]
  );

  if (points.length === 0) {
    return (
      <div className="text-sm text-slate-500" data-testid="explorer-chart-empty">
        No data for the selected filters.
      </div>
    );
  }

  return (
    <LineChart width={width} height={height} data={points}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="label" />
      <YAxis />
      <Tooltip />
      <Legend />
      {series.map((s, i) => (
        <Line
          key={s.key}
          type="monotone"
          dataKey={s.key}
          name={s.name}
          stroke={COLORS[i % COLORS.length]}
          connectNulls
          dot={false}
        />
      ))}
    </LineChart>
  );
}
