// frontend/src/components/TeamComparisonChart.tsx
import { useMemo } from "react";
import { Bar, BarChart, CartesianGrid, Legend, Tooltip, XAxis, YAxis } from "recharts";
import type { TeamComparison } from "../lib/schema";

type Props = {
  comparison: TeamComparison;
  width?: number;
  height?: number;
};

export default function TeamComparisonChart({ comparison, width = 480, height = 260 }: Props) {
  const data = useMemo(
    () =>
      comparison.teams.map((team) => {
        const m = comparison.metrics[team];
        return {
          team,
          distance: m ? Math.round(m.totalDistance) : 0,
          power: m ? Math.round(m.avgPower) : 0,
        };
      }),
    [comparison]
  );

  return (
    <BarChart width={width} height={height} data={data}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="team" />
      <YAxis />
      <Tooltip />
      <Legend />
      <Bar dataKey="distance" name="Total distance (km)" fill="#34d399" />
      <Bar dataKey="power" name="Avg power (W)" fill="#64748b" />
    </BarChart>
  );
}
