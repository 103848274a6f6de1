// frontend/src/components/RidersTable.tsx
import { formatBpm, formatHours, formatKm, formatMeters, formatWatts } from "../lib/formatters";
import type { RiderSummary } from "../lib/schema";

type Props = {
  riders: RiderSummary[];
};

export default function RidersTable({ riders }: Props) {
  if (riders.length === 0) {
    return <div className="text-sm text-slate-500">No riders.</div>;
  }

  return (
    <table className="w-full text-sm">
      <thead className="bg-slate-50 text-left text-xs font-semibold uppercase text-slate-500">
        <tr>
          <th className="px-3 py-2">Rider</th>
          <th className="px-3 py-2">Team</th>
          <th className="px-3 py-2 text-right">Distance</th>
          <th className="px-3 py-2 text-right">Time</th>
          <th className="px-3 py-2 text-right">Avg power</th>
          <th className="px-3 py-2 text-right">Avg HR</th>
          <th className="px-3 py-2 text-right">Elevation</th>
        </tr>
      </thead>
      <tbody>
        {riders.map((r) => (
          <tr key={r.name} className="border-t border-slate-100 hover:bg-slate-50">
            <td className="px-3 py-2 font-medium text-slate-800">{r.name}</td>
            <td className="px-3 py-2 text-slate-600">{r.team}</td>
            <td className="px-3 py-2 text-right">{formatKm(r.distance)}</td>
            <td className="px-3 py-2 text-right">{formatHours(r.duration)}</td>
            {/* 0 betyr "ingen målinger" fra API-et */}
            <td className="px-3 py-2 text-right">{r.power > 0 ? formatWatts(r.power) : "—"}</td>
            <td className="px-3 py-2 text-right">{r.hr > 0 ? formatBpm(r.hr) : "—"}</td>
            <td className="px-3 py-2 text-right">{formatMeters(r.elevation)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
