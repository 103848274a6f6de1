// frontend/src/components/RecordsTable.tsx
// Rådata for gjeldende filtre, én side om gangen.
import {
  formatBpm,
  formatCount,
  formatDateTime,
  formatHours,
  formatKm,
  formatMeters,
  formatSpeed,
  formatWatts,
} from "../lib/formatters";
import type { RecordsPage } from "../lib/schema";

type Props = {
  page: RecordsPage;
  onPage: (offset: number) => void;
  disabled?: boolean;
};

export default function RecordsTable({ page, onPage, disabled }: Props) {
  const { records, total, offset, limit } = page;

  if (total === 0) {
    return <div className="p-3 text-sm text-slate-500">No rides match the selected filters.</div>;
  }

  const first = offset + 1;
  const last = offset + records.length;

  return (
    <div className="flex flex-col">
      <table className="w-full text-sm">
        <thead className="bg-slate-50 text-left text-xs font-semibold uppercase text-slate-500">
          <tr>
            <th className="px-3 py-2">Time (UTC)</th>
            <th className="px-3 py-2">Rider</th>
            <th className="px-3 py-2">Team</th>
            <th className="px-3 py-2 text-right">Distance</th>
            <th className="px-3 py-2 text-right">Time</th>
            <th className="px-3 py-2 text-right">Power</th>
            <th className="px-3 py-2 text-right">HR</th>
            <th className="px-3 py-2 text-right">Elevation</th>
            <th className="px-3 py-2 text-right">Speed</th>
          </tr>
        </thead>
        <tbody>
          {records.map((r) => (
            <tr key={r.index} className="border-t border-slate-100">
              <td className="px-3 py-2 font-mono text-slate-600">{formatDateTime(r.timestamp)}</td>
              <td className="px-3 py-2">{r.rider_name}</td>
              <td className="px-3 py-2 text-slate-600">{r.team_name}</td>
              <td className="px-3 py-2 text-right">{formatKm(r.distance_km)}</td>
              <td className="px-3 py-2 text-right">
                {formatHours(r.duration_sec === null ? null : r.duration_sec / 3600)}
              </td>
              <td className="px-3 py-2 text-right">{formatWatts(r.power_watts)}</td>
              <td className="px-3 py-2 text-right">{formatBpm(r.heart_rate_bpm)}</td>
              <td className="px-3 py-2 text-right">{formatMeters(r.elevation_gain_m)}</td>
              <td className="px-3 py-2 text-right">{formatSpeed(r.speed_kmh)}</td>
            </tr>
          ))}
        </tbody>
      </table>

      <div className="flex items-center justify-between border-t border-slate-200 px-3 py-2 text-sm text-slate-600">
        <span data-testid="records-range">
          {formatCount(first)}–{formatCount(last)} of {formatCount(total)}
        </span>
        <div className="flex gap-2">
          <button
            type="button"
            disabled={disabled || offset === 0}
            onClick={() => onPage(Math.max(0, offset - limit))}
            className="rounded-lg border border-slate-300 px-3 py-1 disabled:opacity-50"
          >
            Previous
          </button>
          <button
            type="button"
            disabled={disabled || last >= total}
            onClick={() => onPage(offset + limit)}
            className="rounded-lg border border-slate-300 px-3 py-1 disabled:opacity-50"
          >
            Next
          </button>
        </div>
      </div>
    </div>
  );
}
