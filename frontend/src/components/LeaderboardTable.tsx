// frontend/src/components/LeaderboardTable.tsx
import { useState } from "react";
import { formatKm, formatWatts } from "../lib/formatters";
import type { Leaderboard, LeaderboardWindow } from "../lib/schema";

type Props = {
  leaderboard: Leaderboard;
  onWindowChange?: (window: LeaderboardWindow) => void;
};

const WINDOWS: { value: LeaderboardWindow; label: string }[] = [
  { value: "latest", label: "Latest period" },
  { value: "all", label: "All time" },
];

export default function LeaderboardTable({ leaderboard, onWindowChange }: Props) {
  const [tab, setTab] = useState<"riders" | "teams">("riders");

  const caption =
    leaderboard.window === "latest" && leaderboard.periodLabel
      ? `Top ${tab} – ${leaderboard.periodLabel}`
      : `Top ${tab} – all time`;

  return (
    <div className="rounded-xl border border-slate-200 bg-white overflow-hidden">
      <div className="flex items-center justify-between gap-4 border-b border-slate-200 px-5 pt-3">
        <div className="flex gap-6">
          {(["riders", "teams"] as const).map((t) => (
            <button
              key={t}
              type="button"
              onClick={() => setTab(t)}
              className={[
                "pb-3 text-base font-medium",
                tab === t
                  ? "text-emerald-600 border-b-2 border-emerald-600"
                  : "text-slate-500 hover:text-slate-800",
              ].join(" ")}
            >
              {t === "riders" ? "Riders" : "Teams"}
            </button>
          ))}
        </div>

        {onWindowChange && (
          <div className="flex gap-2 pb-3 text-sm">
            {WINDOWS.map((w) => (
              <button
                key={w.value}
                type="button"
                aria-pressed={leaderboard.window === w.value}
                onClick={() => onWindowChange(w.value)}
                className={`px-3 py-1 rounded-2xl border ${
                  leaderboard.window === w.value ? "shadow bg-slate-900 text-white" : ""
                }`}
              >
                {w.label}
              </button>
            ))}
          </div>
        )}
      </div>

      <table className="w-full text-sm">
        <caption className="px-5 py-2 text-left text-xs text-slate-500">{caption}</caption>
        <thead className="bg-slate-50 text-left text-xs font-semibold uppercase text-slate-500">
          <tr>
            <th className="px-5 py-2">#</th>
            <th className="px-5 py-2">Name</th>
            {tab === "riders" ? <th className="px-5 py-2">Team</th> : <th className="px-5 py-2">Riders</th>}
            <th className="px-5 py-2 text-right">Distance</th>
            <th className="px-5 py-2 text-right">Avg power</th>
            <th className="px-5 py-2 text-right">Rides</th>
          </tr>
        </thead>
        <tbody>
          {tab === "riders"
            ? leaderboard.riders.map((r, i) => (
                <tr key={r.name} className="border-t border-slate-100">
                  <td className="px-5 py-2 font-bold text-slate-800">{i + 1}</td>
                  <td className="px-5 py-2 font-medium">{r.name}</td>
                  <td className="px-5 py-2 text-slate-600">{r.team}</td>
                  <td className="px-5 py-2 text-right font-semibold text-emerald-600">{formatKm(r.distance)}</td>
                  <td className="px-5 py-2 text-right">{r.power > 0 ? formatWatts(r.power) : "—"}</td>
                  <td className="px-5 py-2 text-right">{r.rides}</td>
                </tr>
              ))
            : leaderboard.teams.map((t, i) => (
                <tr key={t.name} className="border-t border-slate-100">
                  <td className="px-5 py-2 font-bold text-slate-800">{i + 1}</td>
                  <td className="px-5 py-2 font-medium">{t.name}</td>
                  <td className="px-5 py-2 text-slate-600">{t.riderCount}</td>
                  <td className="px-5 py-2 text-right font-semibold text-emerald-600">{formatKm(t.distance)}</td>
                  <td className="px-5 py-2 text-right">{t.power > 0 ? formatWatts(t.power) : "—"}</td>
                  <td className="px-5 py-2 text-right">{t.rides}</td>
                </tr>
              ))}
        </tbody>
      </table>
    </div>
  );
}
