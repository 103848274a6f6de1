// frontend/src/routes/ResultsPage.tsx
import { useCallback, useEffect, useState } from "react";
import ErrorBanner from "../components/ErrorBanner";
import { fetchLeaderboard, fetchRaceResults } from "../lib/api";
import { formatKm } from "../lib/formatters";
import type { Leaderboard, Race } from "../lib/schema";

const HIGHLIGHT_SIZE = 3;

export default function ResultsPage() {
  const [races, setRaces] = useState<Race[] | null>(null);
  const [leaders, setLeaders] = useState<Leaderboard | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  const load = useCallback(async () => {
    setLoading(true);
    setError(null);
    const [raceRes, boardRes] = await Promise.all([fetchRaceResults(), fetchLeaderboard("month", "latest")]);
    setLoading(false);

    if (raceRes.ok) setRaces(raceRes.data);
    if (boardRes.ok) setLeaders(boardRes.data);
    const firstError = !raceRes.ok ? raceRes.error : !boardRes.ok ? boardRes.error : null;
    setError(firstError);
  }, []);

  useEffect(() => {
    void load();
  }, [load]);

  return (
    <div className="flex flex-col gap-8">
      <section>
        <h1 className="text-3xl font-bold text-slate-800 mb-2">🏁 Race results</h1>
        <p className="text-slate-600">Recent races and the strongest riders this period.</p>
      </section>

      {error && <ErrorBanner message={error} onRetry={() => void load()} />}
      {loading && !races && <div className="text-sm text-slate-500">Loading…</div>}

      {leaders && (leaders.riders.length > 0 || leaders.teams.length > 0) && (
        <section className="grid gap-4 md:grid-cols-2" aria-label="Highlights">
          <div className="rounded-xl border border-slate-200 bg-white p-4">
            <h2 className="font-semibold">Top riders{leaders.periodLabel ? ` – ${leaders.periodLabel}` : ""}</h2>
            <ol className="mt-2 flex flex-col gap-1 text-sm">
              {leaders.riders.slice(0, HIGHLIGHT_SIZE).map((r) => (
                <li key={r.name} className="flex justify-between">
                  <span>
                    {r.name} <span className="text-slate-500">({r.team})</span>
                  </span>
                  <span className="font-semibold text-emerald-600">{formatKm(r.distance)}</span>
                </li>
              ))}
            </ol>
          </div>
          <div className="rounded-xl border border-slate-200 bg-white p-4">
            <h2 className="font-semibold">Top teams{leaders.periodLabel ? ` – ${leaders.periodLabel}` : ""}</h2>
            <ol className="mt-2 flex flex-col gap-1 text-sm">
              {leaders.teams.slice(0, HIGHLIGHT_SIZE).map((t) => (
                <li key={t.name} className="flex justify-between">
                  <span>{t.name}</span>
                  <span className="font-semibold text-emerald-600">{formatKm(t.distance)}</span>
                </li>
              ))}
            </ol>
          </div>
        </section>
      )}

      {races?.map((race) => (
        <section key={race.id} className="rounded-xl border border-slate-200 bg-white overflow-hidden">
          <header className="flex flex-wrap items-baseline justify-between gap-2 bg-slate-50 px-5 py-3">
            <h2 className="text-lg font-semibold">{race.name}</h2>
            <span className="text-sm text-slate-500">
              {race.date} · {race.location} · {formatKm(race.distanceKm)} · {race.category}
            </span>
          </header>
          <table className="w-full text-sm">
            <thead className="text-left text-xs font-semibold uppercase text-slate-500">
              <tr>
                <th className="px-5 py-2">#</th>
                <th className="px-5 py-2">Rider</th>
                <th className="px-5 py-2">Team</th>
                <th className="px-5 py-2 text-right">Time</th>
                <th className="px-5 py-2 text-right">Gap</th>
              </tr>
            </thead>
            <tbody>
              {race.results.map((r) => (
                <tr key={`${race.id}-${r.position}`} className="border-t border-slate-100">
                  <td className="px-5 py-2 font-bold">{r.position}</td>
                  <td className="px-5 py-2">{r.rider}</td>
                  <td className="px-5 py-2 text-slate-600">{r.team}</td>
                  <td className="px-5 py-2 text-right font-mono">{r.time}</td>
                  <td className="px-5 py-2 text-right font-mono text-slate-500">{r.gap ?? "—"}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </section>
      ))}

      {races && races.length === 0 && <div className="text-sm text-slate-500">No results yet.</div>}
    </div>
  );
}
