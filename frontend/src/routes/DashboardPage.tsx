// frontend/src/routes/DashboardPage.tsx
import { useEffect } from "react";
import ErrorBanner from "../components/ErrorBanner";
import KpiCard from "../components/KpiCard";
import LeaderboardTable from "../components/LeaderboardTable";
import NewsList from "../components/NewsList";
import PerformanceChart from "../components/PerformanceChart";
import PeriodPicker from "../components/PeriodPicker";
import RidersTable from "../components/RidersTable";
import TeamComparisonChart from "../components/TeamComparisonChart";
import UploadCard from "../components/UploadCard";
import { formatBpm, formatHours, formatKm, formatMeters, formatWatts } from "../lib/formatters";
import { useDashboardStore } from "../state/dashboardStore";

export default function DashboardPage() {
  const s = useDashboardStore();
  const { load } = s;

  useEffect(() => {
    void load();
  }, [load]);

  return (
    <div className="flex flex-col gap-8">
      <section>
        <h1 className="text-2xl font-semibold tracking-tight mb-2">Team dashboard</h1>
        <p className="text-slate-600 max-w-xl">
          Distance, power and heart rate across riders and teams.
        </p>
      </section>

      {s.error && <ErrorBanner message={s.error} onRetry={() => void s.load()} />}

      <section className="max-w-2xl">
        <UploadCard
          dataset={s.dataset}
          uploading={s.uploading}
          message={s.uploadMessage}
          error={s.uploadError}
          onUpload={(file, mapping) => void s.upload(file, mapping)}
          onReset={() => void s.resetDataset()}
        />
      </section>

      {s.stats && (
        <section className="grid grid-cols-2 gap-4 md:grid-cols-5" aria-label="Summary">
          <KpiCard label="Total distance" value={formatKm(s.stats.totalDistance)} />
          <KpiCard label="Total time" value={formatHours(s.stats.totalDuration)} />
          <KpiCard label="Avg power" value={formatWatts(s.stats.avgPower)} />
          <KpiCard label="Avg heart rate" value={formatBpm(s.stats.avgHeartRate)} />
          <KpiCard label="Elevation gain" value={formatMeters(s.stats.totalElevation)} />
        </section>
      )}

      <section className="flex flex-col gap-3">
        <div className="flex items-center justify-between">
          <h2 className="text-lg font-semibold">Performance over time</h2>
          <PeriodPicker value={s.period} onChange={(p) => void s.setPeriod(p)} disabled={s.loading} />
        </div>
        {s.series ? <PerformanceChart series={s.series} /> : <Loading loading={s.loading} />}
      </section>

      <section className="grid gap-6 lg:grid-cols-2">
        <div className="flex flex-col gap-3">
          <h2 className="text-lg font-semibold">Team comparison</h2>
          {s.teams ? <TeamComparisonChart comparison={s.teams} /> : <Loading loading={s.loading} />}
        </div>
        <div className="flex flex-col gap-3">
          <h2 className="text-lg font-semibold">🏆 Leaderboard</h2>
          {s.leaderboard ? (
            <LeaderboardTable leaderboard={s.leaderboard} onWindowChange={(w) => void s.setWindow(w)} />
          ) : (
            <Loading loading={s.loading} />
          )}
        </div>
      </section>

      <section className="flex flex-col gap-3">
        <h2 className="text-lg font-semibold">Riders</h2>
        <div className="rounded-xl border border-slate-200 bg-white overflow-hidden">
          {s.riders ? <RidersTable riders={s.riders} /> : <Loading loading={s.loading} />}
        </div>
      </section>

      <section className="flex flex-col gap-3 max-w-2xl">
        <h2 className="text-lg font-semibold">News</h2>
        {s.news ? <NewsList items={s.news} /> : <Loading loading={s.loading} />}
      </section>
    </div>
  );
}

function Loading({ loading }: { loading: boolean }) {
  return <div className="text-sm text-slate-500">{loading ? "Loading…" : "No data."}</div>;
}
