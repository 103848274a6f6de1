// frontend/src/routes/ExplorerPage.tsx
import { useEffect, type FormEvent } from "react";
import AggregateTable from "../components/AggregateTable";
import ErrorBanner from "../components/ErrorBanner";
import ExplorerChart from "../components/ExplorerChart";
import Histogram from "../components/Histogram";
import KpiCard from "../components/KpiCard";
import PeriodPicker from "../components/PeriodPicker";
import RecordsTable from "../components/RecordsTable";
import {
  AGG_LABELS,
  GROUP_LABELS,
  METRIC_LABELS,
  formatBpm,
  formatCount,
  formatDay,
  formatDelta,
  formatHours,
  formatKm,
  formatMeters,
  formatWatts,
  trendOf,
} from "../lib/formatters";
import {
  AGG_FUNCS,
  AggFuncSchema,
  GROUP_FIELDS,
  METRIC_FIELDS,
  MetricFieldSchema,
  type GroupField,
  type KpiComparison,
} from "../lib/schema";
import { useExplorerStore } from "../state/explorerStore";

export default function ExplorerPage() {
  const {
    filters,
    aggregate,
    kpis,
    distribution,
    records,
    loading,
    error,
    setFilters,
    resetFilters,
    run,
    pageRecords,
  } = useExplorerStore();

  useEffect(() => {
    void run();
  }, [run]);

  const submit = (e: FormEvent) => {
    e.preventDefault();
    void run();
  };

  const toggleGroup = (g: GroupField, on: boolean) => {
    const next = on ? [...filters.groupBy, g] : filters.groupBy.filter((x) => x !== g);
    // samme rekkefølge som GROUP_FIELDS uansett klikkrekkefølge
    setFilters({ groupBy: GROUP_FIELDS.filter((x) => next.includes(x)) });
  };

  return (
    <div className="flex flex-col gap-8">
      <section>
        <h1 className="text-2xl font-semibold tracking-tight mb-2">Explorer</h1>
        <p className="text-slate-600 max-w-xl">
          Group, aggregate and filter the current dataset.
        </p>
      </section>

      <form
        onSubmit={submit}
        aria-label="Explorer filters"
        className="grid gap-3 rounded-xl border border-slate-200 bg-white p-4 md:grid-cols-4"
      >
        <PeriodPicker value={filters.period} onChange={(period) => setFilters({ period })} />

        <label className="flex items-center gap-2 text-sm text-slate-600">
          Metric
          <select
            value={filters.metric}
            onChange={(e) => {
              const parsed = MetricFieldSchema.safeParse(e.target.value);
              if (parsed.success) setFilters({ metric: parsed.data });
            }}
            className="rounded-lg border border-slate-300 bg-white px-2 py-1"
          >
            {METRIC_FIELDS.map((m) => (
              <option key={m} value={m}>
                {METRIC_LABELS[m]}
              </option>
            ))}
          </select>
        </label>

        <label className="flex items-center gap-2 text-sm text-slate-600">
          Aggregation
          <select
            value={filters.agg}
            onChange={(e) => {
              const parsed = AggFuncSchema.safeParse(e.target.value);
              if (parsed.success) setFilters({ agg: parsed.data });
            }}
            className="rounded-lg border border-slate-300 bg-white px-2 py-1"
          >
            {AGG_FUNCS.map((a) => (
              <option key={a} value={a}>
                {AGG_LABELS[a]}
              </option>
            ))}
          </select>
        </label>

        <fieldset className="flex items-center gap-3 text-sm text-slate-600">
          <legend className="sr-only">Group by</legend>
          Group by
          {GROUP_FIELDS.map((g) => (
            <label key={g} className="flex items-center gap-1">
              <input
                type="checkbox"
                checked={filters.groupBy.includes(g)}
                onChange={(e) => toggleGroup(g, e.target.checked)}
              />
              {GROUP_LABELS[g]}
            </label>
          ))}
        </fieldset>

        <label className="flex flex-col text-sm text-slate-600">
          Rider
          <input
            type="text"
            value={filters.rider}
            onChange={(e) => setFilters({ rider: e.target.value })}
            className="rounded-md border border-slate-300 px-2 py-1"
          />
        </label>
        <label className="flex flex-col text-sm text-slate-600">
          Team
          <input
            type="text"
            value={filters.team}
            onChange={(e) => setFilters({ team: e.target.value })}
            className="rounded-md border border-slate-300 px-2 py-1"
          />
        </label>
        <label className="flex flex-col text-sm text-slate-600">
          From
          <input
            type="date"
            value={filters.from}
            onChange={(e) => setFilters({ from: e.target.value })}
            className="rounded-md border border-slate-300 px-2 py-1"
          />
        </label>
        <label className="flex flex-col text-sm text-slate-600">
          To
          <input
            type="date"
            value={filters.to}
            onChange={(e) => setFilters({ to: e.target.value })}
            className="rounded-md border border-slate-300 px-2 py-1"
          />
        </label>

        <div className="flex gap-2 md:col-span-4">
          <button
            type="submit"
            disabled={loading}
            className="rounded-lg bg-slate-900 px-4 py-2 text-sm font-medium text-white disabled:opacity-50"
          >
            {loading ? "Loading…" : "Apply"}
          </button>
          <button
            type="button"
            onClick={() => {
              resetFilters();
              void run();
            }}
            className="rounded-lg border border-slate-300 px-4 py-2 text-sm"
          >
            Reset
          </button>
        </div>
      </form>

      {error && <ErrorBanner message={error} onRetry={() => void run()} />}

      {kpis && <KpiCards kpis={kpis} />}

      {aggregate && (
        <section className="flex flex-col gap-3">
          <h2 className="text-lg font-semibold">
            {AGG_LABELS[aggregate.agg]} {METRIC_LABELS[aggregate.metric].toLowerCase()} over time
          </h2>
          <ExplorerChart result={aggregate} />
          <div className="rounded-xl border border-slate-200 bg-white overflow-hidden">
            <AggregateTable result={aggregate} />
          </div>
        </section>
      )}

      {distribution && (
        <section className="flex flex-col gap-3">
          <h2 className="text-lg font-semibold">
            Distribution of {METRIC_LABELS[distribution.metric].toLowerCase()}
          </h2>
          <Histogram distribution={distribution} />
        </section>
      )}

      {records && (
        <details className="flex flex-col gap-3">
          <summary className="cursor-pointer text-lg font-semibold">Raw data</summary>
          <div className="mt-3 rounded-xl border border-slate-200 bg-white overflow-hidden">
            <RecordsTable page={records} onPage={(offset) => void pageRecords(offset)} disabled={loading} />
          </div>
        </details>
      )}
    </div>
  );
}

function KpiCards({ kpis }: { kpis: KpiComparison }) {
  const { current, delta } = kpis;
  const hint = `vs ${formatDay(kpis.previousFrom)} → ${formatDay(kpis.previousTo)}`;

  return (
    <section aria-label="KPIs" className="flex flex-col gap-2">
      <p className="text-sm text-slate-500">
        {formatDay(kpis.from)} → {formatDay(kpis.to)}
      </p>
      <div className="grid grid-cols-2 gap-4 md:grid-cols-6">
        <KpiCard
          label="Rides"
          value={formatCount(current.rides)}
          delta={formatDelta(delta.rides, formatCount)}
          trend={trendOf(delta.rides)}
          hint={hint}
        />
        <KpiCard
          label="Distance"
          value={formatKm(current.totalDistance)}
          delta={formatDelta(delta.totalDistance, formatKm)}
          trend={trendOf(delta.totalDistance)}
        />
        <KpiCard
          label="Time"
          value={formatHours(current.totalDuration)}
          delta={formatDelta(delta.totalDuration, formatHours)}
          trend={trendOf(delta.totalDuration)}
        />
        <KpiCard
          label="Avg power"
          value={formatWatts(current.avgPower)}
          delta={formatDelta(delta.avgPower, formatWatts)}
          trend={trendOf(delta.avgPower)}
        />
        <KpiCard
          label="Avg heart rate"
          value={formatBpm(current.avgHeartRate)}
          delta={formatDelta(delta.avgHeartRate, formatBpm)}
          trend={trendOf(delta.avgHeartRate)}
        />
        <KpiCard
          label="Elevation"
          value={formatMeters(current.totalElevation)}
          delta={formatDelta(delta.totalElevation, formatMeters)}
          trend={trendOf(delta.totalElevation)}
        />
      </div>
    </section>
  );
}
