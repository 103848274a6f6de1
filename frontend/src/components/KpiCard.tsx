// frontend/src/components/KpiCard.tsx
import type { Trend } from "../lib/formatters";

type Props = {
  label: string;
  value: string;
  /** Ferdig formatert delta, f.eks. "+12.0 km" */
  delta?: string;
  trend?: Trend;
  hint?: string;
};

const TREND_CLASS: Record<Trend, string> = {
  up: "text-emerald-600",
  down: "text-red-600",
  flat: "text-slate-500",
};

export default function KpiCard({ label, value, delta, trend = "flat", hint }: Props) {
  return (
    <div className="rounded-xl border border-slate-200 bg-white p-4" data-testid="kpi-card">
      <div className="text-xs font-semibold uppercase text-slate-500">{label}</div>
      <div className="mt-1 text-2xl font-semibold text-slate-800">{value}</div>
      {delta !== undefined && (
        <div className={`mt-1 text-sm ${TREND_CLASS[trend]}`} data-testid="kpi-delta">
          {delta}
          {hint ? <span className="text-slate-400"> {hint}</span> : null}
        </div>
      )}
    </div>
  );
}
