// frontend/src/lib/formatters.ts
import type { AggFunc, GroupField, MetricField, Period } from "./schema";

type Opts = { fallback?: string };
const Fallback = "—";

function pickFallback(opts?: Opts) {
  return opts?.fallback ?? Fallback;
}

function isNum(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function nf(locales: string, options?: Intl.NumberFormatOptions): Intl.NumberFormat {
  return new Intl.NumberFormat(locales, options);
}

const dec1 = nf("en-US", { minimumFractionDigits: 1, maximumFractionDigits: 1 });
const int0 = nf("en-US", { maximumFractionDigits: 0 });

/* ────────────────────────────────────────────────────────────────────────────
 * Enheter
 * ────────────────────────────────────────────────────────────────────────────
 */

/** "1,234.5 km" */
export function formatKm(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return `${dec1.format(value)} km`;
}

/** Timer med én desimal, "3.5 h" */
export function formatHours(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return `${dec1.format(value)} h`;
}

/** "206 W" */
export function formatWatts(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return `${int0.format(Math.round(value))} W`;
}

/** "148 bpm" */
export function formatBpm(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return `${int0.format(Math.round(value))} bpm`;
}

/** "1,250 m" */
export function formatMeters(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return `${int0.format(Math.round(value))} m`;
}

/** "31.4 km/h" */
export function formatSpeed(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return `${dec1.format(value)} km/h`;
}

export function formatCount(value: number | null | undefined, opts?: Opts): string {
  if (!isNum(value)) return pickFallback(opts);
  return int0.format(value);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Metrikker og deltaer
 * ────────────────────────────────────────────────────────────────────────────
 */

export const METRIC_LABELS: Record<MetricField, string> = {
  distance_km: "Distance",
  duration_sec: "Duration",
  power_watts: "Power",
  heart_rate_bpm: "Heart rate",
  elevation_gain_m: "Elevation gain",
  speed_kmh: "Speed",
};

export const GROUP_LABELS: Record<GroupField, string> = {
  rider_name: "Rider",
  team_name: "Team",
};

export const AGG_LABELS: Record<AggFunc, string> = {
  sum: "Sum",
  mean: "Average",
  max: "Max",
  min: "Min",
};

export const PERIOD_LABELS: Record<Period, string> = {
  hour: "Hourly",
  day: "Daily",
  week: "Weekly",
  month: "Monthly",
  quarter: "Quarterly",
  year: "Yearly",
};

/** Verdi i metrikkens egen enhet; varighet vises i timer */
export function formatMetric(
  metric: MetricField,
  value: number | null | undefined,
  opts?: Opts
): string {
  switch (metric) {
    case "distance_km":
      return formatKm(value, opts);
    case "duration_sec":
      return formatHours(isNum(value) ? value / 3600 : null, opts);
    case "power_watts":
      return formatWatts(value, opts);
    case "heart_rate_bpm":
      return formatBpm(value, opts);
    case "elevation_gain_m":
      return formatMeters(value, opts);
    case "speed_kmh":
      return formatSpeed(value, opts);
  }
}

/** Fortegn foran formatert absoluttverdi: "+5 W", "-40.0 km", "0 W" */
export function formatDelta(value: number | null | undefined, format: (v: number) => string): string {
  if (!isNum(value)) return Fallback;
  const sign = value > 0 ? "+" : value < 0 ? "-" : "";
  return `${sign}${format(Math.abs(value))}`;
}

export type Trend = "up" | "down" | "flat";

export function trendOf(value: number | null | undefined): Trend {
  if (!isNum(value) || value === 0) return "flat";
  return value > 0 ? "up" : "down";
}

/** ISO-tidsstempel → "YYYY-MM-DD" */
export function formatDay(iso: string | null | undefined, opts?: Opts): string {
  if (!iso || !/^\d{4}-\d{2}-\d{2}/.test(iso)) return pickFallback(opts);
  return iso.slice(0, 10);
}

/** ISO-tidsstempel → "YYYY-MM-DD HH:MM" (UTC) */
export function formatDateTime(iso: string | null | undefined, opts?: Opts): string {
  if (!iso || !/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(iso)) return pickFallback(opts);
  return iso.slice(0, 16).replace("T", " ");
}

export function currentYear(now: Date = new Date()): number {
  return now.getFullYear();
}
