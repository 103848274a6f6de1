// server/src/lib/aggregate.ts
import { bucketLabel, bucketStart, dayStart, isPeriod, type Period } from "./buckets";
import { QueryError } from "./errors";
import { toIso } from "./timestamps";
import type { GroupField, MetricField, RideRecord } from "./types";

export const AGG_FUNCS = ["sum", "mean", "max", "min"] as const;

export type AggFunc = (typeof AGG_FUNCS)[number];

export function isAggFunc(v: unknown): v is AggFunc {
  return typeof v === "string" && (AGG_FUNCS as readonly string[]).includes(v);
}

export type AggregateQuery = {
  period: Period;
  groupBy: readonly GroupField[];
  metric: MetricField;
  agg: AggFunc;
};

export type AggregateRow = {
  bucket: string;
  label: string;
  groups: Partial<Record<GroupField, string>>;
  value: number | null;
};

export type RecordFilter = {
  rider?: string | null;
  team?: string | null;
  /** inkluderende dag-grenser, epoch ms */
  from?: number | null;
  to?: number | null;
};

// ─────────────────────────────────────────────────────────────
// Reduksjoner – null-verdier hoppes over
// ─────────────────────────────────────────────────────────────

export function present(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

export function sumOf(values: readonly (number | null)[]): number {
  return present(values).reduce((acc, v) => acc + v, 0);
}

export function meanOf(values: readonly (number | null)[]): number | null {
  const xs = present(values);
  if (xs.length === 0) return null;
  return xs.reduce((acc, v) => acc + v, 0) / xs.length;
}

function maxOf(values: readonly (number | null)[]): number | null {
  const xs = present(values);
  return xs.length === 0 ? null : Math.max(...xs);
}

function minOf(values: readonly (number | null)[]): number | null {
  const xs = present(values);
  return xs.length === 0 ? null : Math.min(...xs);
}

export function reduceValues(values: readonly (number | null)[], agg: AggFunc): number | null {
  switch (agg) {
    case "sum":
      return sumOf(values);
    case "mean":
      return meanOf(values);
    case "max":
      return maxOf(values);
    case "min":
      return minOf(values);
  }
}

// ─────────────────────────────────────────────────────────────
// Filter
// ─────────────────────────────────────────────────────────────

function containsCi(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function filterRecords(records: readonly RideRecord[], filter: RecordFilter): RideRecord[] {
  const rider = filter.rider?.trim() ?? "";
  const team = filter.team?.trim() ?? "";
  const from = filter.from ?? null;
  const to = filter.to ?? null;

  return records.filter((r) => {
    if (rider && !containsCi(r.rider_name, rider)) return false;
    if (team && !containsCi(r.team_name, team)) return false;
    if (from !== null || to !== null) {
      const day = dayStart(r.timestamp);
      if (from !== null && day < from) return false;
      if (to !== null && day > to) return false;
    }
    return true;
  });
}

// ─────────────────────────────────────────────────────────────
// Group-by
// ─────────────────────────────────────────────────────────────

type Group = {
  bucket: number;
  keys: string[];
  values: (number | null)[];
};

function compareKeys(a: Group, b: Group): number {
  if (a.bucket !== b.bucket) return a.bucket - b.bucket;
  for (let i = 0; i < a.keys.length; i++) {
    const ka = a.keys[i] ?? "";
    const kb = b.keys[i] ?? "";
    if (ka < kb) return -1;
    if (ka > kb) return 1;
  }
  return 0;
}

export function aggregateByPeriod(
  records: readonly RideRecord[],
  query: AggregateQuery
): AggregateRow[] {
  if (!isPeriod(query.period)) {
    throw new QueryError("invalid_period", "Invalid period");
  }

  const { period, groupBy, metric, agg } = query;
  const groups = new Map<string, Group>();

  for (const r of records) {
    const bucket = bucketStart(r.timestamp, period);
    const keys = groupBy.map((g) => r[g]);
    const id = JSON.stringify([bucket, ...keys]);

    let g = groups.get(id);
    if (!g) {
      g = { bucket, keys, values: [] };
      groups.set(id, g);
    }
    g.values.push(r[metric]);
  }

  // gruppenøkler stigende, deretter bucket ↑ og verdi ↓ (null sist); sort er stabil
  const ordered = [...groups.values()].sort(compareKeys);
  const rows = ordered.map((g) => ({ g, value: reduceValues(g.values, agg) }));

  rows.sort((a, b) => {
    if (a.g.bucket !== b.g.bucket) return a.g.bucket - b.g.bucket;
    if (a.value === b.value) return 0;
    if (a.value === null) return 1;
    if (b.value === null) return -1;
    return b.value - a.value;
  });

  return rows.map(({ g, value }) => {
    const groupsOut: Partial<Record<GroupField, string>> = {};
    groupBy.forEach((field, i) => {
      groupsOut[field] = g.keys[i];
    });
    return {
      bucket: toIso(g.bucket),
      label: bucketLabel(g.bucket, period),
      groups: groupsOut,
      value,
    };
  });
}

// ─────────────────────────────────────────────────────────────
// Histogram
// ─────────────────────────────────────────────────────────────

export type HistogramBin = {
  start: number;
  end: number;
  count: number;
};

export function histogram(
  records: readonly RideRecord[],
  metric: MetricField,
  bins = 30
): HistogramBin[] {
  const xs = present(records.map((r) => r[metric]));
  if (xs.length === 0 || bins < 1) return [];

  const min = Math.min(...xs);
  const max = Math.max(...xs);

  // alle like → én bin
  if (min === max) return [{ start: min, end: max, count: xs.length }];

  const width = (max - min) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const x of xs) {
    // maks havner i siste bin
    const idx = Math.min(bins - 1, Math.floor((x - min) / width));
    const bin = out[idx];
    if (bin) bin.count += 1;
  }
  return out;
}
