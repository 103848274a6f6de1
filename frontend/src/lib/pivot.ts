// frontend/src/lib/pivot.ts
// Aggregerte rader (én per bøtte × gruppe) → én rad per bøtte med én nøkkel per gruppe,
// slik Recharts vil ha det. Seriene ligger under "s0", "s1", … så et gruppenavn aldri
// kolliderer med "label".
import type { AggregateRow, GroupField } from "./schema";

export type PivotPoint = { label: string } & Record<string, number | string | null>;

export type PivotSeries = {
  /** dataKey i punktene */
  key: string;
  /** visningsnavn, f.eks. "Ada / Alpha" */
  name: string;
};

export type Pivot = {
  series: PivotSeries[];
  points: PivotPoint[];
};

export const TOTAL_SERIES = "Total";

/** "Ada / Alpha" – uten gruppering blir alt én serie */
export function seriesKey(row: AggregateRow, groupBy: readonly GroupField[]): string {
  if (groupBy.length === 0) return TOTAL_SERIES;
  return groupBy.map((g) => row.groups[g] ?? "Unknown").join(" / ");
}

export function pivotRows(
  rows: readonly AggregateRow[],
  groupBy: readonly GroupField[],
  maxSeries = 8
): Pivot {
  // behold seriene med størst total, i synkende rekkefølge
  const totals = new Map<string, number>();
  for (const row of rows) {
    const key = seriesKey(row, groupBy);
    totals.set(key, (totals.get(key) ?? 0) + (row.value ?? 0));
  }
  const series = [...totals.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxSeries)
    .map(([name], i): PivotSeries => ({ key: `s${i}`, name }));
  const dataKeys = new Map(series.map((s) => [s.name, s.key]));

  const byBucket = new Map<string, PivotPoint>();
  for (const row of rows) {
    const key = dataKeys.get(seriesKey(row, groupBy));
    if (key === undefined) continue;
    let point = byBucket.get(row.bucket);
    if (!point) {
      point = { label: row.label };
      byBucket.set(row.bucket, point);
    }
    point[key] = row.value;
  }

  const points = [...byBucket.entries()]
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([, point]) => point);

  return { series, points };
}
