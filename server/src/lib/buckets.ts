// server/src/lib/buckets.ts
// Kalender-trunkering i UTC. Uker starter mandag.

export const PERIODS = ["hour", "day", "week", "month", "quarter", "year"] as const;

export type Period = (typeof PERIODS)[number];

export const DEFAULT_PERIOD: Period = "month";

const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export function isPeriod(v: unknown): v is Period {
  return typeof v === "string" && (PERIODS as readonly string[]).includes(v);
}

/** Ukjent periode → month (samme fallback som dashboard-endepunktene) */
export function periodOrDefault(v: unknown): Period {
  return isPeriod(v) ? v : DEFAULT_PERIOD;
}

export function bucketStart(ts: number, period: Period): number {
  const d = new Date(ts);
  const y = d.getUTCFullYear();
  const m = d.getUTCMonth();

  switch (period) {
    case "hour":
      return Math.floor(ts / MS_PER_HOUR) * MS_PER_HOUR;
    case "day":
      return Date.UTC(y, m, d.getUTCDate());
    case "week": {
      const midnight = Date.UTC(y, m, d.getUTCDate());
      // getUTCDay: 0 = søndag → 6 dager tilbake til mandag
      const sinceMonday = (d.getUTCDay() + 6) % 7;
      return midnight - sinceMonday * MS_PER_DAY;
    }
    case "month":
      return Date.UTC(y, m, 1);
    case "quarter":
      return Date.UTC(y, Math.floor(m / 3) * 3, 1);
    case "year":
      return Date.UTC(y, 0, 1);
  }
}

export function dayStart(ts: number): number {
  return bucketStart(ts, "day");
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function isoDate(d: Date): string {
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

/** ISO-8601 uke for en mandag: torsdagen i samme uke bestemmer året */
export function isoWeek(mondayMs: number): { year: number; week: number } {
  const thursday = new Date(mondayMs + 3 * MS_PER_DAY);
  const year = thursday.getUTCFullYear();
  const jan1 = Date.UTC(year, 0, 1);
  const week = Math.floor((thursday.getTime() - jan1) / MS_PER_DAY / 7) + 1;
  return { year, week };
}

export function bucketLabel(start: number, period: Period): string {
  const d = new Date(start);
  switch (period) {
    case "hour":
      return `${isoDate(d)} ${pad2(d.getUTCHours())}:00`;
    case "day":
      return isoDate(d);
    case "week": {
      const { year, week } = isoWeek(start);
      return `${year}-W${pad2(week)}`;
    }
    case "month":
      return `${MONTHS[d.getUTCMonth()]} ${d.getUTCFullYear()}`;
    case "quarter":
      return `Q${Math.floor(d.getUTCMonth() / 3) + 1} ${d.getUTCFullYear()}`;
    case "year":
      return String(d.getUTCFullYear());
  }
}
