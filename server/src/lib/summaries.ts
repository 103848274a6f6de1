// server/src/lib/summaries.ts
// Ferdigtygde visninger for dashboardet. Alle bygger på aggregate.ts-reduksjonene.
import { bucketLabel, bucketStart, dayStart, periodOrDefault, type Period } from "./buckets";
import { meanOf, sumOf } from "./aggregate";
import { toIso } from "./timestamps";
import type { RideRecord } from "./types";

export type SummaryStats = {
  totalDistance: number;
  /** timer */
  totalDuration: number;
  avgPower: number;
  avgHeartRate: number;
  totalElevation: number;
};

export type RiderSummary = {
  name: string;
  team: string;
  distance: number;
  duration: number;
  power: number;
  hr: number;
  elevation: number;
};

export type TeamMetrics = {
  totalDistance: number;
  avgPower: number;
  avgHeartRate: number;
  totalElevation: number;
  riderCount: number;
};

export type TeamComparison = {
  teams: string[];
  metrics: Record<string, TeamMetrics>;
};

export type TimeSeries = {
  period: Period;
  labels: string[];
  buckets: string[];
  distance: number[];
  power: (number | null)[];
  heartRate: (number | null)[];
  elevation: number[];
  teams: string[];
  teamPower: (number | null)[];
};

export type LeaderboardWindow = "latest" | "all";

export type RiderLeaderboardRow = {
  name: string;
  team: string;
  distance: number;
  power: number;
  rides: number;
};

export type TeamLeaderboardRow = {
  name: string;
  distance: number;
  power: number;
  riderCount: number;
  rides: number;
};

export type Leaderboard = {
  period: Period;
  window: LeaderboardWindow;
  periodStart: string | null;
  periodLabel: string | null;
  riders: RiderLeaderboardRow[];
  teams: TeamLeaderboardRow[];
};

export type Kpis = {
  rides: number;
  totalDistance: number;
  totalDuration: number;
  avgPower: number | null;
  avgHeartRate: number | null;
  totalElevation: number;
};

export type KpiComparison = {
  from: string;
  to: string;
  previousFrom: string;
  previousTo: string;
  current: Kpis;
  previous: Kpis;
  delta: Kpis;
};

export const RIDER_LEADERBOARD_SIZE = 10;
export const TEAM_LEADERBOARD_SIZE = 5;

/** Grupper i rekkefølge av første forekomst */
export function groupInOrder<K>(
  records: readonly RideRecord[],
  key: (r: RideRecord) => K
): Map<K, RideRecord[]> {
  const out = new Map<K, RideRecord[]>();
  for (const r of records) {
    const k = key(r);
    const list = out.get(k);
    if (list) list.push(r);
    else out.set(k, [r]);
  }
  return out;
}

function uniqueCount(values: readonly string[]): number {
  return new Set(values).size;
}

export function summaryStats(records: readonly RideRecord[]): SummaryStats {
  return {
    totalDistance: sumOf(records.map((r) => r.distance_km)),
    totalDuration: sumOf(records.map((r) => r.duration_sec)) / 3600,
    avgPower: meanOf(records.map((r) => r.power_watts)) ?? 0,
    avgHeartRate: meanOf(records.map((r) => r.heart_rate_bpm)) ?? 0,
    totalElevation: sumOf(records.map((r) => r.elevation_gain_m)),
  };
}

export function riderSummaries(records: readonly RideRecord[]): RiderSummary[] {
  const byRider = groupInOrder(records, (r) => r.rider_name);
  return [...byRider.entries()].map(([name, rows]) => ({
    name,
    team: rows[0]?.team_name ?? "Unknown",
    distance: sumOf(rows.map((r) => r.distance_km)),
    duration: sumOf(rows.map((r) => r.duration_sec)) / 3600,
    power: meanOf(rows.map((r) => r.power_watts)) ?? 0,
    hr: meanOf(rows.map((r) => r.heart_rate_bpm)) ?? 0,
    elevation: sumOf(rows.map((r) => r.elevation_gain_m)),
  }));
}

export function teamComparison(records: readonly RideRecord[]): TeamComparison {
  const byTeam = groupInOrder(records, (r) => r.team_name);
  const metrics: Record<string, TeamMetrics> = {};

  for (const [team, rows] of byTeam) {
    metrics[team] = {
      totalDistance: sumOf(rows.map((r) => r.distance_km)),
      avgPower: meanOf(rows.map((r) => r.power_watts)) ?? 0,
      avgHeartRate: meanOf(rows.map((r) => r.heart_rate_bpm)) ?? 0,
      totalElevation: sumOf(rows.map((r) => r.elevation_gain_m)),
      riderCount: uniqueCount(rows.map((r) => r.rider_name)),
    };
  }

  return { teams: [...byTeam.keys()], metrics };
}

export function timeSeries(records: readonly RideRecord[], periodInput: unknown): TimeSeries {
  const period = periodOrDefault(periodInput);

  const byBucket = groupInOrder(records, (r) => bucketStart(r.timestamp, period));
  const buckets = [...byBucket.keys()].sort((a, b) => a - b);

  const rowsFor = (b: number): RideRecord[] => byBucket.get(b) ?? [];
  const byTeam = groupInOrder(records, (r) => r.team_name);

  return {
    period,
    labels: buckets.map((b) => bucketLabel(b, period)),
    buckets: buckets.map(toIso),
    distance: buckets.map((b) => sumOf(rowsFor(b).map((r) => r.distance_km))),
    power: buckets.map((b) => meanOf(rowsFor(b).map((r) => r.power_watts))),
    heartRate: buckets.map((b) => meanOf(rowsFor(b).map((r) => r.heart_rate_bpm))),
    elevation: buckets.map((b) => sumOf(rowsFor(b).map((r) => r.elevation_gain_m))),
    teams: [...byTeam.keys()],
    teamPower: [...byTeam.values()].map((rows) => meanOf(rows.map((r) => r.power_watts))),
  };
}

function byDistanceDesc<T extends { distance: number }>(rows: T[]): T[] {
  // Array.prototype.sort er stabil → lik distanse beholder første-forekomst-rekkefølge
  return [...rows].sort((a, b) => b.distance - a.distance);
}

export function leaderboard(
  records: readonly RideRecord[],
  periodInput: unknown,
  window: LeaderboardWindow = "latest"
): Leaderboard {
  const period = periodOrDefault(periodInput);

  let scoped: readonly RideRecord[] = records;
  let latest: number | null = null;

  if (records.length > 0) {
    latest = Math.max(...records.map((r) => bucketStart(r.timestamp, period)));
    if (window === "latest") {
      const target = latest;
      scoped = records.filter((r) => bucketStart(r.timestamp, period) === target);
    }
  }

  const riders = [...groupInOrder(scoped, (r) => r.rider_name).entries()].map(
    ([name, rows]): RiderLeaderboardRow => ({
      name,
      team: rows[0]?.team_name ?? "Unknown",
      distance: sumOf(rows.map((r) => r.distance_km)),
      power: meanOf(rows.map((r) => r.power_watts)) ?? 0,
      rides: rows.length,
    })
  );

  const teams = [...groupInOrder(scoped, (r) => r.team_name).entries()].map(
    ([name, rows]): TeamLeaderboardRow => ({
      name,
      distance: sumOf(rows.map((r) => r.distance_km)),
      power: meanOf(rows.map((r) => r.power_watts)) ?? 0,
      riderCount: uniqueCount(rows.map((r) => r.rider_name)),
      rides: rows.length,
    })
  );

  const showLatest = window === "latest" && latest !== null;

  return {
    period,
    window,
    periodStart: showLatest && latest !== null ? toIso(latest) : null,
    periodLabel: showLatest && latest !== null ? bucketLabel(latest, period) : null,
    riders: byDistanceDesc(riders).slice(0, RIDER_LEADERBOARD_SIZE),
    teams: byDistanceDesc(teams).slice(0, TEAM_LEADERBOARD_SIZE),
  };
}

// ─────────────────────────────────────────────────────────────
// KPI-er med sammenligning mot forrige vindu
// ─────────────────────────────────────────────────────────────

export function computeKpis(records: readonly RideRecord[]): Kpis {
  return {
    rides: records.length,
    totalDistance: sumOf(records.map((r) => r.distance_km)),
    totalDuration: sumOf(records.map((r) => r.duration_sec)) / 3600,
    avgPower: meanOf(records.map((r) => r.power_watts)),
    avgHeartRate: meanOf(records.map((r) => r.heart_rate_bpm)),
    totalElevation: sumOf(records.map((r) => r.elevation_gain_m)),
  };
}

function meanDelta(a: number | null, b: number | null): number {
  return a !== null && b !== null ? a - b : 0;
}

function inDayRange(r: RideRecord, from: number, to: number): boolean {
  const day = dayStart(r.timestamp);
  return day >= from && day <= to;
}

export function dateRange(records: readonly RideRecord[]): { from: string; to: string } | null {
  if (records.length === 0) return null;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const r of records) {
    const day = dayStart(r.timestamp);
    if (day < min) min = day;
    if (day > max) max = day;
  }
  return { from: toIso(min), to: toIso(max) };
}

/**
 * Nåværende vindu [from, to] (dager, inkluderende) mot et like langt vindu
 * som slutter ett sekund før `from`.
 */
export function kpiComparison(
  records: readonly RideRecord[],
  from: number,
  to: number
): KpiComparison {
  const windowLength = to - from;
  const previousTo = from - 1000;
  const previousFrom = previousTo - windowLength;

  const current = computeKpis(records.filter((r) => inDayRange(r, from, to)));
  const previous = computeKpis(records.filter((r) => inDayRange(r, previousFrom, previousTo)));

  return {
    from: toIso(from),
    to: toIso(to),
    previousFrom: toIso(previousFrom),
    previousTo: toIso(previousTo),
    current,
    previous,
    delta: {
      rides: current.rides - previous.rides,
      totalDistance: current.totalDistance - previous.totalDistance,
      totalDuration: current.totalDuration - previous.totalDuration,
      avgPower: meanDelta(current.avgPower, previous.avgPower),
      avgHeartRate: meanDelta(current.avgHeartRate, previous.avgHeartRate),
      totalElevation: current.totalElevation - previous.totalElevation,
    },
  };
}
