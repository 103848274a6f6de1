// frontend/src/tests/fixtures.ts
import type {
  AggregateResponse,
  DatasetDescription,
  Distribution,
  KpiComparison,
  Leaderboard,
  NewsItem,
  Race,
  RecordsPage,
  RiderSummary,
  SummaryStats,
  TeamComparison,
  TimeSeries,
  UploadResponse,
} from "../lib/schema";

export const STATS: SummaryStats = {
  totalDistance: 260,
  totalDuration: 8,
  avgPower: 212.5,
  avgHeartRate: 145,
  totalElevation: 2000,
};

export const RIDERS: RiderSummary[] = [
  { name: "Ada", team: "Alpha", distance: 120, duration: 3.5, power: 200, hr: 135, elevation: 600 },
  { name: "Ben", team: "Alpha", distance: 60, duration: 2, power: 0, hr: 150, elevation: 500 },
];

export const TEAMS: TeamComparison = {
  teams: ["Alpha", "Beta"],
  metrics: {
    Alpha: { totalDistance: 180, avgPower: 200, avgHeartRate: 140, totalElevation: 1100, riderCount: 2 },
    Beta: { totalDistance: 80, avgPower: 250, avgHeartRate: 160, totalElevation: 900, riderCount: 1 },
  },
};

export const SERIES: TimeSeries = {
  period: "month",
  labels: ["Jan 2025", "Feb 2025"],
  buckets: ["2025-01-01T00:00:00.000Z", "2025-02-01T00:00:00.000Z"],
  distance: [150, 110],
  power: [210, 215],
  heartRate: [145, 145],
  elevation: [1000, 1000],
  teams: ["Alpha", "Beta"],
  teamPower: [200, 250],
};

export const LEADERBOARD: Leaderboard = {
  period: "month",
  window: "latest",
  periodStart: "2025-03-01T00:00:00.000Z",
  periodLabel: "Mar 2025",
  riders: [
    { name: "Cleo", team: "Beta", distance: 80, power: 250, rides: 1 },
    { name: "Dag", team: "Alpha", distance: 30, power: 180, rides: 2 },
  ],
  teams: [
    { name: "Beta", distance: 80, power: 250, riderCount: 1, rides: 1 },
    { name: "Alpha", distance: 30, power: 180, riderCount: 1, rides: 2 },
  ],
};

export const NEWS: NewsItem[] = [
  { id: 1, title: "Vinterserien starter", date: "2025-01-10", excerpt: "Første runde.", category: "Races" },
];

export const DATASET: DatasetDescription = {
  source: "sample",
  fileName: "sample_cycling.csv",
  recordCount: 126,
  columns: ["timestamp", "rider_name", "team_name", "distance_km"],
  mapping: { timestamp: "date", rider_name: "rider", team_name: "team", distance_km: "distance" },
  droppedRows: 0,
  loadedAt: "2025-04-01T10:00:00.000Z",
  dateRange: { from: "2025-01-06T00:00:00.000Z", to: "2025-03-31T00:00:00.000Z" },
};

export const UPLOAD: UploadResponse = {
  success: true,
  stats: { ...STATS, totalDistance: 60 },
  riders: RIDERS,
  dataset: { ...DATASET, source: "upload", fileName: "march.csv", recordCount: 2 },
  message: "Successfully uploaded 2 records",
};

export const RACES: Race[] = [
  {
    id: "test-crit",
    name: "Test Crit",
    date: "2025-02-15",
    location: "Testby",
    distanceKm: 40,
    category: "Criterium",
    results: [
      { position: 1, rider: "Ada", team: "Alpha", time: "0:58:12", gap: null },
      { position: 2, rider: "Cleo", team: "Beta", time: "0:58:15", gap: "+0:03" },
    ],
  },
];

export const AGGREGATE: AggregateResponse = {
  period: "week",
  groupBy: ["rider_name"],
  metric: "distance_km",
  agg: "sum",
  rows: [
    { bucket: "2025-01-06T00:00:00.000Z", label: "2025-W02", groups: { rider_name: "Ben" }, value: 60 },
    { bucket: "2025-01-06T00:00:00.000Z", label: "2025-W02", groups: { rider_name: "Ada" }, value: 40 },
    { bucket: "2025-01-20T00:00:00.000Z", label: "2025-W04", groups: { rider_name: "Ada" }, value: 50 },
  ],
};

export const KPIS: KpiComparison = {
  from: "2025-02-01T00:00:00.000Z",
  to: "2025-02-28T00:00:00.000Z",
  previousFrom: "2025-01-04T23:59:59.000Z",
  previousTo: "2025-01-31T23:59:59.000Z",
  current: { rides: 2, totalDistance: 110, totalDuration: 3.5, avgPower: 215, avgHeartRate: 145, totalElevation: 1000 },
  previous: { rides: 3, totalDistance: 150, totalDuration: 4.5, avgPower: 210, avgHeartRate: 145, totalElevation: 1000 },
  delta: { rides: -1, totalDistance: -40, totalDuration: -1, avgPower: 5, avgHeartRate: 0, totalElevation: 0 },
};

export const DISTRIBUTION: Distribution = {
  metric: "distance_km",
  bins: [
    { start: 30, end: 55, count: 3 },
    { start: 55, end: 80, count: 2 },
  ],
};

export const RECORDS: RecordsPage = {
  total: 30,
  offset: 0,
  limit: 25,
  records: [
    {
      index: 0,
      timestamp: "2025-01-06T08:00:00.000Z",
      rider_name: "Ada",
      team_name: "Alpha",
      distance_km: 40,
      duration_sec: 3600,
      power_watts: 200,
      heart_rate_bpm: 140,
      elevation_gain_m: 300,
      speed_kmh: 40,
    },
    {
      index: 1,
      timestamp: "2025-01-07T08:00:00.000Z",
      rider_name: "Ben",
      team_name: "Alpha",
      distance_km: 65,
      duration_sec: 7200,
      power_watts: null,
      heart_rate_bpm: 150,
      elevation_gain_m: 500,
      speed_kmh: 32.5,
    },
  ],
};
