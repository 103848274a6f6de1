// server/src/lib/types.ts
import type { CanonicalColumn, ColumnMapping } from "./columns";

export type RideRecord = {
  /** posisjon i opplastet fil (etter parsing) */
  index: number;
  /** epoch ms, UTC */
  timestamp: number;
  rider_name: string;
  team_name: string;
  distance_km: number | null;
  duration_sec: number | null;
  power_watts: number | null;
  heart_rate_bpm: number | null;
  elevation_gain_m: number | null;
  speed_kmh: number | null;
};

export const METRIC_FIELDS = [
  "distance_km",
  "duration_sec",
  "power_watts",
  "heart_rate_bpm",
  "elevation_gain_m",
  "speed_kmh",
] as const;

export type MetricField = (typeof METRIC_FIELDS)[number];

export const GROUP_FIELDS = ["rider_name", "team_name"] as const;

export type GroupField = (typeof GROUP_FIELDS)[number];

export type DatasetSource = "sample" | "upload";

export type Dataset = {
  records: RideRecord[];
  columns: CanonicalColumn[];
  mapping: ColumnMapping;
  source: DatasetSource;
  fileName: string | null;
  droppedRows: number;
  loadedAt: string;
};

export function isMetricField(v: string): v is MetricField {
  return (METRIC_FIELDS as readonly string[]).includes(v);
}

export function isGroupField(v: string): v is GroupField {
  return (GROUP_FIELDS as readonly string[]).includes(v);
}
