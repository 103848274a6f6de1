// server/src/tests/fixtures.ts
import type { RideRecord } from "../lib/types";

export function makeRecord(partial: Partial<RideRecord> & { timestamp: number }): RideRecord {
  return {
    index: 0,
    rider_name: "Unknown",
    team_name: "Unknown",
    distance_km: null,
    duration_sec: null,
    power_watts: null,
    heart_rate_bpm: null,
    elevation_gain_m: null,
    speed_kmh: null,
    ...partial,
  };
}

/** Fem økter: januar (Ada, Ben, Ada) og februar (Cleo, Ada) */
export const RIDES: RideRecord[] = [
  makeRecord({
    index: 0,
    timestamp: Date.UTC(2025, 0, 6, 8),
    rider_name: "Ada",
    team_name: "Alpha",
    distance_km: 40,
    duration_sec: 3600,
    power_watts: 200,
    heart_rate_bpm: 140,
    elevation_gain_m: 300,
  }),
  makeRecord({
    index: 1,
    timestamp: Date.UTC(2025, 0, 7, 8),
    rider_name: "Ben",
    team_name: "Alpha",
    distance_km: 60,
    duration_sec: 7200,
    power_watts: null,
    heart_rate_bpm: 150,
    elevation_gain_m: 500,
  }),
  makeRecord({
    index: 2,
    timestamp: Date.UTC(2025, 0, 20, 8),
    rider_name: "Ada",
    team_name: "Alpha",
    distance_km: 50,
    duration_sec: 5400,
    power_watts: 220,
    heart_rate_bpm: null,
    elevation_gain_m: 200,
  }),
  makeRecord({
    index: 3,
    timestamp: Date.UTC(2025, 1, 3, 8),
    rider_name: "Cleo",
    team_name: "Beta",
    distance_km: 80,
    duration_sec: 9000,
    power_watts: 250,
    heart_rate_bpm: 160,
    elevation_gain_m: 900,
  }),
  makeRecord({
    index: 4,
    timestamp: Date.UTC(2025, 1, 4, 8),
    rider_name: "Ada",
    team_name: "Alpha",
    distance_km: 30,
    duration_sec: 3600,
    power_watts: 180,
    heart_rate_bpm: 130,
    elevation_gain_m: 100,
  }),
];

/** Samme fem økter som CSV med kanoniske kolonnenavn */
export const RIDES_CSV = [
  "timestamp,rider_name,team_name,distance_km,duration_sec,power_watts,heart_rate_bpm,elevation_gain_m",
  "2025-01-06T08:00:00Z,Ada,Alpha,40,3600,200,140,300",
  "2025-01-07T08:00:00Z,Ben,Alpha,60,7200,,150,500",
  "2025-01-20T08:00:00Z,Ada,Alpha,50,5400,220,,200",
  "2025-02-03T08:00:00Z,Cleo,Beta,80,9000,250,160,900",
  "2025-02-04T08:00:00Z,Ada,Alpha,30,3600,180,130,100",
].join("\n");
