// server/src/lib/columns.ts
import { IngestError } from "./errors";

export const CANONICAL_COLUMNS = [
  "timestamp",
  "rider_name",
  "team_name",
  "distance_km",
  "duration_sec",
  "power_watts",
  "heart_rate_bpm",
  "elevation_gain_m",
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

/** canonical → kolonnenavn slik det står i fila */
export type ColumnMapping = Partial<Record<CanonicalColumn, string>>;

/**
 * Kjente synonymer, i prioritert rekkefølge.
 * Sammenlignes mot normaliserte header-navn.
 */
export const COLUMN_ALIASES: Record<CanonicalColumn, readonly string[]> = {
  timestamp: ["timestamp", "time", "date", "datetime", "start_time", "start"],
  rider_name: ["rider", "rider_name", "athlete", "athlete_name", "name"],
  team_name: ["team", "team_name", "club"],
  distance_km: ["distance_km", "distance", "km"],
  duration_sec: ["duration_sec", "duration", "seconds", "time_s", "elapsed_time", "moving_time"],
  power_watts: ["power", "avg_power", "power_watts", "np", "normalized_power"],
  heart_rate_bpm: ["hr", "bpm", "heart_rate", "heart_rate_bpm"],
  elevation_gain_m: ["elevation", "elevation_gain", "elev_gain_m", "ascent", "total_ascent"],
};

export function isCanonicalColumn(v: string): v is CanonicalColumn {
  return (CANONICAL_COLUMNS as readonly string[]).includes(v);
}

/** "  Avg. Power (W) " → "avg_power_w" */
export function normalizeColumnName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function guessMapping(headers: readonly string[]): ColumnMapping {
  // normalisert → original; senere header vinner ved kollisjon
  const byNormalized = new Map<string, string>();
  for (const h of headers) {
    byNormalized.set(normalizeColumnName(h), h);
  }

  const mapping: ColumnMapping = {};
  for (const col of CANONICAL_COLUMNS) {
    for (const alias of COLUMN_ALIASES[col]) {
      const original = byNormalized.get(alias);
      if (original !== undefined) {
        mapping[col] = original;
        break;
      }
    }
  }
  return mapping;
}

/**
 * Auto-gjetting, overstyrt av brukerens eksplisitte mapping.
 * Tomme verdier i brukermappingen ignoreres.
 */
export function resolveMapping(
  headers: readonly string[],
  userMapping?: ColumnMapping | null
): ColumnMapping {
  const mapping = guessMapping(headers);
  if (!userMapping) return mapping;

  const missing: string[] = [];
  for (const col of CANONICAL_COLUMNS) {
    const wanted = userMapping[col]?.trim();
    if (!wanted) continue;
    if (!headers.includes(wanted)) {
      missing.push(`${col} → "${wanted}"`);
      continue;
    }
    mapping[col] = wanted;
  }

  if (missing.length > 0) {
    throw new IngestError(
      "missing_columns",
      `Mapped column(s) not found in file: ${missing.join(", ")}`
    );
  }
  return mapping;
}
