// frontend/src/lib/schema.ts
// zod-skjemaer for alle API-svar. Typene under er hentet ut av skjemaene.
import { z } from "zod";

export const PERIODS = ["hour", "day", "week", "month", "quarter", "year"] as const;
export const METRIC_FIELDS = [
  "distance_km",
  "duration_sec",
  "power_watts",
  "heart_rate_bpm",
  "elevation_gain_m",
  "speed_kmh",
] as const;
export const GROUP_FIELDS = ["rider_name", "team_name"] as const;
export const AGG_FUNCS = ["sum", "mean", "max", "min"] as const;
export const COLUMN_FIELDS = [
  "timestamp",
  "rider_name",
  "team_name",
  "distance_km",
  "duration_sec",
  "power_watts",
  "heart_rate_bpm",
  "elevation_gain_m",
] as const;

export const PeriodSchema = z.enum(PERIODS);
export const MetricFieldSchema = z.enum(METRIC_FIELDS);
export const GroupFieldSchema = z.enum(GROUP_FIELDS);
export const AggFuncSchema = z.enum(AGG_FUNCS);
export const LeaderboardWindowSchema = z.enum(["latest", "all"]);

export type Period = z.infer<typeof PeriodSchema>;
export type MetricField = z.infer<typeof MetricFieldSchema>;
export type GroupField = z.infer<typeof GroupFieldSchema>;
export type AggFunc = z.infer<typeof AggFuncSchema>;
export type LeaderboardWindow = z.infer<typeof LeaderboardWindowSchema>;
export type ColumnField = (typeof COLUMN_FIELDS)[number];
export type ColumnMapping = Partial<Record<ColumnField, string>>;

const NullableNumber = z.number().nullable();

// ─────────────────────────────────────────────────────────────
// Dashboard
// ─────────────────────────────────────────────────────────────

export const SummaryStatsSchema = z.object({
  totalDistance: z.number(),
  totalDuration: z.number(),
  avgPower: z.number(),
  avgHeartRate: z.number(),
  totalElevation: z.number(),
});

export const RiderSummarySchema = z.object({
  name: z.string(),
  team: z.string(),
  distance: z.number(),
  duration: z.number(),
  power: z.number(),
  hr: z.number(),
  elevation: z.number(),
});

export const TeamMetricsSchema = z.object({
  totalDistance: z.number(),
  avgPower: z.number(),
  avgHeartRate: z.number(),
  totalElevation: z.number(),
  riderCount: z.number().int(),
});

export const TeamComparisonSchema = z.object({
  teams: z.array(z.string()),
  metrics: z.record(TeamMetricsSchema),
});

export const TimeSeriesSchema = z.object({
  period: PeriodSchema,
  labels: z.array(z.string()),
  buckets: z.array(z.string()),
  distance: z.array(z.number()),
  power: z.array(NullableNumber),
  heartRate: z.array(NullableNumber),
  elevation: z.array(z.number()),
  teams: z.array(z.string()),
  teamPower: z.array(NullableNumber),
});

export const LeaderboardSchema = z.object({
  period: PeriodSchema,
  window: LeaderboardWindowSchema,
  periodStart: z.string().nullable(),
  periodLabel: z.string().nullable(),
  riders: z.array(
    z.object({
      name: z.string(),
      team: z.string(),
      distance: z.number(),
      power: z.number(),
      rides: z.number().int(),
    })
  ),
  teams: z.array(
    z.object({
      name: z.string(),
      distance: z.number(),
      power: z.number(),
      riderCount: z.number().int(),
      rides: z.number().int(),
    })
  ),
});

export const NewsItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  date: z.string(),
  excerpt: z.string(),
  category: z.string(),
});

export const RaceSchema = z.object({
  id: z.string(),
  name: z.string(),
  date: z.string(),
  location: z.string(),
  distanceKm: z.number(),
  category: z.string(),
  results: z.array(
    z.object({
      position: z.number().int(),
      rider: z.string(),
      team: z.string(),
      time: z.string(),
      gap: z.string().nullable(),
    })
  ),
});

export const DatasetDescriptionSchema = z.object({
  source: z.enum(["sample", "upload"]),
  fileName: z.string().nullable(),
  recordCount: z.number().int(),
  columns: z.array(z.enum(COLUMN_FIELDS)),
  mapping: z.record(z.string()),
  droppedRows: z.number().int(),
  loadedAt: z.string(),
  dateRange: z.object({ from: z.string(), to: z.string() }).nullable(),
});

export const UploadResponseSchema = z.object({
  success: z.literal(true),
  stats: SummaryStatsSchema,
  riders: z.array(RiderSummarySchema),
  dataset: DatasetDescriptionSchema,
  message: z.string(),
});

// ─────────────────────────────────────────────────────────────
// Utforsker
// ─────────────────────────────────────────────────────────────

export const AggregateRowSchema = z.object({
  bucket: z.string(),
  label: z.string(),
  groups: z.object({ rider_name: z.string().optional(), team_name: z.string().optional() }),
  value: NullableNumber,
});

export const AggregateResponseSchema = z.object({
  period: PeriodSchema,
  groupBy: z.array(GroupFieldSchema),
  metric: MetricFieldSchema,
  agg: AggFuncSchema,
  rows: z.array(AggregateRowSchema),
});

export const KpisSchema = z.object({
  rides: z.number().int(),
  totalDistance: z.number(),
  totalDuration: z.number(),
  avgPower: NullableNumber,
  avgHeartRate: NullableNumber,
  totalElevation: z.number(),
});

export const KpiComparisonSchema = z.object({
  from: z.string(),
  to: z.string(),
  previousFrom: z.string(),
  previousTo: z.string(),
  current: KpisSchema,
  previous: KpisSchema,
  delta: KpisSchema,
});

export const DistributionSchema = z.object({
  metric: MetricFieldSchema,
  bins: z.array(z.object({ start: z.number(), end: z.number(), count: z.number().int() })),
});

export const RideRecordSchema = z.object({
  index: z.number().int(),
  timestamp: z.string(),
  rider_name: z.string(),
  team_name: z.string(),
  distance_km: NullableNumber,
  duration_sec: NullableNumber,
  power_watts: NullableNumber,
  heart_rate_bpm: NullableNumber,
  elevation_gain_m: NullableNumber,
  speed_kmh: NullableNumber,
});

export const RecordsPageSchema = z.object({
  total: z.number().int(),
  offset: z.number().int(),
  limit: z.number().int(),
  records: z.array(RideRecordSchema),
});

export const ErrorBodySchema = z.object({ error: z.string() });

export type SummaryStats = z.infer<typeof SummaryStatsSchema>;
export type RiderSummary = z.infer<typeof RiderSummarySchema>;
export type TeamComparison = z.infer<typeof TeamComparisonSchema>;
export type TimeSeries = z.infer<typeof TimeSeriesSchema>;
export type Leaderboard = z.infer<typeof LeaderboardSchema>;
export type NewsItem = z.infer<typeof NewsItemSchema>;
export type Race = z.infer<typeof RaceSchema>;
export type DatasetDescription = z.infer<typeof DatasetDescriptionSchema>;
export type UploadResponse = z.infer<typeof UploadResponseSchema>;
export type AggregateRow = z.infer<typeof AggregateRowSchema>;
export type AggregateResponse = z.infer<typeof AggregateResponseSchema>;
export type Kpis = z.infer<typeof KpisSchema>;
export type KpiComparison = z.infer<typeof KpiComparisonSchema>;
export type Distribution = z.infer<typeof DistributionSchema>;
export type RideRecord = z.infer<typeof RideRecordSchema>;
export type RecordsPage = z.infer<typeof RecordsPageSchema>;

/** Trygg parser som ikke kaster – første zod-melding som feiltekst */
export function safeParseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { ok: true; data: T } | { ok: false; error: string } {
  const res = schema.safeParse(input);
  if (res.success) return { ok: true, data: res.data };
  const first = res.error.issues[0];
  const where = first && first.path.length > 0 ? `${first.path.join(".")}: ` : "";
  return { ok: false, error: `${where}${first?.message ?? "Invalid response"}` };
}
