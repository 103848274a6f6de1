// frontend/src/lib/api.ts
import { z } from "zod";
import {
  AggregateResponseSchema,
  DatasetDescriptionSchema,
  DistributionSchema,
  ErrorBodySchema,
  KpiComparisonSchema,
  LeaderboardSchema,
  NewsItemSchema,
  RaceSchema,
  RecordsPageSchema,
  RiderSummarySchema,
  SummaryStatsSchema,
  TeamComparisonSchema,
  TimeSeriesSchema,
  UploadResponseSchema,
  safeParseWith,
  type AggFunc,
  type AggregateResponse,
  type ColumnMapping,
  type DatasetDescription,
  type Distribution,
  type GroupField,
  type KpiComparison,
  type Leaderboard,
  type LeaderboardWindow,
  type MetricField,
  type NewsItem,
  type Period,
  type Race,
  type RecordsPage,
  type RiderSummary,
  type SummaryStats,
  type TeamComparison,
  type TimeSeries,
  type UploadResponse,
} from "./schema";

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: string };

export type QueryValue = string | number | readonly string[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/** Filtre som deles av utforsker-endepunktene. Tomme strenger sendes ikke. */
export type FilterParams = {
  rider?: string;
  team?: string;
  /** YYYY-MM-DD */
  from?: string;
  to?: string;
};

export type AggregateParams = FilterParams & {
  period: Period;
  groupBy: readonly GroupField[];
  metric: MetricField;
  agg: AggFunc;
};

export type DistributionParams = FilterParams & {
  metric: MetricField;
  bins?: number;
};

export type RecordsParams = FilterParams & {
  limit?: number;
  offset?: number;
};

// Hent Vite-variabler (.env.local). Tom → samme origin (dev-proxy / servert SPA).
const BASE = normalizeBase(import.meta.env.VITE_BACKEND_URL);

/** Fjern trailing slash for sammensetting av URL-er */
function normalizeBase(url?: string): string | undefined {
  const trimmed = url?.trim();
  if (!trimmed) return undefined;
  return trimmed.replace(/\/+$/, "");
}

function toSearch(params?: QueryParams): string {
  if (!params) return "";
  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (typeof value === "number") {
      qs.set(key, String(value));
      continue;
    }
    const s = typeof value === "string" ? value.trim() : value.join(",");
    if (s) qs.set(key, s);
  }
  const out = qs.toString();
  return out ? `?${out}` : "";
}

/**
 * URL-builder:
 * - Tåler at base er "http://localhost:5000" ELLER "http://localhost:5000/api"
 * - Uten base blir URL-en relativ ("/api/stats")
 */
export function buildApiUrl(path: string, params?: QueryParams, base = BASE): string {
  const search = toSearch(params);
  const b = normalizeBase(base);
  if (!b) return `${path}${search}`;

  // Hvis base allerede slutter på /api, fjern "/api" fra pathen for å unngå dobbel.
  const effectivePath = b.endsWith("/api") ? path.replace(/^\/api\b/, "") : path;
  const rel = effectivePath.startsWith("/") ? effectivePath.slice(1) : effectivePath;
  return `${new URL(rel, `${b}/`).toString()}${search}`;
}

/** Abort/timeout-wrapper for fetch */
export async function fetchWithTimeout(
  input: RequestInfo | URL,
  init: RequestInit & { timeoutMs?: number } = {}
): Promise<Response> {
  const { timeoutMs = 10_000, signal, ...rest } = init;

  const ac = new AbortController();
  const timeoutId = setTimeout(() => ac.abort(), timeoutMs);

  // Kobler evt. ekstern AbortSignal til vår controller
  if (signal) {
    if (signal.aborted) ac.abort();
    else signal.addEventListener("abort", () => ac.abort(), { once: true });
  }

  try {
    return await fetch(input, { ...rest, signal: ac.signal });
  } catch (err: unknown) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new Error("Request timed out.");
    }
    throw err instanceof Error ? err : new Error(String(err));
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Trygg JSON-parsing: returnerer string hvis ikke gyldig JSON (for feilmeldinger) */
export async function parseJsonSafe(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text; // råtekst ved ikke-JSON svar
  }
}

type RequestOpts = {
  method?: "GET" | "POST";
  params?: QueryParams;
  body?: FormData;
  timeoutMs?: number;
};

async function request<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: RequestOpts = {}
): Promise<ApiResult<T>> {
  const url = buildApiUrl(path, opts.params);
  const method = opts.method ?? "GET";
  if (import.meta.env.DEV) console.log("[API]", method, url);

  let res: Response;
  try {
    res = await fetchWithTimeout(url, {
      method,
      headers: { Accept: "application/json" },
      body: opts.body,
      timeoutMs: opts.timeoutMs,
    });
  } catch (err) {
    console.error("[API] nettverksfeil:", method, path, err);
    return {
      ok: false,
      error: err instanceof Error ? err.message : "Could not reach the server.",
    };
  }

  const json = await parseJsonSafe(res);

  if (!res.ok) {
    const body = ErrorBodySchema.safeParse(json);
    const error = body.success ? body.data.error : `Request failed (${res.status})`;
    console.warn("[API]", method, path, "→", res.status, error);
    return { ok: false, error };
  }

  if (typeof json === "string" || json === null) {
    console.error("[API]", path, "→ backend svarte ikke med JSON");
    return { ok: false, error: "Could not parse JSON from the server." };
  }

  const parsed = safeParseWith(schema, json);
  if (!parsed.ok) {
    console.error("[API]", path, "→ schema-validering feilet:", parsed.error);
    return { ok: false, error: `Unexpected response from the server (${parsed.error})` };
  }
  return parsed;
}

// -----------------------------
// Dashboard
// -----------------------------

export function fetchStats(): Promise<ApiResult<SummaryStats>> {
  return request("/api/stats", SummaryStatsSchema);
}

export function fetchRiders(): Promise<ApiResult<RiderSummary[]>> {
  return request("/api/riders", z.array(RiderSummarySchema));
}

export function fetchTeamComparison(): Promise<ApiResult<TeamComparison>> {
  return request("/api/team-comparison", TeamComparisonSchema);
}

export function fetchTimeSeries(period: Period): Promise<ApiResult<TimeSeries>> {
  return request(`/api/data/${encodeURIComponent(period)}`, TimeSeriesSchema);
}

export function fetchLeaderboard(
  period: Period,
  window: LeaderboardWindow = "latest"
): Promise<ApiResult<Leaderboard>> {
  return request(`/api/leaderboard/${encodeURIComponent(period)}`, LeaderboardSchema, {
    params: { window },
  });
}

export function fetchNews(): Promise<ApiResult<NewsItem[]>> {
  return request("/api/news", z.array(NewsItemSchema));
}

export function fetchRaceResults(): Promise<ApiResult<Race[]>> {
  return request("/api/results", z.array(RaceSchema));
}

// -----------------------------
// Datasett
// -----------------------------

export function fetchDataset(): Promise<ApiResult<DatasetDescription>> {
  return request("/api/dataset", DatasetDescriptionSchema);
}

export function resetDataset(): Promise<ApiResult<DatasetDescription>> {
  return request("/api/dataset/reset", DatasetDescriptionSchema, { method: "POST" });
}

/** Multipart-opplasting: `file` + valgfri `mapping` (JSON, kun utfylte felt) */
export function uploadRideLog(
  file: File,
  mapping: ColumnMapping = {}
): Promise<ApiResult<UploadResponse>> {
  const form = new FormData();
  form.append("file", file, file.name);

  const filled = Object.fromEntries(
    Object.entries(mapping).filter(([, v]) => typeof v === "string" && v.trim() !== "")
  );
  if (Object.keys(filled).length > 0) form.append("mapping", JSON.stringify(filled));

  return request("/api/upload", UploadResponseSchema, { method: "POST", body: form, timeoutMs: 60_000 });
}

// -----------------------------
// Utforsker
// -----------------------------

export function fetchAggregate(q: AggregateParams): Promise<ApiResult<AggregateResponse>> {
  return request("/api/aggregate", AggregateResponseSchema, { params: q });
}

export function fetchKpis(filter: FilterParams = {}): Promise<ApiResult<KpiComparison>> {
  return request("/api/kpis", KpiComparisonSchema, { params: filter });
}

export function fetchDistribution(q: DistributionParams): Promise<ApiResult<Distribution>> {
  return request("/api/distribution", DistributionSchema, { params: q });
}

export function fetchRecords(q: RecordsParams = {}): Promise<ApiResult<RecordsPage>> {
  return request("/api/records", RecordsPageSchema, { params: q });
}
