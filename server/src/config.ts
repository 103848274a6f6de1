// server/src/config.ts
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const SERVER_ROOT = fileURLToPath(new URL("..", import.meta.url));

export const DEFAULT_SAMPLE_PATH = path.join(SERVER_ROOT, "data", "sample_cycling.csv");
export const DEFAULT_NEWS_PATH = path.join(SERVER_ROOT, "data", "news.json");
export const DEFAULT_RESULTS_PATH = path.join(SERVER_ROOT, "data", "results.json");
export const DEFAULT_STATIC_DIR = path.join(SERVER_ROOT, "..", "frontend", "dist");

/** Tom streng i env → behandles som ikke satt */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default("0.0.0.0"),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(16),
  SAMPLE_DATA_PATH: optionalString,
  NEWS_PATH: optionalString,
  RESULTS_PATH: optionalString,
  STATIC_DIR: optionalString,
  CORS_ORIGIN: optionalString,
});

export type AppConfig = {
  port: number;
  host: string;
  maxUploadBytes: number;
  sampleDataPath: string;
  newsPath: string;
  resultsPath: string;
  staticDir: string;
  corsOrigin: string | undefined;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.join(".") ?? "env";
    throw new Error(`Ugyldig konfigurasjon (${where}): ${first?.message ?? parsed.error.message}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    maxUploadBytes: Math.round(e.MAX_UPLOAD_MB * 1024 * 1024),
    sampleDataPath: e.SAMPLE_DATA_PATH ?? DEFAULT_SAMPLE_PATH,
    newsPath: e.NEWS_PATH ?? DEFAULT_NEWS_PATH,
    resultsPath: e.RESULTS_PATH ?? DEFAULT_RESULTS_PATH,
    staticDir: e.STATIC_DIR ?? DEFAULT_STATIC_DIR,
    corsOrigin: e.CORS_ORIGIN,
  };
}
