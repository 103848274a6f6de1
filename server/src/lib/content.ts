// server/src/lib/content.ts
// Statisk innhold (nyheter, ritt-resultater) fra JSON-filer i server/data.
import { readFile } from "node:fs/promises";
import { z } from "zod";

export const NewsItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  date: z.string(),
  excerpt: z.string(),
  category: z.string(),
});

export type NewsItem = z.infer<typeof NewsItemSchema>;

export const RaceResultSchema = z.object({
  position: z.number().int().positive(),
  rider: z.string(),
  team: z.string(),
  time: z.string(),
  gap: z.string().nullable(),
});

export const RaceSchema = z.object({
  id: z.string(),
  name: z.string(),
  date: z.string(),
  location: z.string(),
  distanceKm: z.number().positive(),
  category: z.string(),
  results: z.array(RaceResultSchema),
});

export type Race = z.infer<typeof RaceSchema>;

async function readJsonFile<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
  const text = await readFile(filePath, "utf-8");
  const parsed = schema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(
      `Ugyldig innhold i ${filePath}: ${first?.path.join(".") ?? ""} ${first?.message ?? ""}`.trim()
    );
  }
  return parsed.data;
}

export function loadNews(filePath: string): Promise<NewsItem[]> {
  return readJsonFile(filePath, z.array(NewsItemSchema));
}

export function loadRaceResults(filePath: string): Promise<Race[]> {
  return readJsonFile(filePath, z.array(RaceSchema));
}
