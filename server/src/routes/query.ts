// server/src/routes/query.ts
// zod-skjemaer for query-parametre. Feil → QueryError (400).
import { z } from "zod";
import { AGG_FUNCS } from "../lib/aggregate";
import { PERIODS, dayStart } from "../lib/buckets";
import { QueryError } from "../lib/errors";
import { parseTimestamp } from "../lib/timestamps";
import { GROUP_FIELDS, METRIC_FIELDS, isGroupField, type GroupField } from "../lib/types";

const DayParam = z
  .string()
  .trim()
  .transform((s, ctx) => {
    const t = parseTimestamp(s);
    if (t === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${s}` });
      return z.NEVER;
    }
    return dayStart(t);
  });

const GroupByParam = z
  .string()
  .optional()
  .transform((csv, ctx): GroupField[] => {
    if (!csv) return [];
    const fields = csv
      .split(",")
      .map((f) => f.trim())
      .filter((f) => f.length > 0);

    const out: GroupField[] = [];
    for (const f of fields) {
      if (!isGroupField(f)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid groupBy "${f}" (expected ${GROUP_FIELDS.join(" or ")})`,
        });
        return z.NEVER;
      }
      if (!out.includes(f)) out.push(f);
    }
    return out;
  });

export const FilterQuerySchema = z.object({
  rider: z.string().optional(),
  team: z.string().optional(),
  from: DayParam.optional(),
  to: DayParam.optional(),
});

export const AggregateQuerySchema = FilterQuerySchema.extend({
  period: z.enum(PERIODS, { errorMap: () => ({ message: "Invalid period" }) }).default("month"),
  groupBy: GroupByParam,
  metric: z.enum(METRIC_FIELDS, { errorMap: () => ({ message: "Invalid metric" }) }).default(
    "distance_km"
  ),
  agg: z.enum(AGG_FUNCS, { errorMap: () => ({ message: "Invalid aggregation" }) }).default("sum"),
});

export const DistributionQuerySchema = FilterQuerySchema.extend({
  metric: z.enum(METRIC_FIELDS, { errorMap: () => ({ message: "Invalid metric" }) }).default(
    "distance_km"
  ),
  bins: z.coerce.number().int().min(1).max(200).default(30),
});

export const RecordsQuerySchema = FilterQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const LeaderboardQuerySchema = z.object({
  window: z.enum(["latest", "all"]).default("latest"),
});

export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const message = issue?.message ?? "Invalid query";
    throw new QueryError(message === "Invalid period" ? "invalid_period" : "invalid_query", message);
  }
  return parsed.data;
}
