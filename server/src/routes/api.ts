// server/src/routes/api.ts
import { Router } from "express";
import { aggregateByPeriod, filterRecords, histogram } from "../lib/aggregate";
import { dayStart } from "../lib/buckets";
import type { NewsItem, Race } from "../lib/content";
import { QueryError } from "../lib/errors";
import {
  dateRange,
  kpiComparison,
  leaderboard,
  riderSummaries,
  summaryStats,
  teamComparison,
  timeSeries,
} from "../lib/summaries";
import { toIso } from "../lib/timestamps";
import type { DatasetStore } from "../state/datasetStore";
import { asyncRoute } from "./asyncRoute";
import {
  AggregateQuerySchema,
  DistributionQuerySchema,
  FilterQuerySchema,
  LeaderboardQuerySchema,
  RecordsQuerySchema,
  parseQuery,
} from "./query";

export type ContentSources = {
  news: () => Promise<NewsItem[]>;
  results: () => Promise<Race[]>;
};

export function createApiRouter(store: DatasetStore, content: ContentSources): Router {
  const router = Router();

  // -----------------------------
  // Dashboard-endepunkter
  // -----------------------------

  router.get(
    "/data/:period",
    asyncRoute(async (req, res) => {
      const { records } = await store.current();
      res.json(timeSeries(records, req.params.period));
    })
  );

  router.get(
    "/stats",
    asyncRoute(async (_req, res) => {
      const { records } = await store.current();
      res.json(summaryStats(records));
    })
  );

  router.get(
    "/riders",
    asyncRoute(async (_req, res) => {
      const { records } = await store.current();
      res.json(riderSummaries(records));
    })
  );

  router.get(
    "/team-comparison",
    asyncRoute(async (_req, res) => {
      const { records } = await store.current();
      res.json(teamComparison(records));
    })
  );

  router.get(
    "/leaderboard/:period",
    asyncRoute(async (req, res) => {
      const { window } = parseQuery(LeaderboardQuerySchema, req.query);
      const { records } = await store.current();
      res.json(leaderboard(records, req.params.period, window));
    })
  );

  router.get(
    "/news",
    asyncRoute(async (_req, res) => {
      res.json(await content.news());
    })
  );

  router.get(
    "/results",
    asyncRoute(async (_req, res) => {
      res.json(await content.results());
    })
  );

  // -----------------------------
  // Datasett
  // -----------------------------

  router.get(
    "/dataset",
    asyncRoute(async (_req, res) => {
      res.json(await store.describe());
    })
  );

  router.post(
    "/dataset/reset",
    asyncRoute(async (_req, res) => {
      store.reset();
      res.json(await store.describe());
    })
  );

  // -----------------------------
  // Utforsker (filtrert aggregering)
  // -----------------------------

  router.get(
    "/aggregate",
    asyncRoute(async (req, res) => {
      const q = parseQuery(AggregateQuerySchema, req.query);
      const { records } = await store.current();
      const filtered = filterRecords(records, q);
      const rows = aggregateByPeriod(filtered, {
        period: q.period,
        groupBy: q.groupBy,
        metric: q.metric,
        agg: q.agg,
      });
      res.json({
        period: q.period,
        groupBy: q.groupBy,
        metric: q.metric,
        agg: q.agg,
        rows,
      });
    })
  );

  router.get(
    "/kpis",
    asyncRoute(async (req, res) => {
      const q = parseQuery(FilterQuerySchema, req.query);
      const { records } = await store.current();
      // dato-grensene brukes som vindu, ikke som filter
      const scoped = filterRecords(records, { rider: q.rider, team: q.team });

      const range = dateRange(records);
      const from = q.from ?? (range ? dayStart(Date.parse(range.from)) : 0);
      const to = q.to ?? (range ? dayStart(Date.parse(range.to)) : 0);
      if (from > to) {
        const day = (ms: number) => toIso(ms).slice(0, 10);
        throw new QueryError("invalid_query", `Invalid date range: ${day(from)} is after ${day(to)}`);
      }

      res.json(kpiComparison(scoped, from, to));
    })
  );

  router.get(
    "/distribution",
    asyncRoute(async (req, res) => {
      const q = parseQuery(DistributionQuerySchema, req.query);
      const { records } = await store.current();
      const filtered = filterRecords(records, q);
      res.json({ metric: q.metric, bins: histogram(filtered, q.metric, q.bins) });
    })
  );

  router.get(
    "/records",
    asyncRoute(async (req, res) => {
      const q = parseQuery(RecordsQuerySchema, req.query);
      const { records } = await store.current();
      const filtered = filterRecords(records, q);
      const page = filtered.slice(q.offset, q.offset + q.limit);
      res.json({
        total: filtered.length,
        offset: q.offset,
        limit: q.limit,
        records: page.map((r) => ({ ...r, timestamp: toIso(r.timestamp) })),
      });
    })
  );

  return router;
}
