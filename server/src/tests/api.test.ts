// server/src/tests/api.test.ts
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app";
import type { AppConfig } from "../config";
import type { NewsItem, Race } from "../lib/content";
import { loadDataset } from "../lib/loader";
import type { ContentSources } from "../routes/api";
import { DatasetStore } from "../state/datasetStore";
import { RIDES_CSV } from "./fixtures";

const NEWS: NewsItem[] = [
  { id: 1, title: "Vinterserien starter", date: "2025-01-10", excerpt: "Første runde.", category: "Races" },
];

const RACES: Race[] = [
  {
    id: "test-crit",
    name: "Test Crit",
    date: "2025-02-15",
    location: "Testby",
    distanceKm: 40,
    category: "Criterium",
    results: [{ position: 1, rider: "Ada", team: "Alpha", time: "0:58:12", gap: null }],
  },
];

const BASE_CONFIG: AppConfig = {
  port: 0,
  host: "127.0.0.1",
  maxUploadBytes: 1024 * 1024,
  sampleDataPath: "unused.csv",
  newsPath: "unused.json",
  resultsPath: "unused.json",
  staticDir: path.join(os.tmpdir(), "team-ride-dashboard-no-dist"),
  corsOrigin: undefined,
};

const STUB_CONTENT: ContentSources = {
  news: async () => NEWS,
  results: async () => RACES,
};

type Running = { base: string; close: () => Promise<void> };

let running: Running | null = null;

async function start(
  overrides: Partial<AppConfig> = {},
  content: ContentSources = STUB_CONTENT
): Promise<string> {
  const store = new DatasetStore(async () =>
    loadDataset(new TextEncoder().encode(RIDES_CSV), { source: "sample", fileName: "sample.csv" })
  );
  const app = createApp({ config: { ...BASE_CONFIG, ...overrides }, store, content });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("server uten port");

  running = {
    base: `http://127.0.0.1:${addr.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
  return running.base;
}

async function getJson(url: string): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url);
  return { status: res.status, body: await res.json() };
}

async function postForm(url: string, form: FormData): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url, { method: "POST", body: form });
  return { status: res.status, body: await res.json() };
}

function csvForm(csv: string, fileName: string, mapping?: string): FormData {
  const form = new FormData();
  form.append("file", new Blob([csv], { type: "text/csv" }), fileName);
  if (mapping !== undefined) form.append("mapping", mapping);
  return form;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  await running?.close();
  running = null;
  vi.restoreAllMocks();
});

describe("dashboard-endepunkter", () => {
  it("GET /api/stats", async () => {
    const base = await start();
    const { status, body } = await getJson(`${base}/api/stats`);
    expect(status).toBe(200);
    expect(body).toEqual({
      totalDistance: 260,
      totalDuration: 8,
      avgPower: 212.5,
      avgHeartRate: 145,
      totalElevation: 2000,
    });
  });

  it("GET /api/riders og /api/team-comparison", async () => {
    const base = await start();
    const riders = await getJson(`${base}/api/riders`);
    expect(riders.body).toMatchObject([{ name: "Ada" }, { name: "Ben" }, { name: "Cleo" }]);

    const teams = await getJson(`${base}/api/team-comparison`);
    expect(teams.body).toMatchObject({ teams: ["Alpha", "Beta"], metrics: { Beta: { riderCount: 1 } } });
  });

  it("GET /api/data/:period faller tilbake til month", async () => {
    const base = await start();
    const { status, body } = await getJson(`${base}/api/data/bogus`);
    expect(status).toBe(200);
    expect(body).toMatchObject({ period: "month", labels: ["Jan 2025", "Feb 2025"], distance: [150, 110] });
  });

  it("GET /api/leaderboard/:period", async () => {
    const base = await start();
    const latest = await getJson(`${base}/api/leaderboard/month`);
    expect(latest.body).toMatchObject({
      window: "latest",
      periodLabel: "Feb 2025",
      riders: [{ name: "Cleo" }, { name: "Ada" }],
    });

    const all = await getJson(`${base}/api/leaderboard/month?window=all`);
    expect(all.body).toMatchObject({ riders: [{ name: "Ada" }, { name: "Cleo" }, { name: "Ben" }] });

    const bad = await getJson(`${base}/api/leaderboard/month?window=forever`);
    expect(bad.status).toBe(400);
    expect(bad.body).toEqual({ error: expect.stringContaining("forever") });
  });

  it("GET /api/news og /api/results", async () => {
    const base = await start();
    expect((await getJson(`${base}/api/news`)).body).toEqual(NEWS);
    expect((await getJson(`${base}/api/results`)).body).toEqual(RACES);
  });

  it("uventet feil gir 500 uten detaljer", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const base = await start({}, {
      news: async () => {
        throw new Error("disk borte");
      },
      results: async () => RACES,
    });
    const { status, body } = await getJson(`${base}/api/news`);
    expect(status).toBe(500);
    expect(body).toEqual({ error: "Internal server error" });
    expect(errorSpy).toHaveBeenCalled();
  });
});

describe("utforsker-endepunkter", () => {
  it("GET /api/aggregate", async () => {
    const base = await start();
    const { status, body } = await getJson(
      `${base}/api/aggregate?period=month&groupBy=rider_name&metric=distance_km&agg=sum`
    );
    expect(status).toBe(200);
    expect(body).toMatchObject({
      period: "month",
      groupBy: ["rider_name"],
      metric: "distance_km",
      agg: "sum",
      rows: [
        { label: "Jan 2025", groups: { rider_name: "Ada" }, value: 90 },
        { label: "Jan 2025", groups: { rider_name: "Ben" }, value: 60 },
        { label: "Feb 2025", groups: { rider_name: "Cleo" }, value: 80 },
        { label: "Feb 2025", groups: { rider_name: "Ada" }, value: 30 },
      ],
    });
  });

  it("GET /api/aggregate med filter", async () => {
    const base = await start();
    const { body } = await getJson(`${base}/api/aggregate?team=beta&from=2025-02-01&to=2025-02-28`);
    expect(body).toMatchObject({ rows: [{ label: "Feb 2025", groups: {}, value: 80 }] });
  });

  it("ugyldige parametre gir 400", async () => {
    const base = await start();

    const period = await getJson(`${base}/api/aggregate?period=fortnight`);
    expect(period).toEqual({ status: 400, body: { error: "Invalid period" } });

    const groupBy = await getJson(`${base}/api/aggregate?groupBy=colour`);
    expect(groupBy).toEqual({
      status: 400,
      body: { error: 'Invalid groupBy "colour" (expected rider_name or team_name)' },
    });

    const date = await getJson(`${base}/api/records?from=someday`);
    expect(date).toEqual({ status: 400, body: { error: "Invalid date: someday" } });
  });

  it("GET /api/kpis", async () => {
    const base = await start();
    const { body } = await getJson(`${base}/api/kpis?from=2025-02-01&to=2025-02-28`);
    expect(body).toMatchObject({
      previousTo: "2025-01-31T23:59:59.000Z",
      current: { rides: 2, totalDistance: 110 },
      delta: { rides: -1, totalDistance: -40, avgPower: 5 },
    });
  });

  it("GET /api/kpis avviser from etter to", async () => {
    const base = await start();
    expect(await getJson(`${base}/api/kpis?from=2025-02-28&to=2025-02-01`)).toEqual({
      status: 400,
      body: { error: "Invalid date range: 2025-02-28 is after 2025-02-01" },
    });
  });

  it("GET /api/distribution", async () => {
    const base = await start();
    const { body } = await getJson(`${base}/api/distribution?metric=distance_km&bins=2`);
    expect(body).toEqual({
      metric: "distance_km",
      bins: [
        { start: 30, end: 55, count: 3 },
        { start: 55, end: 80, count: 2 },
      ],
    });
  });

  it("GET /api/records sideinndeler filtrerte rader", async () => {
    const base = await start();
    const { body } = await getJson(`${base}/api/records?rider=ada&limit=2`);
    expect(body).toMatchObject({
      total: 3,
      offset: 0,
      limit: 2,
      records: [
        { rider_name: "Ada", timestamp: "2025-01-06T08:00:00.000Z" },
        { rider_name: "Ada", timestamp: "2025-01-20T08:00:00.000Z" },
      ],
    });
  });
});

describe("opplasting og datasett", () => {
  const MARCH_CSV = "Date,Rider,Team,Distance\n2025-03-01,Dina,Gamma,25\n2025-03-02,Eli,Gamma,35";

  it("POST /upload erstatter datasettet, reset går tilbake", async () => {
    const base = await start();

    const upload = await postForm(`${base}/upload`, csvForm(MARCH_CSV, "march.csv"));
    expect(upload.status).toBe(200);
    expect(upload.body).toMatchObject({
      success: true,
      message: "Successfully uploaded 2 records",
      stats: { totalDistance: 60 },
      riders: [{ name: "Dina" }, { name: "Eli" }],
      dataset: {
        source: "upload",
        fileName: "march.csv",
        recordCount: 2,
        columns: ["timestamp", "rider_name", "team_name", "distance_km"],
        droppedRows: 0,
        dateRange: { from: "2025-03-01T00:00:00.000Z", to: "2025-03-02T00:00:00.000Z" },
      },
    });

    expect((await getJson(`${base}/api/stats`)).body).toMatchObject({ totalDistance: 60 });

    const res = await fetch(`${base}/api/dataset/reset`, { method: "POST" });
    expect(await res.json()).toMatchObject({ source: "sample", recordCount: 5 });
    expect((await getJson(`${base}/api/stats`)).body).toMatchObject({ totalDistance: 260 });
  });

  it("tar imot kolonnemapping som JSON", async () => {
    const base = await start();
    const { status, body } = await postForm(
      `${base}/upload`,
      csvForm("when,who,km\n2025-03-01,Dina,25", "mapped.csv", '{"timestamp":"when","rider_name":"who"}')
    );
    expect(status).toBe(200);
    expect(body).toMatchObject({
      dataset: { recordCount: 1, mapping: { timestamp: "when", rider_name: "who", distance_km: "km" } },
    });
  });

  it("avviser manglende fil", async () => {
    const base = await start();
    const form = new FormData();
    form.append("mapping", "{}");
    expect(await postForm(`${base}/upload`, form)).toEqual({
      status: 400,
      body: { error: "No file uploaded" },
    });
  });

  it("tomt filfelt fra nettleseren gir «No file selected»", async () => {
    const base = await start();
    const boundary = "----ride-boundary";
    const body = [
      `--${boundary}`,
      'Content-Disposition: form-data; name="file"; filename=""',
      "Content-Type: application/octet-stream",
      "",
      "",
      `--${boundary}--`,
      "",
    ].join("\r\n");

    const res = await fetch(`${base}/upload`, {
      method: "POST",
      headers: { "Content-Type": `multipart/form-data; boundary=${boundary}` },
      body,
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No file selected" });
  });

  it("opplasting er også tilgjengelig under /api", async () => {
    const base = await start();
    const { status, body } = await postForm(`${base}/api/upload`, csvForm(MARCH_CSV, "march.csv"));
    expect(status).toBe(200);
    expect(body).toMatchObject({ message: "Successfully uploaded 2 records" });
  });

  it("avviser ubrukelige filer og ugyldig mapping", async () => {
    const base = await start();

    const columns = await postForm(`${base}/upload`, csvForm("foo,bar\n1,2", "foo.csv"));
    expect(columns).toEqual({
      status: 400,
      body: {
        error:
          "Error processing file: No recognised columns. Expected some of: timestamp, rider_name, team_name, distance_km, duration_sec, power_watts, heart_rate_bpm, elevation_gain_m",
      },
    });

    const mapping = await postForm(`${base}/upload`, csvForm(MARCH_CSV, "march.csv", "not json"));
    expect(mapping).toEqual({
      status: 400,
      body: { error: "Error processing file: Invalid column mapping (not JSON)" },
    });

    // datasettet er uendret etter avviste opplastinger
    expect((await getJson(`${base}/api/dataset`)).body).toMatchObject({ source: "sample" });
  });

  it("for stor fil gir 413", async () => {
    const base = await start({ maxUploadBytes: 16 });
    expect(await postForm(`${base}/upload`, csvForm(RIDES_CSV, "big.csv"))).toEqual({
      status: 413,
      body: { error: "File too large" },
    });
  });
});

describe("rot og ukjente ruter", () => {
  it("uten ferdigbygget frontend", async () => {
    const base = await start();
    expect((await getJson(`${base}/`)).body).toMatchObject({ status: "ok" });
    expect((await getJson(`${base}/results`)).status).toBe(404);
    expect(await getJson(`${base}/api/nope`)).toEqual({ status: 404, body: { error: "Not found" } });
  });
});
