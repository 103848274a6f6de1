// server/src/app.ts
import { existsSync } from "node:fs";
import path from "node:path";
import cors from "cors";
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from "express";
import multer from "multer";
import type { AppConfig } from "./config";
import { loadNews, loadRaceResults } from "./lib/content";
import { errorMessage, isUserError } from "./lib/errors";
import { createApiRouter, type ContentSources } from "./routes/api";
import { createUploadRouter } from "./routes/upload";
import { DatasetStore } from "./state/datasetStore";

export type AppDeps = {
  config: AppConfig;
  store?: DatasetStore;
  content?: ContentSources;
};

/** Enkel request-logg: "[HTTP] GET /api/stats 200 3ms" */
const requestLog: RequestHandler = (req, res, next) => {
  const started = Date.now();
  res.on("finish", () => {
    const ms = Date.now() - started;
    console.log(`[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${ms}ms`);
  });
  next();
};

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") {
      res.status(413).json({ error: "File too large" });
      return;
    }
    res.status(400).json({ error: `Error processing file: ${err.message}` });
    return;
  }

  if (isUserError(err)) {
    res.status(400).json({ error: err.message });
    return;
  }

  console.error(`[HTTP] ${req.method} ${req.originalUrl} feilet:`, errorMessage(err), err);
  res.status(500).json({ error: "Internal server error" });
};

export function createApp({ config, store, content }: AppDeps): Express {
  const app = express();
  const datasets = store ?? DatasetStore.fromSampleFile(config.sampleDataPath);
  const sources: ContentSources = content ?? {
    news: () => loadNews(config.newsPath),
    results: () => loadRaceResults(config.resultsPath),
  };

  app.disable("x-powered-by");
  app.use(requestLog);
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json());

  app.use(createUploadRouter(datasets, config.maxUploadBytes));
  app.use("/api", createApiRouter(datasets, sources));

  // Ferdigbygget SPA (frontend/dist) serveres når den finnes
  const indexHtml = path.join(config.staticDir, "index.html");
  if (existsSync(indexHtml)) {
    app.use(express.static(config.staticDir));
    app.get(["/", "/results", "/explore"], (_req, res) => {
      res.sendFile(indexHtml);
    });
  } else {
    app.get("/", (_req, res) => {
      res.json({
        name: "team-ride-dashboard",
        status: "ok",
        frontend: "not built – run the Vite dev server in frontend/",
      });
    });
    app.get("/results", (_req, res) => {
      res.status(404).json({ error: "Frontend build not found" });
    });
  }

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(errorHandler);
  return app;
}
