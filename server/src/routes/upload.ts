// server/src/routes/upload.ts
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import type { ColumnMapping } from "../lib/columns";
import { IngestError, errorMessage } from "../lib/errors";
import { loadDataset } from "../lib/loader";
import { riderSummaries, summaryStats } from "../lib/summaries";
import { describeDataset, type DatasetStore } from "../state/datasetStore";
import { asyncRoute } from "./asyncRoute";

const MappingSchema = z
  .object({
    timestamp: z.string().optional(),
    rider_name: z.string().optional(),
    team_name: z.string().optional(),
    distance_km: z.string().optional(),
    duration_sec: z.string().optional(),
    power_watts: z.string().optional(),
    heart_rate_bpm: z.string().optional(),
    elevation_gain_m: z.string().optional(),
  })
  .strict();

/** Valgfri `mapping`-feltet: JSON med kanoniske kolonner → kolonnenavn i fila */
export function parseMapping(raw: unknown): ColumnMapping | null {
  if (raw === undefined || raw === null || raw === "") return null;
  if (typeof raw !== "string") {
    throw new IngestError("invalid_mapping", "Invalid column mapping");
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new IngestError("invalid_mapping", "Invalid column mapping (not JSON)", { cause: err });
  }

  const parsed = MappingSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new IngestError(
      "invalid_mapping",
      `Invalid column mapping: ${issue?.message ?? parsed.error.message}`
    );
  }
  return parsed.data;
}

export function createUploadRouter(store: DatasetStore, maxUploadBytes: number): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes } });

  // også under /api, så en klient med base ".../api" når samme rute
  router.post(
    ["/upload", "/api/upload"],
    upload.single("file"),
    asyncRoute(async (req, res) => {
      const file = req.file;
      // tomt filfelt (filename="") kommer fra busboy som et vanlig tekstfelt
      if (!file && typeof req.body?.file === "string") {
        res.status(400).json({ error: "No file selected" });
        return;
      }
      if (!file) {
        res.status(400).json({ error: "No file uploaded" });
        return;
      }

      try {
        const userMapping = parseMapping(req.body?.mapping);
        const dataset = loadDataset(file.buffer, {
          fileName: file.originalname,
          mimeType: file.mimetype,
          userMapping,
          source: "upload",
        });
        store.replace(dataset);

        const n = dataset.records.length;
        console.log(
          `[upload] ${file.originalname}: ${n} rader (${dataset.droppedRows} forkastet)`
        );

        res.json({
          success: true,
          stats: summaryStats(dataset.records),
          riders: riderSummaries(dataset.records),
          dataset: describeDataset(dataset),
          message: `Successfully uploaded ${n} records`,
        });
      } catch (err) {
        if (!(err instanceof IngestError)) throw err;
        console.warn(`[upload] avvist ${file.originalname}:`, err.code, err.message);
        res.status(400).json({ error: `Error processing file: ${errorMessage(err)}` });
      }
    })
  );

  return router;
}
