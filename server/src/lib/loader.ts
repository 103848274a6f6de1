// server/src/lib/loader.ts
// Fil → RideRecord[]: les tabell, finn kolonner, tving typer, utled fart.
import { readFile } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import * as XLSX from "xlsx";
import {
  CANONICAL_COLUMNS,
  resolveMapping,
  type CanonicalColumn,
  type ColumnMapping,
} from "./columns";
import { IngestError, errorMessage } from "./errors";
import { parseTimestamp } from "./timestamps";
import type { Dataset, DatasetSource, RideRecord } from "./types";

export type FileFormat = "csv" | "xlsx" | "xls";

export type Cell = string | number | boolean | Date | null;
export type RawRow = Record<string, Cell>;

export type RawTable = {
  headers: string[];
  rows: RawRow[];
};

export type LoadOptions = {
  fileName?: string | null;
  mimeType?: string | null;
  userMapping?: ColumnMapping | null;
  source?: DatasetSource;
};

export const UNKNOWN = "Unknown";

const EXCEL_MIMES = new Set([
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/vnd.ms-excel",
]);

function startsWith(bytes: Uint8Array, magic: readonly number[]): boolean {
  if (bytes.length < magic.length) return false;
  return magic.every((b, i) => bytes[i] === b);
}

export function detectFormat(
  bytes: Uint8Array,
  fileName?: string | null,
  mimeType?: string | null
): FileFormat {
  // Innhold slår navn: en .csv som egentlig er en zip-arbeidsbok leses som xlsx
  if (startsWith(bytes, [0x50, 0x4b, 0x03, 0x04])) return "xlsx";
  if (startsWith(bytes, [0xd0, 0xcf, 0x11, 0xe0])) return "xls";

  const ext = fileName ? path.extname(fileName).toLowerCase() : "";
  if (ext === ".xlsx") return "xlsx";
  if (ext === ".xls") return "xls";

  const mime = (mimeType ?? "").toLowerCase();
  if (mime.includes("excel") || EXCEL_MIMES.has(mime)) return "xlsx";

  return "csv";
}

function looksBinary(text: string): boolean {
  // NUL eller mye kontrolltegn i starten → ikke tekst
  const head = text.slice(0, 4096);
  if (head.includes("\u0000")) return true;
  const control = head.match(/[\u0001-\u0008\u000e-\u001f]/g)?.length ?? 0;
  return head.length > 0 && control / head.length > 0.05;
}

function readCsv(bytes: Uint8Array): RawTable {
  const text = new TextDecoder("utf-8").decode(bytes).replace(/^\uFEFF/, "");
  if (looksBinary(text)) {
    throw new IngestError("bad_format", "Bad file format");
  }

  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });

  const headers = (parsed.meta.fields ?? []).filter((h) => h.length > 0);
  if (headers.length === 0) {
    throw new IngestError("bad_format", "Bad file format");
  }

  const rows: RawRow[] = parsed.data.map((r) => {
    const row: RawRow = {};
    for (const h of headers) {
      const v = r[h];
      row[h] = v === undefined ? null : v;
    }
    return row;
  });

  return { headers, rows };
}

function toCell(v: unknown): Cell {
  if (
    v === null ||
    typeof v === "string" ||
    typeof v === "number" ||
    typeof v === "boolean" ||
    v instanceof Date
  ) {
    return v;
  }
  return v === undefined ? null : String(v);
}

function readWorkbook(bytes: Uint8Array): RawTable {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(bytes, { type: "array" });
  } catch (err) {
    throw new IngestError("bad_format", "Bad file format", { cause: err });
  }

  const first = wb.SheetNames[0];
  const sheet = first !== undefined ? wb.Sheets[first] : undefined;
  if (!sheet) {
    throw new IngestError("bad_format", "Bad file format");
  }

  // header: 1 → rå matriser; første rad er header
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });

  const [headerRow, ...dataRows] = matrix;
  const headers = (headerRow ?? []).map((h) => (h === null ? "" : String(h).trim()));
  if (headers.every((h) => h.length === 0)) {
    throw new IngestError("bad_format", "Bad file format");
  }

  const rows: RawRow[] = dataRows.map((cells) => {
    const row: RawRow = {};
    headers.forEach((h, i) => {
      if (!h) return;
      row[h] = toCell(cells[i]);
    });
    return row;
  });

  return { headers: headers.filter((h) => h.length > 0), rows };
}

export function readTable(bytes: Uint8Array, format: FileFormat): RawTable {
  try {
    return format === "csv" ? readCsv(bytes) : readWorkbook(bytes);
  } catch (err) {
    if (err instanceof IngestError) throw err;
    throw new IngestError("bad_format", `Bad file format (${errorMessage(err)})`, {
      cause: err,
    });
  }
}

/** pd.to_numeric(errors="coerce")-semantikk */
export function toNumber(v: Cell | undefined): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v !== "string") return null;
  const s = v.trim();
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function toLabel(v: Cell | undefined): string {
  if (v === null || v === undefined) return UNKNOWN;
  const s = (v instanceof Date ? v.toISOString() : String(v)).trim();
  return s || UNKNOWN;
}

export function deriveSpeed(distanceKm: number | null, durationSec: number | null): number | null {
  if (distanceKm === null || durationSec === null || durationSec <= 0) return null;
  return distanceKm / (durationSec / 3600);
}

export function buildDataset(table: RawTable, opts: LoadOptions = {}): Dataset {
  if (table.rows.length === 0) {
    throw new IngestError("no_rows", "File contains no data rows");
  }

  const mapping = resolveMapping(table.headers, opts.userMapping);
  const columns = CANONICAL_COLUMNS.filter((c) => mapping[c] !== undefined);
  if (columns.length === 0) {
    throw new IngestError(
      "missing_columns",
      `No recognised columns. Expected some of: ${CANONICAL_COLUMNS.join(", ")}`
    );
  }

  const pick = (row: RawRow, col: CanonicalColumn): Cell | undefined => {
    const source = mapping[col];
    return source === undefined ? undefined : row[source];
  };

  const hasTimestamp = mapping.timestamp !== undefined;
  const records: RideRecord[] = [];
  let droppedRows = 0;

  for (const row of table.rows) {
    const timestamp = hasTimestamp ? parseTimestamp(pick(row, "timestamp")) : 0;
    if (timestamp === null) {
      droppedRows += 1;
      continue;
    }

    const distance_km = toNumber(pick(row, "distance_km"));
    const duration_sec = toNumber(pick(row, "duration_sec"));

    records.push({
      index: records.length,
      timestamp,
      rider_name: toLabel(pick(row, "rider_name")),
      team_name: toLabel(pick(row, "team_name")),
      distance_km,
      duration_sec,
      power_watts: toNumber(pick(row, "power_watts")),
      heart_rate_bpm: toNumber(pick(row, "heart_rate_bpm")),
      elevation_gain_m: toNumber(pick(row, "elevation_gain_m")),
      speed_kmh: deriveSpeed(distance_km, duration_sec),
    });
  }

  if (records.length === 0) {
    throw new IngestError(
      "no_timestamps",
      `No parseable timestamps in column "${mapping.timestamp ?? "timestamp"}"`
    );
  }

  return {
    records,
    columns,
    mapping,
    source: opts.source ?? "upload",
    fileName: opts.fileName ?? null,
    droppedRows,
    loadedAt: new Date().toISOString(),
  };
}

export function loadDataset(bytes: Uint8Array, opts: LoadOptions = {}): Dataset {
  const format = detectFormat(bytes, opts.fileName, opts.mimeType);
  const table = readTable(bytes, format);
  return buildDataset(table, opts);
}

export async function loadDatasetFromFile(
  filePath: string,
  opts: Omit<LoadOptions, "fileName"> = {}
): Promise<Dataset> {
  const bytes = await readFile(filePath);
  return loadDataset(bytes, { ...opts, fileName: path.basename(filePath) });
}
