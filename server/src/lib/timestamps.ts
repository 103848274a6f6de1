// server/src/lib/timestamps.ts
// Tidsstempler leses som UTC når de mangler offset. Aldri kast – returner null.

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// Regneark-eksport: "2025/03/15 08:00" og amerikansk "03/16/2025 09:30"
const SLASH_YMD_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const SLASH_MDY_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

// Excel serial 25569 = 1970-01-01
const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;

function offsetMinutes(tz: string): number {
  if (tz.toUpperCase() === "Z") return 0;
  const sign = tz.startsWith("-") ? -1 : 1;
  const digits = tz.slice(1).replace(":", "");
  const hh = Number(digits.slice(0, 2));
  const mm = Number(digits.slice(2, 4));
  return sign * (hh * 60 + mm);
}

type Parts = {
  year: number;
  month: number;
  day: number;
  hour?: string;
  minute?: string;
  second?: string;
  fraction?: string;
};

function utcFromParts(p: Parts): number | null {
  const { year, month, day } = p;
  const hour = p.hour !== undefined ? Number(p.hour) : 0;
  const minute = p.minute !== undefined ? Number(p.minute) : 0;
  const second = p.second !== undefined ? Number(p.second) : 0;
  const ms = p.fraction !== undefined ? Number(p.fraction.padEnd(3, "0").slice(0, 3)) : 0;

  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  // 2025-02-30 o.l. ruller over i Date.UTC – avvis
  if (new Date(utc).getUTCDate() !== day) return null;
  return utc;
}

function parseIsoLike(s: string): number | null {
  const m = ISO_RE.exec(s);
  if (!m) return null;

  const utc = utcFromParts({
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: m[4],
    minute: m[5],
    second: m[6],
    fraction: m[7],
  });
  if (utc === null) return null;

  const offset = m[8] !== undefined ? offsetMinutes(m[8]) : 0;
  return utc - offset * 60_000;
}

function parseSlashDate(s: string): number | null {
  const ymd = SLASH_YMD_RE.exec(s);
  if (ymd) {
    return utcFromParts({
      year: Number(ymd[1]),
      month: Number(ymd[2]),
      day: Number(ymd[3]),
      hour: ymd[4],
      minute: ymd[5],
      second: ymd[6],
    });
  }
  const mdy = SLASH_MDY_RE.exec(s);
  if (mdy) {
    return utcFromParts({
      year: Number(mdy[3]),
      month: Number(mdy[1]),
      day: Number(mdy[2]),
      hour: mdy[4],
      minute: mdy[5],
      second: mdy[6],
    });
  }
  return null;
}

export function excelSerialToMs(serial: number): number {
  return Math.round((serial - EXCEL_EPOCH_OFFSET_DAYS) * MS_PER_DAY);
}

export function parseTimestamp(value: unknown): number | null {
  if (value instanceof Date) {
    const t = value.getTime();
    return Number.isNaN(t) ? null : t;
  }
  if (typeof value === "number") {
    // regneark-celler med dato kommer som serienummer
    return Number.isFinite(value) && value > 0 ? excelSerialToMs(value) : null;
  }
  if (typeof value !== "string") return null;

  const s = value.trim();
  if (!s) return null;
  return parseIsoLike(s) ?? parseSlashDate(s);
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
