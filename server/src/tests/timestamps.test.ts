// server/src/tests/timestamps.test.ts
import { describe, it, expect } from "vitest";
import { excelSerialToMs, parseTimestamp } from "../lib/timestamps";

describe("parseTimestamp", () => {
  it("leser ISO-datoer og -tider som UTC", () => {
    expect(parseTimestamp("2025-03-01")).toBe(Date.UTC(2025, 2, 1));
    expect(parseTimestamp("2025-03-01 08:30")).toBe(Date.UTC(2025, 2, 1, 8, 30));
    expect(parseTimestamp("2025-03-01T08:30:15Z")).toBe(Date.UTC(2025, 2, 1, 8, 30, 15));
    expect(parseTimestamp(" 2025-03-01T08:30:00.5Z ")).toBe(Date.UTC(2025, 2, 1, 8, 30, 0, 500));
  });

  it("regner om offset til UTC", () => {
    expect(parseTimestamp("2025-03-01T10:30:00+02:00")).toBe(Date.UTC(2025, 2, 1, 8, 30));
    expect(parseTimestamp("2025-03-01T06:00:00-0130")).toBe(Date.UTC(2025, 2, 1, 7, 30));
  });

  it("leser skråstrek-datoer (ÅÅÅÅ/MM/DD og MM/DD/ÅÅÅÅ) som UTC", () => {
    expect(parseTimestamp("2025/03/15")).toBe(Date.UTC(2025, 2, 15));
    expect(parseTimestamp("2025/3/5 08:00")).toBe(Date.UTC(2025, 2, 5, 8, 0));
    expect(parseTimestamp("03/16/2025 09:30")).toBe(Date.UTC(2025, 2, 16, 9, 30));
    expect(parseTimestamp("3/16/2025 9:30:15")).toBe(Date.UTC(2025, 2, 16, 9, 30, 15));
    expect(parseTimestamp("16/03/2025")).toBeNull();
    expect(parseTimestamp("2025/02/30")).toBeNull();
  });

  it("returnerer null for ugyldige verdier", () => {
    expect(parseTimestamp("2025-02-30")).toBeNull();
    expect(parseTimestamp("2025-13-01")).toBeNull();
    expect(parseTimestamp("yesterday")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(true)).toBeNull();
  });

  it("tolker tall som Excel-serienummer", () => {
    expect(parseTimestamp(45658)).toBe(Date.UTC(2025, 0, 1));
    expect(parseTimestamp(45658.5)).toBe(Date.UTC(2025, 0, 1, 12));
    expect(excelSerialToMs(25569)).toBe(0);
    expect(parseTimestamp(-3)).toBeNull();
  });

  it("godtar Date-objekter", () => {
    expect(parseTimestamp(new Date(Date.UTC(2025, 5, 1)))).toBe(Date.UTC(2025, 5, 1));
    expect(parseTimestamp(new Date("nope"))).toBeNull();
  });
});
