// server/src/tests/aggregate.test.ts
import { describe, it, expect } from "vitest";
import { aggregateByPeriod, filterRecords, histogram, reduceValues } from "../lib/aggregate";
import { makeRecord, RIDES } from "./fixtures";

describe("reduceValues", () => {
  it("hopper over null", () => {
    expect(reduceValues([1, null, 3], "sum")).toBe(4);
    expect(reduceValues([1, null, 3], "mean")).toBe(2);
    expect(reduceValues([1, null, 3], "max")).toBe(3);
    expect(reduceValues([1, null, 3], "min")).toBe(1);
  });

  it("tom mengde: sum 0, resten null", () => {
    expect(reduceValues([null], "sum")).toBe(0);
    expect(reduceValues([], "mean")).toBeNull();
    expect(reduceValues([], "max")).toBeNull();
  });
});

describe("aggregateByPeriod", () => {
  it("summerer distanse per måned og rytter, høyeste verdi først", () => {
    const rows = aggregateByPeriod(RIDES, {
      period: "month",
      groupBy: ["rider_name"],
      metric: "distance_km",
      agg: "sum",
    });

    expect(rows).toEqual([
      { bucket: "2025-01-01T00:00:00.000Z", label: "Jan 2025", groups: { rider_name: "Ada" }, value: 90 },
      { bucket: "2025-01-01T00:00:00.000Z", label: "Jan 2025", groups: { rider_name: "Ben" }, value: 60 },
      { bucket: "2025-02-01T00:00:00.000Z", label: "Feb 2025", groups: { rider_name: "Cleo" }, value: 80 },
      { bucket: "2025-02-01T00:00:00.000Z", label: "Feb 2025", groups: { rider_name: "Ada" }, value: 30 },
    ]);
  });

  it("uten gruppering gir én rad per periode", () => {
    const rows = aggregateByPeriod(RIDES, {
      period: "month",
      groupBy: [],
      metric: "power_watts",
      agg: "mean",
    });
    expect(rows.map((r) => [r.label, r.value])).toEqual([
      ["Jan 2025", 210],
      ["Feb 2025", 215],
    ]);
    expect(rows[0]?.groups).toEqual({});
  });

  it("null-verdier sorteres sist innen perioden", () => {
    const january = RIDES.filter((r) => r.timestamp < Date.UTC(2025, 1, 1));
    const rows = aggregateByPeriod(january, {
      period: "month",
      groupBy: ["rider_name"],
      metric: "power_watts",
      agg: "mean",
    });
    expect(rows.map((r) => [r.groups.rider_name, r.value])).toEqual([
      ["Ada", 210],
      ["Ben", null],
    ]);
  });

  it("ukesbøtter starter mandag og får ISO-ukeetikett", () => {
    const rows = aggregateByPeriod(RIDES, {
      period: "week",
      groupBy: ["team_name"],
      metric: "distance_km",
      agg: "sum",
    });
    expect(rows.map((r) => [r.label, r.groups.team_name, r.value])).toEqual([
      ["2025-W02", "Alpha", 100],
      ["2025-W04", "Alpha", 50],
      ["2025-W06", "Beta", 80],
      ["2025-W06", "Alpha", 30],
    ]);
    expect(rows[0]?.bucket).toBe("2025-01-06T00:00:00.000Z");
  });

  it("lik verdi beholder stigende gruppenøkkel", () => {
    const day = Date.UTC(2025, 4, 1, 9);
    const rows = aggregateByPeriod(
      [
        makeRecord({ timestamp: day, rider_name: "Zed", distance_km: 50 }),
        makeRecord({ timestamp: day, rider_name: "Amy", distance_km: 50 }),
      ],
      { period: "day", groupBy: ["rider_name"], metric: "distance_km", agg: "sum" }
    );
    expect(rows.map((r) => r.groups.rider_name)).toEqual(["Amy", "Zed"]);
  });

  it("max og min per periode", () => {
    const q = { period: "month", groupBy: [], metric: "distance_km" } as const;
    expect(aggregateByPeriod(RIDES, { ...q, agg: "max" }).map((r) => r.value)).toEqual([60, 80]);
    expect(aggregateByPeriod(RIDES, { ...q, agg: "min" }).map((r) => r.value)).toEqual([40, 30]);
  });

  it("tomt datasett gir ingen rader", () => {
    expect(
      aggregateByPeriod([], { period: "year", groupBy: [], metric: "distance_km", agg: "sum" })
    ).toEqual([]);
  });
});

describe("filterRecords", () => {
  it("filtrerer på rytter og lag uten hensyn til store bokstaver", () => {
    expect(filterRecords(RIDES, { rider: "ad" }).map((r) => r.index)).toEqual([0, 2, 4]);
    expect(filterRecords(RIDES, { team: "BETA" }).map((r) => r.index)).toEqual([3]);
    expect(filterRecords(RIDES, { rider: "  " })).toHaveLength(5);
  });

  it("datoer er inkluderende på dagnivå", () => {
    const rows = filterRecords(RIDES, { from: Date.UTC(2025, 0, 7), to: Date.UTC(2025, 0, 20) });
    expect(rows.map((r) => r.index)).toEqual([1, 2]);
  });
});

describe("histogram", () => {
  it("deler i like brede bøtter, maks i siste", () => {
    expect(histogram(RIDES, "distance_km", 2)).toEqual([
      { start: 30, end: 55, count: 3 },
      { start: 55, end: 80, count: 2 },
    ]);
  });

  it("like verdier gir én bøtte, ingen verdier gir ingen", () => {
    const same = [10, 10, 10].map((d) => makeRecord({ timestamp: 0, distance_km: d }));
    expect(histogram(same, "distance_km")).toEqual([{ start: 10, end: 10, count: 3 }]);
    expect(histogram(RIDES, "speed_kmh")).toEqual([]);
  });
});
