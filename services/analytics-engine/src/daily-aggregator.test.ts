import { describe, it, expect } from "vitest";
import type { MetricMap, RawReading } from "@health-analytics/contracts";
import {
  aggregateDay,
  aggregateDays,
  calculateTotals,
  computeAllDailyStats,
  computeDailyStats,
  countStandHours,
  getHeartRateStats,
  getKeyReadings,
} from "./daily-aggregator.js";

function readings(values: Array<number | RawReading>): { units: string; count: number; data: RawReading[] } {
  const data = values.map((v) => (typeof v === "number" ? { qty: v } : v));
  return { units: "", count: data.length, data };
}

function metrics(entries: Record<string, Array<number | RawReading>>): MetricMap {
  const map: MetricMap = {};
  for (const [name, values] of Object.entries(entries)) map[name] = readings(values);
  return map;
}

describe("daily-aggregator", () => {
  describe("calculateTotals", () => {
    it("rounds summed steps to a whole number", () => {
      const totals = calculateTotals(metrics({ step_count: [1000.4, 2000.3, 500.5] }));
      expect(totals.steps).toBe(3501);
    });

    it("is insensitive to reading order", () => {
      const forward = calculateTotals(metrics({ step_count: [1200, 3400.6, 88] }));
      const reversed = calculateTotals(metrics({ step_count: [88, 3400.6, 1200] }));
      expect(forward.steps).toBe(reversed.steps);
    });

    it("counts stand hours instead of summing them", () => {
      const totals = calculateTotals(metrics({ apple_stand_hour: [1, 1, 0, 2] }));
      expect(totals.standHours).toBe(3);
    });

    it("keeps distance to two decimals", () => {
      const totals = calculateTotals(metrics({ walking_running_distance: [1.234, 2.345] }));
      expect(totals.distanceKm).toBe(3.58);
    });

    it("coerces string quantities and treats junk as zero", () => {
      const totals = calculateTotals(metrics({ step_count: [{ qty: "1500" }, { qty: "n/a" }, 500] }));
      expect(totals.steps).toBe(2000);
    });

    it("omits metrics absent from the export", () => {
      const totals = calculateTotals(metrics({ step_count: [100] }));
      expect("flights" in totals).toBe(false);
      expect("exerciseMinutes" in totals).toBe(false);
    });

    it("reports zero for a metric present with no readings", () => {
      const totals = calculateTotals(metrics({ active_energy: [] }));
      expect(totals.activeEnergyKcal).toBe(0);
    });
  });

  describe("countStandHours", () => {
    it("counts buckets at or above one", () => {
      expect(countStandHours([0.5, 1, 3, 0])).toBe(2);
    });
  });

  describe("getHeartRateStats", () => {
    it("truncates the mean", () => {
      const stats = getHeartRateStats(metrics({ heart_rate: [65, 72, 130, 140, 75] }));
      expect(stats).toEqual({ count: 5, min: 65, max: 140, avg: 96 });
    });

    it("skips readings without a quantity", () => {
      const stats = getHeartRateStats(metrics({ heart_rate: [60, { Avg: 150 }, 80] }));
      expect(stats).toEqual({ count: 2, min: 60, max: 80, avg: 70 });
    });

    it("ignores null and non-numeric quantities instead of reading them as zero", () => {
      const stats = getHeartRateStats(
        metrics({ heart_rate: [70, { qty: null }, { qty: "n/a" }, 90] }),
      );
      expect(stats).toEqual({ count: 2, min: 70, max: 90, avg: 80 });
    });

    it("returns null without any quantity reading", () => {
      expect(getHeartRateStats(metrics({ heart_rate: [{ Avg: 70 }] }))).toBeNull();
      expect(getHeartRateStats({})).toBeNull();
    });
  });

  describe("getKeyReadings", () => {
    const day = metrics({
      resting_heart_rate: [58.7, 62.2],
      vo2_max: [45.26, 46.04],
      heart_rate_variability: [40, 45],
    });

    it("takes the last resting HR by default", () => {
      expect(getKeyReadings(day).restingHr).toBe(62);
    });

    it("takes the first resting HR under the first policy", () => {
      expect(getKeyReadings(day, "first").restingHr).toBe(58);
    });

    it("keeps the latest VO2max to one decimal and truncates the HRV mean", () => {
      const result = getKeyReadings(day);
      expect(result.vo2Max).toBe(46);
      expect(result.hrvAvg).toBe(42);
    });
  });

  describe("aggregateDay", () => {
    it("returns identical output for identical input", () => {
      const day = metrics({ step_count: [4000, 4100], heart_rate: [70, 90] });
      expect(aggregateDay("2026-01-10", day)).toEqual(aggregateDay("2026-01-10", day));
    });

    it("aggregates many days oldest first", () => {
      const result = aggregateDays({
        "2026-01-11": metrics({ step_count: [20] }),
        "2026-01-10": metrics({ step_count: [10] }),
      });
      expect(result.map((d) => d.date)).toEqual(["2026-01-10", "2026-01-11"]);
      expect(result[1]!.totals.steps).toBe(20);
    });
  });

  describe("computeDailyStats", () => {
    it("prefers the Avg field for heart rate", () => {
      const stats = computeDailyStats("2026-01-10", metrics({ heart_rate: [{ Avg: 70, qty: 10 }, 90] }));
      expect(stats.hrAvg).toBe(80);
      expect(stats.hrMin).toBe(70);
      expect(stats.hrMax).toBe(90);
    });

    it("drops zero readings and keeps sums unrounded", () => {
      const stats = computeDailyStats("2026-01-10", metrics({ step_count: [0, 500.5, 250] }));
      expect(stats.steps).toBe(750.5);
    });

    it("uses the first resting HR reading", () => {
      const stats = computeDailyStats("2026-01-10", metrics({ resting_heart_rate: [55, 61] }));
      expect(stats.restingHr).toBe(55);
    });

    it("omits metrics with no non-zero reading", () => {
      const stats = computeDailyStats("2026-01-10", metrics({ vo2_max: [0] }));
      expect(stats).toEqual({ date: "2026-01-10" });
    });

    it("computes every day sorted by date", () => {
      const all = computeAllDailyStats({
        "2026-02-02": metrics({ step_count: [2] }),
        "2026-02-01": metrics({ step_count: [1] }),
      });
      expect(all.map((d) => d.steps)).toEqual([1, 2]);
    });

    it("drops days with no non-zero reading", () => {
      const all = computeAllDailyStats({
        "2026-02-01": metrics({ step_count: [1200] }),
        "2026-02-02": metrics({ step_count: [0], vo2_max: [0] }),
        "2026-02-03": {},
      });
      expect(all).toEqual([{ date: "2026-02-01", steps: 1200 }]);
    });
  });
});
