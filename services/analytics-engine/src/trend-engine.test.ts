import { describe, it, expect } from "vitest";
import {
  analyzeFitnessTrajectory,
  analyzeMonthlyProgression,
  analyzeWeeklyPatterns,
  calculateWeeklyStats,
  compareRecentToPrevious,
  generateDailyTrends,
  generateGoalsProgress,
  generateSummaryStats,
  generateWeeklyComparison,
} from "./trend-engine.js";
import type { DailyAggregate, DailyStats } from "./types.js";

function agg(date: string, totals: DailyAggregate["totals"], readings: DailyAggregate["readings"] = {}): DailyAggregate {
  return { date, totals, readings, hrStats: null };
}

describe("trend-engine", () => {
  describe("generateDailyTrends", () => {
    it("slices the most recent records and zero-fills absent metrics", () => {
      const trends = generateDailyTrends(
        [
          agg("2026-01-03", { steps: 300 }, { restingHr: 57 }),
          agg("2026-01-01", { steps: 100 }),
          agg("2026-01-02", { steps: 200, distanceKm: 1.5 }),
        ],
        2,
      );
      expect(trends.dates).toEqual(["2026-01-02", "2026-01-03"]);
      expect(trends.steps).toEqual([200, 300]);
      expect(trends.distance).toEqual([1.5, 0]);
      expect(trends.resting_hr).toEqual([0, 57]);
      expect(trends.hrv).toEqual([0, 0]);
    });
  });

  describe("generateWeeklyComparison", () => {
    it("buckets by ISO week-year", () => {
      const weekly = generateWeeklyComparison([
        agg("2025-12-28", { steps: 5000 }),
        agg("2025-12-29", { steps: 1001, distanceKm: 1.2 }),
        agg("2026-01-01", { steps: 1000, distanceKm: 1.4 }),
      ]);
      expect(weekly.weeks).toEqual(["2025-W52", "2026-W01"]);
      expect(weekly.avg_steps).toEqual([5000, 1000]);
      expect(weekly.avg_distance).toEqual([0, 1.3]);
    });

    it("keeps the twelve most recent weeks", () => {
      const mondays = Array.from({ length: 14 }, (_, i) => {
        const d = new Date(Date.UTC(2026, 0, 5 + 7 * i));
        return agg(d.toISOString().slice(0, 10), { steps: i });
      });
      const weekly = generateWeeklyComparison(mondays);
      expect(weekly.weeks).toHaveLength(12);
      expect(weekly.weeks[0]).toBe("2026-W04");
      expect(weekly.avg_steps[11]).toBe(13);
    });
  });

  describe("generateGoalsProgress", () => {
    it("flags each goal per day", () => {
      const goals = generateGoalsProgress([
        agg("2026-01-01", { steps: 10000, standHours: 11, exerciseMinutes: 30 }),
        agg("2026-01-02", { steps: 9999, standHours: 12 }),
      ]);
      expect(goals).toEqual({
        dates: ["2026-01-01", "2026-01-02"],
        steps_goal: [1, 0],
        stand_goal: [0, 1],
        exercise_goal: [1, 0],
      });
    });
  });

  describe("generateSummaryStats", () => {
    it("totals, averages and tallies the window", () => {
      const stats = generateSummaryStats([
        agg("2026-01-01", { steps: 12000, distanceKm: 8.25, exerciseMinutes: 40, standHours: 12 }, { restingHr: 58 }),
        agg("2026-01-02", { steps: 7001, distanceKm: 4.5, exerciseMinutes: 15, standHours: 9 }),
      ]);
      expect(stats.period).toBe("2026-01-01 to 2026-01-02");
      expect(stats.days_count).toBe(2);
      expect(stats.totals.steps).toBe(19001);
      expect(stats.averages.steps).toBe(9500);
      expect(stats.averages.stand_hours).toBe(10.5);
      expect(stats.averages.resting_hr).toBe(58);
      expect(stats.averages.hrv).toBe(0);
      expect(stats.goals.steps_10k).toEqual({ achieved: 1, total: 2 });
      expect(stats.goals.exercise_30m).toEqual({ achieved: 1, total: 2 });
    });

    it("returns an empty summary without data", () => {
      const stats = generateSummaryStats([]);
      expect(stats.period).toBeNull();
      expect(stats.days_count).toBe(0);
      expect(stats.averages.steps).toBe(0);
    });
  });

  describe("calculateWeeklyStats", () => {
    it("summarizes each metric", () => {
      const stats = calculateWeeklyStats([
        agg("2026-01-01", { steps: 4000 }, { restingHr: 60 }),
        agg("2026-01-02", { steps: 6000 }),
      ]);
      expect(stats?.["steps"]).toEqual({ values: [4000, 6000], avg: 5000, min: 4000, max: 6000, total: 10000, count: 2 });
      expect(stats?.["restingHr"]?.count).toBe(1);
    });

    it("returns null for an empty window", () => {
      expect(calculateWeeklyStats([])).toBeNull();
    });
  });

  describe("analyzeWeeklyPatterns", () => {
    it("averages non-zero values per weekday", () => {
      const days: DailyStats[] = [
        { date: "2026-01-05", steps: 8000, hrvAvg: 0 },
        { date: "2026-01-12", steps: 10000 },
      ];
      const patterns = analyzeWeeklyPatterns(days);
      expect(patterns.Mon).toEqual({ steps: 9000 });
      expect(patterns.Tue).toEqual({});
      expect(Object.keys(patterns)).toEqual(["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"]);
    });
  });

  describe("analyzeMonthlyProgression", () => {
    it("returns chronological monthly means", () => {
      const progression = analyzeMonthlyProgression([
        { date: "2026-02-03", vo2Max: 44 },
        { date: "2026-01-10", steps: 6000 },
        { date: "2026-01-20", steps: 8000 },
      ]);
      expect(progression).toEqual([
        { month: "2026-01", steps: 7000 },
        { month: "2026-02", vo2_max: 44 },
      ]);
    });
  });

  describe("compareRecentToPrevious", () => {
    const days: DailyStats[] = [100, 100, 150, 150].map((steps, i) => ({ date: `2026-01-0${i + 1}`, steps }));

    it("compares the two most recent periods", () => {
      expect(compareRecentToPrevious(days, 2)).toEqual({
        steps: { recent_avg: 150, previous_avg: 100, change: 50, pct_change: 50 },
      });
    });

    it("returns nothing without two full periods", () => {
      expect(compareRecentToPrevious(days.slice(1), 2)).toEqual({});
    });
  });

  describe("analyzeFitnessTrajectory", () => {
    it("compares early and late thirds", () => {
      const days: DailyStats[] = [40, 41, 42, 43, 44, 45].map((vo2Max, i) => ({
        date: `2026-01-0${i + 1}`,
        vo2Max,
        ...(i < 3 ? { hrvAvg: 50 } : {}),
        ...(i < 2 ? { restingHr: 60 } : {}),
      }));
      const trajectory = analyzeFitnessTrajectory(days);
      expect(trajectory.vo2_max).toEqual({ early_avg: 40.5, late_avg: 44.5, change: 4, improving: true });
      expect(trajectory.hrv).toEqual({ early_avg: 50, late_avg: 50, change: 0, improving: false });
      expect(trajectory.resting_hr).toBeUndefined();
    });

    it("rounds the late window up when the history does not split evenly", () => {
      const days: DailyStats[] = [40, 42, 44, 46].map((vo2Max, i) => ({
        date: `2026-01-0${i + 1}`,
        vo2Max,
      }));
      expect(analyzeFitnessTrajectory(days).vo2_max).toEqual({
        early_avg: 40,
        late_avg: 45,
        change: 5,
        improving: true,
      });
    });
  });
});
