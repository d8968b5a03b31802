import { describe, it, expect } from "vitest";
import { calculateHealthScore, generateHeartRateDistribution, scoreLevel } from "./health-score.js";
import type { DailyAggregate, HeartRateStats } from "./types.js";

function hrDay(date: string, hrStats: HeartRateStats | null): DailyAggregate {
  return { date, totals: {}, readings: {}, hrStats };
}

describe("health-score", () => {
  describe("calculateHealthScore", () => {
    it("scores goal-level averages as excellent", () => {
      const result = calculateHealthScore({
        steps: 10000,
        exercise_minutes: 30,
        stand_hours: 12,
        resting_hr: 60,
        hrv: 50,
      });
      expect(result.score).toBe(100);
      expect(result.level).toBe("excellent");
      expect(result.breakdown).toEqual({ steps: 25, exercise: 25, stand: 20, resting_hr: 15, hrv: 15 });
      expect(result.max_score).toBe(100);
    });

    it("scores all-zero averages as exactly zero", () => {
      const result = calculateHealthScore({ steps: 0, exercise_minutes: 0, stand_hours: 0, resting_hr: 0, hrv: 0 });
      expect(result.score).toBe(0);
      expect(result.level).toBe("needs_work");
      expect(result.breakdown).toEqual({});
    });

    it("does not renormalize missing metrics", () => {
      const result = calculateHealthScore({ steps: 5000 });
      expect(result.breakdown).toEqual({ steps: 12.5 });
      expect(result.score).toBe(12);
    });

    it("caps ratios and clamps the total at 100", () => {
      const result = calculateHealthScore({
        steps: 20000,
        exercise_minutes: 60,
        stand_hours: 24,
        resting_hr: 55,
        hrv: 60,
      });
      expect(result.breakdown).toEqual({ steps: 30, exercise: 37.5, stand: 24, resting_hr: 15, hrv: 15 });
      expect(result.score).toBe(100);
    });

    it("applies the resting HR and HRV bands", () => {
      expect(calculateHealthScore({ resting_hr: 65 }).breakdown.resting_hr).toBe(12);
      expect(calculateHealthScore({ resting_hr: 75 }).breakdown.resting_hr).toBe(9);
      expect(calculateHealthScore({ resting_hr: 90 }).breakdown.resting_hr).toBe(6);
      expect(calculateHealthScore({ hrv: 45 }).breakdown.hrv).toBe(13.5);
      expect(calculateHealthScore({ hrv: 35 }).breakdown.hrv).toBe(10.5);
      expect(calculateHealthScore({ hrv: 20 }).breakdown.hrv).toBe(7.5);
    });
  });

  describe("scoreLevel", () => {
    it("maps band edges", () => {
      expect(scoreLevel(85).level).toBe("excellent");
      expect(scoreLevel(84).level).toBe("good");
      expect(scoreLevel(70).level).toBe("good");
      expect(scoreLevel(55).level).toBe("moderate");
      expect(scoreLevel(54)).toEqual({
        level: "needs_work",
        description: "Room for improvement. Try to be more active.",
      });
    });
  });

  describe("generateHeartRateDistribution", () => {
    it("tallies zones from each day's min, average and max", () => {
      const result = generateHeartRateDistribution([
        hrDay("2026-01-01", { count: 10, min: 55, avg: 75, max: 150 }),
        hrDay("2026-01-02", { count: 12, min: 65, avg: 95, max: 175 }),
        hrDay("2026-01-03", null),
      ]);
      expect(result.labels).toEqual(["resting", "light", "moderate", "vigorous", "peak"]);
      expect(result.values).toEqual([1, 4, 2, 2, 1]);
    });

    it("only looks at the most recent window", () => {
      const result = generateHeartRateDistribution(
        [
          hrDay("2026-01-01", { count: 10, min: 50, avg: 55, max: 90 }),
          hrDay("2026-01-02", { count: 10, min: 65, avg: 80, max: 120 }),
        ],
        1,
      );
      expect(result.values).toEqual([0, 2, 1, 0, 0]);
    });

    it("returns zeros without heart-rate data", () => {
      expect(generateHeartRateDistribution([]).values).toEqual([0, 0, 0, 0, 0]);
    });
  });
});
