import { describe, it, expect } from "vitest";
import {
  dailyTrendsArtifactSchema,
  dashboardMetadataSchema,
  deepAnalysisArtifactSchema,
  deepInsightsArtifactSchema,
  exercisePrsArtifactSchema,
  healthScoreArtifactSchema,
  hrDistributionArtifactSchema,
  insightsArtifactSchema,
  muscleGroupsArtifactSchema,
  personalRecordsArtifactSchema,
  summaryStatsArtifactSchema,
  weeklySummaryArtifactSchema,
  weeklyWorkoutsArtifactSchema,
  workoutSummaryArtifactSchema,
  workoutTrendsArtifactSchema,
} from "@health-analytics/contracts";
import {
  buildDashboardArtifacts,
  buildDeepAnalysisArtifacts,
  buildWeeklySummaryArtifact,
  buildWeeklyWorkoutsArtifact,
  buildWorkoutArtifacts,
  generateHealthReport,
} from "./reports.js";
import type { DailyAggregate, DailyStats } from "./types.js";

function dateAt(offset: number): string {
  return new Date(Date.UTC(2026, 0, 1 + offset)).toISOString().slice(0, 10);
}

const DAYS: DailyAggregate[] = Array.from({ length: 20 }, (_, i) => ({
  date: dateAt(i),
  totals: { steps: 8000 + i * 200, distanceKm: 6.1, exerciseMinutes: 25 + i, standHours: 11, activeEnergyKcal: 450 },
  readings: { restingHr: 58, hrvAvg: 44 },
  hrStats: { count: 100, min: 52, avg: 74, max: 150 },
}));

const STATS: DailyStats[] = Array.from({ length: 70 }, (_, i) => ({
  date: dateAt(i),
  steps: 7000 + (i % 7) * 1000,
  exerciseMin: 20 + (i % 3) * 10,
  restingHr: 60 - Math.floor(i / 20),
  hrvAvg: 40 + (i % 5),
  hrMax: 150 + (i % 4) * 5,
  vo2Max: 42 + i / 35,
}));

describe("reports", () => {
  describe("buildDashboardArtifacts", () => {
    const artifacts = buildDashboardArtifacts(DAYS, {
      range: { start: "2025-12-31", end: "2026-01-30" },
      generatedAt: "2026-01-31T06:00:00.000Z",
    });

    it("produces documents matching their schemas", () => {
      expect(dailyTrendsArtifactSchema.safeParse(artifacts.daily_trends).success).toBe(true);
      expect(summaryStatsArtifactSchema.safeParse(artifacts.summary_stats).success).toBe(true);
      expect(hrDistributionArtifactSchema.safeParse(artifacts.hr_distribution).success).toBe(true);
      expect(healthScoreArtifactSchema.safeParse(artifacts.health_score).success).toBe(true);
      expect(insightsArtifactSchema.safeParse(artifacts.insights).success).toBe(true);
      expect(personalRecordsArtifactSchema.safeParse(artifacts.personal_records).success).toBe(true);
      expect(dashboardMetadataSchema.safeParse(artifacts.metadata).success).toBe(true);
    });

    it("stamps metadata from the options", () => {
      expect(artifacts.metadata.data_range).toEqual({ start: "2025-12-31", end: "2026-01-30", days_loaded: 20 });
      expect(artifacts.metadata.last_update).toBe("2026-01-20");
    });

    it("scores the weekly averages", () => {
      // last 7 days average 11200 steps, 41 exercise minutes, 11 stand hours
      expect(artifacts.health_score.breakdown).toEqual({
        steps: 28,
        exercise: 34.2,
        stand: 18.3,
        resting_hr: 15,
        hrv: 13.5,
      });
      expect(artifacts.health_score.score).toBe(100);
    });
  });

  describe("generateHealthReport", () => {
    it("produces a deep analysis matching its schema", () => {
      const report = generateHealthReport(STATS);
      expect(deepAnalysisArtifactSchema.safeParse(report).success).toBe(true);
      expect(report.overview).toEqual({ total_days: 70, date_range: { start: "2026-01-01", end: "2026-03-11" } });
      expect(report.recent_vs_previous["steps"]).toBeDefined();
    });

    it("handles an empty history", () => {
      const { report, insights } = buildDeepAnalysisArtifacts([]);
      expect(report.overview.date_range).toEqual({ start: null, end: null });
      expect(deepInsightsArtifactSchema.safeParse(insights).success).toBe(true);
    });
  });

  describe("buildWorkoutArtifacts", () => {
    it("produces workout documents for an empty history", () => {
      const artifacts = buildWorkoutArtifacts([], { today: "2026-03-15", generatedAt: "2026-03-15T08:00:00.000Z" });
      expect(workoutTrendsArtifactSchema.safeParse(artifacts.workout_trends).success).toBe(true);
      expect(artifacts.workout_trends.dates).toHaveLength(30);
      expect(workoutSummaryArtifactSchema.safeParse(artifacts.workout_summary).success).toBe(true);
      expect(muscleGroupsArtifactSchema.safeParse(artifacts.muscle_groups).success).toBe(true);
      expect(exercisePrsArtifactSchema.safeParse(artifacts.exercise_prs).success).toBe(true);
      expect(artifacts.workout_insights.insights.map((i) => i.title)).toEqual(["Start Tracking"]);
    });
  });

  describe("buildWeeklySummaryArtifact", () => {
    const range = { start: "2026-01-14", end: "2026-01-20" };

    it("summarizes the days inside the window", () => {
      const artifact = buildWeeklySummaryArtifact(DAYS, { range, generatedAt: "2026-01-21T08:00:00.000Z" });
      expect(weeklySummaryArtifactSchema.safeParse(artifact).success).toBe(true);
      expect(artifact.days_in_window).toBe(7);
      expect(artifact.days_analyzed).toBe(7);
      expect(artifact.stats["steps"]).toEqual({
        values: [10600, 10800, 11000, 11200, 11400, 11600, 11800],
        avg: 11200,
        min: 10600,
        max: 11800,
        total: 78400,
        count: 7,
      });
      expect(artifact.stats["resting_hr"]).toMatchObject({ avg: 58, total: 406, count: 7 });
      expect(artifact.goal_days).toEqual({
        steps: { met: 7, count: 7 },
        stand_hours: { met: 0, count: 7 },
        exercise_minutes: { met: 7, count: 7 },
      });
    });

    it("reports an empty window without stats", () => {
      const artifact = buildWeeklySummaryArtifact(DAYS, {
        range: { start: "2026-03-01", end: "2026-03-07" },
        generatedAt: "2026-03-08T08:00:00.000Z",
      });
      expect(weeklySummaryArtifactSchema.safeParse(artifact).success).toBe(true);
      expect(artifact).toMatchObject({ days_in_window: 7, days_analyzed: 0, stats: {}, goal_days: {} });
    });
  });

  describe("buildWeeklyWorkoutsArtifact", () => {
    it("lists empty weeks newest first", () => {
      const artifact = buildWeeklyWorkoutsArtifact([], { today: "2026-03-15", generatedAt: "2026-03-15T08:00:00.000Z" });
      expect(weeklyWorkoutsArtifactSchema.safeParse(artifact).success).toBe(true);
      expect(artifact.weeks.map((w) => w.week_start)).toEqual(["2026-03-09", "2026-03-02", "2026-02-23", "2026-02-16"]);
      expect(artifact.weeks[0]).toEqual({
        week_start: "2026-03-09",
        week_end: "2026-03-15",
        workout_count: 0,
        total_volume_kg: 0,
        total_sets: 0,
        avg_duration: 0,
        muscle_groups: [],
      });
    });
  });
});
