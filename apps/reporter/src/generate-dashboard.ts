import {
  dailyTrendsArtifactSchema,
  dashboardMetadataSchema,
  goalsProgressArtifactSchema,
  healthScoreArtifactSchema,
  hrDistributionArtifactSchema,
  insightsArtifactSchema,
  personalRecordsArtifactSchema,
  summaryStatsArtifactSchema,
  weeklyComparisonArtifactSchema,
} from "@health-analytics/contracts";
import {
  aggregateDays,
  buildDashboardArtifacts,
  formatDay,
  shiftDay,
  type DashboardArtifacts,
} from "@health-analytics/analytics-engine";
import type { ZodTypeAny } from "zod";
import { loadDateRange } from "./export-loader.js";
import { emitArtifacts, type ReportContext, type RunResult } from "./report-run.js";

const DASHBOARD_ARTIFACTS: ReadonlyArray<{ name: keyof DashboardArtifacts; schema: ZodTypeAny }> = [
  { name: "daily_trends", schema: dailyTrendsArtifactSchema },
  { name: "weekly_comparison", schema: weeklyComparisonArtifactSchema },
  { name: "goals_progress", schema: goalsProgressArtifactSchema },
  { name: "summary_stats", schema: summaryStatsArtifactSchema },
  { name: "hr_distribution", schema: hrDistributionArtifactSchema },
  { name: "health_score", schema: healthScoreArtifactSchema },
  { name: "insights", schema: insightsArtifactSchema },
  { name: "personal_records", schema: personalRecordsArtifactSchema },
  { name: "metadata", schema: dashboardMetadataSchema },
];

/** The load window ends yesterday and reaches `lookbackDays` further back. */
export function dashboardRange(today: string, lookbackDays: number): { start: string; end: string } {
  const end = shiftDay(today, -1);
  return { start: shiftDay(end, -lookbackDays), end };
}

export async function generateDashboard(ctx: ReportContext): Promise<RunResult> {
  const range = dashboardRange(formatDay(ctx.now), ctx.config.lookbackDays);
  console.log(`[dashboard] Loading data from ${range.start} to ${range.end}`);

  const days = aggregateDays(loadDateRange(ctx.config.healthDataPath, range.start, range.end));
  console.log(`[dashboard] Loaded ${days.length} days of data`);

  const artifacts = buildDashboardArtifacts(days, { range, generatedAt: ctx.now.toISOString() });
  console.log(`[dashboard] Health score ${artifacts.health_score.score}/100`);

  return emitArtifacts(
    ctx.store,
    DASHBOARD_ARTIFACTS.map(({ name, schema }) => ({ name, schema, build: () => artifacts[name] })),
    "dashboard",
  );
}
