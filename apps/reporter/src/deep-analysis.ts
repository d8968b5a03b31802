import {
  allPersonalRecordsArtifactSchema,
  correlationsArtifactSchema,
  deepAnalysisArtifactSchema,
  deepInsightsArtifactSchema,
  monthlyProgressionArtifactSchema,
  weeklyPatternsArtifactSchema,
} from "@health-analytics/contracts";
import { buildDeepAnalysisArtifacts, computeAllDailyStats } from "@health-analytics/analytics-engine";
import { loadAllExports } from "./export-loader.js";
import { emitArtifacts, type ArtifactJob, type ReportContext, type RunResult } from "./report-run.js";

/** Full-history analysis over every export in the data directory. */
export async function runDeepAnalysis(ctx: ReportContext): Promise<RunResult> {
  const days = computeAllDailyStats(loadAllExports(ctx.config.healthDataPath));
  console.log(`[deep-analysis] Analyzing ${days.length} days of history`);

  const { report, insights } = buildDeepAnalysisArtifacts(days);
  console.log(`[deep-analysis] ${insights.length} insights`);

  const jobs: ArtifactJob[] = [
    { name: "deep_analysis", schema: deepAnalysisArtifactSchema, build: () => report },
    { name: "deep_insights", schema: deepInsightsArtifactSchema, build: () => insights },
    { name: "monthly_progression", schema: monthlyProgressionArtifactSchema, build: () => report.monthly_progression },
    { name: "weekly_patterns", schema: weeklyPatternsArtifactSchema, build: () => report.weekly_patterns },
    { name: "all_personal_records", schema: allPersonalRecordsArtifactSchema, build: () => report.personal_records },
    { name: "correlations", schema: correlationsArtifactSchema, build: () => report.correlations },
  ];
  return emitArtifacts(ctx.store, jobs, "deep-analysis");
}
