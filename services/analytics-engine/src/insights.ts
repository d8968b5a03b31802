/**
 * Insight Generator
 *
 * Prioritized rule lists that turn trends, scores and records into short
 * cards. Each rule checks its own condition; the first triggered cards are
 * kept up to the caller's cap. When no rule triggers, one neutral fallback
 * card is returned.
 */

import {
  GOALS,
  type DeepAnalysisArtifact,
  type Insight,
  type SummaryStatsArtifact,
} from "@health-analytics/contracts";
import { truncate } from "./rounding.js";
import { mean } from "./statistics.js";
import type { DailyAggregate } from "./types.js";

export const MAX_DASHBOARD_INSIGHTS = 4;
export const MAX_DEEP_INSIGHTS = 6;

/** Days of history needed before any dashboard rule runs. */
export const MIN_INSIGHT_DAYS = 7;
/** Days of history needed for the week-over-week step trend. */
export const STEP_TREND_DAYS = 14;
export const STEP_TREND_THRESHOLD_PCT = 10;
export const OUTSTANDING_STEPS = 15000;

export const COLLECTING_DATA: Insight = {
  type: "neutral",
  icon: "📊",
  title: "Collecting Data",
  text: "Keep logging your health data for personalized insights.",
};

export const KEEP_TRACKING: Insight = {
  type: "neutral",
  icon: "📊",
  title: "Keep Tracking",
  text: "Continue logging your health data for personalized insights.",
};

const formatSteps = (steps: number): string => steps.toLocaleString("en-US");

function withFallback(insights: Insight[], cap: number): Insight[] {
  return insights.length > 0 ? insights.slice(0, cap) : [KEEP_TRACKING];
}

/**
 * Weekly dashboard cards, at most four:
 * step trend, perfect step week, exercise week, recent HRV, athletic resting
 * HR and an outstanding step day.
 */
export function generateInsights(
  days: readonly DailyAggregate[],
  stats: SummaryStatsArtifact,
): Insight[] {
  const sorted = [...days].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  if (sorted.length < MIN_INSIGHT_DAYS) return [COLLECTING_DATA];

  const insights: Insight[] = [];
  const recent = sorted.slice(-7);
  const stepsOf = (d: DailyAggregate) => d.totals.steps ?? 0;

  // Step trend: last 7 records against the 7 before them
  if (sorted.length >= STEP_TREND_DAYS) {
    const prior = sorted.slice(-14, -7);
    const priorAvg = mean(prior.map(stepsOf));
    const recentAvg = mean(recent.map(stepsOf));

    if (priorAvg > 0) {
      const change = ((recentAvg - priorAvg) / priorAvg) * 100;
      if (change > STEP_TREND_THRESHOLD_PCT) {
        insights.push({
          type: "positive",
          icon: "📈",
          title: "Steps Trending Up",
          text: `Your step count is up ${truncate(change)}% compared to last week. Keep up the momentum!`,
        });
      } else if (change < -STEP_TREND_THRESHOLD_PCT) {
        insights.push({
          type: "warning",
          icon: "📉",
          title: "Activity Dip Detected",
          text: `Your steps are down ${truncate(Math.abs(change))}% from last week. Try adding a short walk today.`,
        });
      }
    }
  }

  // Perfect week
  const { steps_10k, exercise_30m } = stats.goals;
  const totalDays = steps_10k.total;
  if (steps_10k.achieved >= totalDays) {
    insights.push({
      type: "positive",
      icon: "🏆",
      title: "Perfect Step Week!",
      text: "You hit 10,000 steps every day this week! Amazing consistency.",
    });
  }
  if (exercise_30m.achieved === totalDays) {
    insights.push({
      type: "positive",
      icon: "💪",
      title: "Exercise Champion",
      text: `Full week of ${GOALS.exerciseMinutes}+ minute workouts. Your body thanks you!`,
    });
  }

  // HRV over the last three records
  const recentHrv = recent
    .slice(-3)
    .map((d) => d.readings.hrvAvg ?? 0)
    .filter((h) => h > 0);
  if (recentHrv.length > 0) {
    const avgHrv = mean(recentHrv);
    if (avgHrv >= 50) {
      insights.push({
        type: "positive",
        icon: "💚",
        title: "Great Recovery",
        text: `Your HRV of ${truncate(avgHrv)}ms indicates excellent recovery and low stress.`,
      });
    } else if (avgHrv < 30) {
      insights.push({
        type: "warning",
        icon: "😴",
        title: "Consider Rest",
        text: "Your HRV suggests your body might need more recovery time.",
      });
    }
  }

  // Athletic resting HR; 0 means no reading
  const rhr = stats.averages.resting_hr;
  if (rhr > 0 && rhr < 60) {
    insights.push({
      type: "positive",
      icon: "❤️",
      title: "Athletic Heart Rate",
      text: `Resting HR of ${rhr} bpm is in the athletic range!`,
    });
  }

  // Outstanding day in the last week, first occurrence on ties
  let best: DailyAggregate | undefined;
  for (const day of recent) {
    if (!best || stepsOf(day) > stepsOf(best)) best = day;
  }
  if (best && stepsOf(best) >= OUTSTANDING_STEPS) {
    insights.push({
      type: "positive",
      icon: "⭐",
      title: "Outstanding Activity Day",
      text: `You walked ${formatSteps(stepsOf(best))} steps on ${best.date}!`,
    });
  }

  return withFallback(insights, MAX_DASHBOARD_INSIGHTS);
}

/**
 * Deep-analysis cards, at most six: fitness trajectory, streaks, recent
 * recovery anomalies, period-over-period trends and the steps → HRV link.
 */
export function generateActionableInsights(report: DeepAnalysisArtifact): Insight[] {
  const insights: Insight[] = [];
  const { fitness_trajectory: trajectory, streaks, anomalies, recent_vs_previous: trends } = report;

  if (trajectory.vo2_max?.improving) {
    insights.push({
      type: "positive",
      icon: "🏃",
      title: "VO2 Max Improving",
      text: `Your cardiorespiratory fitness has improved by ${trajectory.vo2_max.change.toFixed(1)} ml/kg/min. Keep up the aerobic training!`,
    });
  }

  if (trajectory.resting_hr?.improving) {
    insights.push({
      type: "positive",
      icon: "❤️",
      title: "Heart Efficiency Improving",
      text: "Your resting heart rate is trending lower, indicating improved cardiovascular efficiency.",
    });
  }

  if (streaks.current_streak >= 7) {
    insights.push({
      type: "positive",
      icon: "🔥",
      title: `${streaks.current_streak}-Day Streak!`,
      text: `You're on a ${streaks.current_streak}-day streak of hitting 10K steps. Your record is ${streaks.longest_step_streak} days!`,
    });
  }

  if (streaks.exercise_consistency >= 0.7) {
    const pct = truncate(streaks.exercise_consistency * 100);
    insights.push({
      type: "positive",
      icon: "💪",
      title: "Exercise Champion",
      text: `You've exercised 30+ minutes on ${pct}% of days. Excellent consistency!`,
    });
  }

  // Low-HRV anomaly in the month of the latest record
  const end = report.overview.date_range.end;
  const lowHrv = anomalies.low_hrv_days ?? [];
  if (end && lowHrv.some(([date]) => date >= end.slice(0, 8))) {
    insights.push({
      type: "warning",
      icon: "⚠️",
      title: "Recovery Alert",
      text: "Your HRV was unusually low recently. Consider extra rest and stress management.",
    });
  }

  const exerciseTrend = trends["exercise_min"];
  if (exerciseTrend && exerciseTrend.pct_change > 20) {
    insights.push({
      type: "positive",
      icon: "📈",
      title: "Exercise Trending Up",
      text: `Your exercise time increased ${exerciseTrend.pct_change.toFixed(0)}% vs last month!`,
    });
  }

  const rhrTrend = trends["resting_hr"];
  if (rhrTrend && rhrTrend.pct_change > 5) {
    insights.push({
      type: "warning",
      icon: "💓",
      title: "Resting HR Elevated",
      text: "Your resting heart rate has increased recently. This could indicate stress, fatigue, or overtraining.",
    });
  }

  // High-step tercile must beat both others outright
  const stepsHrv = report.correlations.steps_to_hrv;
  if (
    stepsHrv
    && stepsHrv.high_steps_hrv > stepsHrv.low_steps_hrv
    && stepsHrv.high_steps_hrv > stepsHrv.medium_steps_hrv
  ) {
    insights.push({
      type: "neutral",
      icon: "👣",
      title: "Steps & Recovery",
      text: "Your data shows higher step counts (12K+) correlate with better next-day HRV. Movement aids recovery!",
    });
  }

  return withFallback(insights, MAX_DEEP_INSIGHTS);
}
