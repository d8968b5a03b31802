import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ErrorCode, ReportError } from "./errors.js";

const here = path.dirname(fileURLToPath(import.meta.url));

export const REPOSITORY_ROOT = path.resolve(here, "../../..");

export const DEFAULT_LOOKBACK_DAYS = 30;

export function bootstrapEnv() {
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "../../.env"),
    path.resolve(REPOSITORY_ROOT, ".env"),
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return;
  }
}

// Blank variables count as unset.
const optionalPath = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  HEALTH_DATA_PATH: optionalPath,
  DASHBOARD_DATA_PATH: optionalPath,
  HEALTH_ANALYTICS_CACHE_DIR: optionalPath,
  DASHBOARD_LOOKBACK_DAYS: z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value),
    z.coerce.number().int().positive().default(DEFAULT_LOOKBACK_DAYS),
  ),
  WORKOUT_CACHE_FILE: optionalPath,
  EXERCISE_TEMPLATE_CACHE_FILE: optionalPath,
});

export type ReporterConfig = Readonly<{
  rootDir: string;
  healthDataPath: string;
  dashboardDataPath: string;
  cacheDir: string;
  lookbackDays: number;
  workoutCacheFile: string;
  exerciseTemplateCacheFile: string;
}>;

/**
 * Resolve the reporter configuration from environment variables.
 * Relative paths resolve against `rootDir`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  rootDir: string = REPOSITORY_ROOT,
): ReporterConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ReportError(ErrorCode.CONFIG_INVALID, "Invalid reporter configuration", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const vars = parsed.data;
  const resolve = (value: string | undefined, fallback: string) =>
    path.resolve(rootDir, value ?? fallback);
  const cacheDir = resolve(vars.HEALTH_ANALYTICS_CACHE_DIR, ".cache");

  return Object.freeze({
    rootDir,
    healthDataPath: resolve(vars.HEALTH_DATA_PATH, "data"),
    dashboardDataPath: resolve(vars.DASHBOARD_DATA_PATH, path.join("dashboard", "data")),
    cacheDir,
    lookbackDays: vars.DASHBOARD_LOOKBACK_DAYS,
    workoutCacheFile: resolve(vars.WORKOUT_CACHE_FILE, path.join(cacheDir, "workouts.json")),
    exerciseTemplateCacheFile: resolve(
      vars.EXERCISE_TEMPLATE_CACHE_FILE,
      path.join(cacheDir, "exercise_templates.json"),
    ),
  });
}

export function describeConfig(config: ReporterConfig): string {
  return [
    `Health data:        ${config.healthDataPath}`,
    `Dashboard output:   ${config.dashboardDataPath}`,
    `Cache directory:    ${config.cacheDir}`,
    `Lookback days:      ${config.lookbackDays}`,
    `Workout cache:      ${config.workoutCacheFile}`,
    `Exercise templates: ${config.exerciseTemplateCacheFile}`,
  ].join("\n");
}
