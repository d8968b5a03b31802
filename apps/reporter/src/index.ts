import { LocalArtifactStore, type ArtifactStore } from "./artifact-store.js";
import { describeConfig, loadConfig, type ReporterConfig } from "./config.js";
import { runDeepAnalysis } from "./deep-analysis.js";
import { ErrorCode, toErrorBody } from "./errors.js";
import { generateDashboard } from "./generate-dashboard.js";
import { generateWeeklySummary } from "./generate-weekly.js";
import { generateWorkoutDashboard } from "./generate-workouts.js";
import { exitCodeFor, mergeRunResults, type ReportContext, type RunResult } from "./report-run.js";

export * from "./artifact-store.js";
export * from "./config.js";
export * from "./deep-analysis.js";
export * from "./errors.js";
export * from "./export-loader.js";
export * from "./generate-dashboard.js";
export * from "./generate-weekly.js";
export * from "./generate-workouts.js";
export * from "./report-run.js";

export const COMMANDS = ["dashboard", "workouts", "weekly", "deep", "all", "config"] as const;

export type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

const REPORTS = {
  dashboard: generateDashboard,
  workouts: generateWorkoutDashboard,
  weekly: generateWeeklySummary,
  deep: runDeepAnalysis,
} satisfies Record<string, (ctx: ReportContext) => Promise<RunResult>>;

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  rootDir?: string;
  now?: Date;
  store?: ArtifactStore;
}

/** Run one reporter command and return the process exit code. */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const [command = "all"] = argv;
  if (!isCommand(command)) {
    console.error(`[reporter] Unknown command "${command}". Expected one of: ${COMMANDS.join(", ")}`);
    return 1;
  }

  let config: ReporterConfig;
  try {
    config = loadConfig(options.env, options.rootDir);
  } catch (err) {
    const body = toErrorBody(err, ErrorCode.CONFIG_INVALID);
    console.error(`[reporter] ${body.error}`, body.details ?? "");
    return 1;
  }

  if (command === "config") {
    console.log(describeConfig(config));
    return 0;
  }

  const ctx: ReportContext = {
    config,
    store: options.store ?? new LocalArtifactStore(config.dashboardDataPath),
    now: options.now ?? new Date(),
  };
  const selected = command === "all"
    ? [REPORTS.dashboard, REPORTS.workouts, REPORTS.weekly, REPORTS.deep]
    : [REPORTS[command]];

  const results: RunResult[] = [];
  for (const run of selected) {
    results.push(await run(ctx));
  }

  const result = mergeRunResults(...results);
  console.log(`[reporter] ${result.written.length} artifacts written, ${result.failed.length} failed`);
  return exitCodeFor(result);
}
