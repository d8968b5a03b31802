import path from "node:path";
import { describe, it, expect } from "vitest";
import { describeConfig, loadConfig } from "./config.js";
import { ErrorCode, ReportError } from "./errors.js";

const ROOT = path.resolve("/srv/health");

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("config", () => {
  it("resolves defaults against the repository root", () => {
    const config = loadConfig({}, ROOT);
    expect(config).toEqual({
      rootDir: ROOT,
      healthDataPath: path.join(ROOT, "data"),
      dashboardDataPath: path.join(ROOT, "dashboard", "data"),
      cacheDir: path.join(ROOT, ".cache"),
      lookbackDays: 30,
      workoutCacheFile: path.join(ROOT, ".cache", "workouts.json"),
      exerciseTemplateCacheFile: path.join(ROOT, ".cache", "exercise_templates.json"),
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("applies overrides and derives cache files from the cache dir", () => {
    const cacheDir = path.resolve("/var/cache/health");
    const config = loadConfig(
      { HEALTH_DATA_PATH: "exports", HEALTH_ANALYTICS_CACHE_DIR: cacheDir, DASHBOARD_LOOKBACK_DAYS: "14" },
      ROOT,
    );
    expect(config.healthDataPath).toBe(path.join(ROOT, "exports"));
    expect(config.cacheDir).toBe(cacheDir);
    expect(config.workoutCacheFile).toBe(path.join(cacheDir, "workouts.json"));
    expect(config.lookbackDays).toBe(14);
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ DASHBOARD_DATA_PATH: "  ", DASHBOARD_LOOKBACK_DAYS: "" }, ROOT);
    expect(config.dashboardDataPath).toBe(path.join(ROOT, "dashboard", "data"));
    expect(config.lookbackDays).toBe(30);
  });

  it("rejects a non-positive lookback", () => {
    expect(() => loadConfig({ DASHBOARD_LOOKBACK_DAYS: "0" }, ROOT)).toThrow(ReportError);
    expect(thrownBy(() => loadConfig({ DASHBOARD_LOOKBACK_DAYS: "abc" }, ROOT))).toMatchObject({
      code: ErrorCode.CONFIG_INVALID,
    });
  });

  it("describes the resolved paths", () => {
    const lines = describeConfig(loadConfig({}, ROOT)).split("\n");
    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe(`Health data:        ${path.join(ROOT, "data")}`);
    expect(lines[3]).toBe("Lookback days:      30");
  });
});
