/**
 * Export Loader
 *
 * Reads daily health export files (`HealthAutoExport-YYYY-MM-DD.json`) from
 * the data directory into metric maps keyed by date. A day that is missing,
 * unreadable or carries no metrics is skipped; one bad file never aborts a
 * multi-day load.
 */

import fs from "node:fs";
import path from "node:path";
import type { MetricMap } from "@health-analytics/contracts";
import { dayRange } from "@health-analytics/analytics-engine";
import { extractAllMetrics } from "@health-analytics/importers";
import { ErrorCode, ReportError, type ErrorCodeType } from "./errors.js";

const EXPORT_FILE_PATTERN = /^HealthAutoExport-(\d{4}-\d{2}-\d{2})\.json$/;

export function exportFileName(date: string): string {
  return `HealthAutoExport-${date}.json`;
}

export function parseJsonFile(filePath: string, code: ErrorCodeType = ErrorCode.EXPORT_UNREADABLE): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ReportError(code, `Cannot read ${filePath}`, { cause: String(err) });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ReportError(code, `Invalid JSON in ${filePath}`, { cause: String(err) });
  }
}

/**
 * Read one export file. Returns null when the file holds no metrics.
 * Throws `ReportError` (EXPORT_UNREADABLE) when it cannot be read or parsed.
 */
export function readExport(filePath: string): MetricMap | null {
  const metrics = extractAllMetrics(parseJsonFile(filePath));
  if (!metrics || Object.keys(metrics).length === 0) return null;
  return metrics;
}

function loadDay(filePath: string, date: string, into: Record<string, MetricMap>) {
  try {
    const metrics = readExport(filePath);
    if (!metrics) {
      console.warn(`[export-loader] Skipping ${date}: no metrics in export`);
      return;
    }
    into[date] = metrics;
  } catch (err) {
    if (!(err instanceof ReportError)) throw err;
    console.warn(`[export-loader] Skipping ${date}: ${err.message}`);
  }
}

/** Load every day from `start` to `end` inclusive. Missing days are silently absent. */
export function loadDateRange(dataDir: string, start: string, end: string): Record<string, MetricMap> {
  const byDate: Record<string, MetricMap> = {};
  for (const date of dayRange(start, end)) {
    const filePath = path.join(dataDir, exportFileName(date));
    if (!fs.existsSync(filePath)) continue;
    loadDay(filePath, date, byDate);
  }
  return byDate;
}

/** Load every export file in the directory, in date order. */
export function loadAllExports(dataDir: string): Record<string, MetricMap> {
  if (!fs.existsSync(dataDir)) {
    console.warn(`[export-loader] Data directory not found: ${dataDir}`);
    return {};
  }

  const dated = fs
    .readdirSync(dataDir)
    .flatMap((name) => {
      const match = EXPORT_FILE_PATTERN.exec(name);
      return match?.[1] ? [{ name, date: match[1] }] : [];
    })
    .sort((a, b) => a.date.localeCompare(b.date));

  const byDate: Record<string, MetricMap> = {};
  for (const { name, date } of dated) {
    loadDay(path.join(dataDir, name), date, byDate);
  }
  return byDate;
}
