import { describe, expect, it } from "vitest";
import {
  extractAllMetrics,
  hasQuantity,
  metricValues,
  readingHeartRate,
  toQuantity,
} from "./metric-extraction.js";

describe("extractAllMetrics", () => {
  it("reads the list-of-named-metrics shape", () => {
    const metrics = extractAllMetrics({
      data: {
        metrics: [
          { name: "step_count", units: "count", data: [{ qty: 100 }, { qty: "50" }, "bad"] },
          { units: "kcal", data: [] },
        ],
      },
    });
    expect(metrics).toEqual({
      step_count: { units: "count", count: 2, data: [{ qty: 100 }, { qty: "50" }] },
      unknown: { units: "kcal", count: 0, data: [] },
    });
  });

  it("reads the keyed shape", () => {
    const metrics = extractAllMetrics({
      data: {
        metrics: {
          heart_rate: [{ Avg: 70, Min: 60, Max: 90 }],
          vo2_max: { units: "ml/kg/min", data: [{ qty: 45 }] },
          junk: 5,
        },
      },
    });
    expect(metrics).toEqual({
      heart_rate: { units: "", count: 1, data: [{ Avg: 70, Min: 60, Max: 90 }] },
      vo2_max: { units: "ml/kg/min", count: 1, data: [{ qty: 45 }] },
    });
  });

  it("returns null without a metrics envelope", () => {
    expect(extractAllMetrics({})).toBeNull();
    expect(extractAllMetrics({ data: { workouts: [] } })).toBeNull();
    expect(extractAllMetrics("not an export")).toBeNull();
  });
});

describe("toQuantity", () => {
  it("coerces numbers and numeric strings", () => {
    expect(toQuantity(5)).toBe(5);
    expect(toQuantity("7.5")).toBe(7.5);
  });

  it("treats everything else as zero", () => {
    expect(toQuantity("abc")).toBe(0);
    expect(toQuantity("")).toBe(0);
    expect(toQuantity(Number.NaN)).toBe(0);
    expect(toQuantity(Number.POSITIVE_INFINITY)).toBe(0);
    expect(toQuantity(null)).toBe(0);
    expect(toQuantity({ qty: 1 })).toBe(0);
  });
});

describe("readingHeartRate", () => {
  it("prefers Avg over qty", () => {
    expect(readingHeartRate({ Avg: 72, qty: 90 })).toBe(72);
    expect(readingHeartRate({ qty: 90 })).toBe(90);
    expect(readingHeartRate({ Avg: null, qty: 65 })).toBe(65);
  });
});

describe("hasQuantity", () => {
  it("accepts finite numeric quantities including zero", () => {
    expect(hasQuantity({ qty: 0 })).toBe(true);
    expect(hasQuantity({ qty: 72.5 })).toBe(true);
    expect(hasQuantity({ qty: "64" })).toBe(true);
  });

  it("rejects missing, null and non-numeric quantities", () => {
    expect(hasQuantity({ Avg: 70 })).toBe(false);
    expect(hasQuantity({ qty: null })).toBe(false);
    expect(hasQuantity({ qty: "abc" })).toBe(false);
    expect(hasQuantity({ qty: "" })).toBe(false);
    expect(hasQuantity({ qty: Number.NaN })).toBe(false);
  });
});

describe("metricValues", () => {
  const metrics = {
    step_count: { units: "count", count: 3, data: [{ qty: 120 }, { qty: 0 }, { qty: "80" }] },
    heart_rate: { units: "count/min", count: 2, data: [{ Avg: 64, qty: 1 }, { qty: 70 }] },
  };

  it("drops zero readings", () => {
    expect(metricValues(metrics, "step_count")).toEqual([120, 80]);
  });

  it("uses Avg for heart rate", () => {
    expect(metricValues(metrics, "heart_rate")).toEqual([64, 70]);
  });

  it("accepts a custom picker", () => {
    expect(metricValues(metrics, "heart_rate", (r) => toQuantity(r["qty"]))).toEqual([1, 70]);
  });

  it("returns nothing for an absent metric", () => {
    expect(metricValues(metrics, "vo2_max")).toEqual([]);
  });
});
