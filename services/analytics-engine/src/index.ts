export * from "./types.js";
export * from "./rounding.js";
export * from "./statistics.js";
export * from "./dates.js";
export * from "./daily-aggregator.js";
export * from "./workout-aggregator.js";
export * from "./trend-engine.js";
export * from "./records.js";
export * from "./correlation-engine.js";
export * from "./health-score.js";
export * from "./insights.js";
export * from "./reports.js";
