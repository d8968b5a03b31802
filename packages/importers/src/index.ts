export * from "./metric-extraction.js";
export * from "./muscle-groups.js";
export * from "./workout-importer.js";
