export * from "./metrics.js";
export * from "./types.js";
export * from "./schemas.js";
