export * from "./pipeline.js";
export * from "./orchestrator.js";
