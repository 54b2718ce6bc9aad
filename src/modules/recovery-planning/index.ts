export * from "./constants.js";
export * from "./types.js";
export * from "./backup-supplier.js";
export * from "./catalog.js";
export * from "./supplier-evaluator.js";
export * from "./recovery-planner.js";
