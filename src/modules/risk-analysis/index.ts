export * from "./constants.js";
export * from "./types.js";
export * from "./risk.js";
export * from "./assessment.js";
export * from "./impact-analyzer.js";
export * from "./geo-correlator.js";
export * from "./risk-scorer.js";
export * from "./risk-classifier.js";
export * from "./service.js";
