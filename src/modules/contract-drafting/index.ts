export * from "./constants.js";
export * from "./types.js";
export * from "./template-engine.js";
export * from "./contract.js";
export * from "./contract-generator.js";
