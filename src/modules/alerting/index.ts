export * from "./constants.js";
export * from "./types.js";
export * from "./alert-generator.js";
export * from "./service.js";
