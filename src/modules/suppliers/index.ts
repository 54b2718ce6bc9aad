export * from "./constants.js";
export * from "./types.js";
export * from "./supplier.js";
export * from "./catalog.js";
