export * from "./constants.js";
export * from "./types.js";
export * from "./event.js";
export * from "./schema.js";
export * from "./normalizer.js";
export * from "./aggregator.js";
export * from "./service.js";
export * from "./sources/news-simulation-source.js";
export * from "./sources/weather-simulation-source.js";
export * from "./sources/manual-event-source.js";
