// @paper-courier/shared — article pipeline: sources, enrichment, formatting
export * from "./types.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./keywords.js";
export * from "./sources/index.js";
export * from "./enrich/index.js";
export * from "./format/index.js";
