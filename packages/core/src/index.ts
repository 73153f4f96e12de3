export * from "./types.js";
export * from "./errors.js";
export * from "./month.js";
export * from "./aggregator.js";
export * from "./normalize.js";
export * from "./pipeline.js";
export * from "./rules/event-classifier.js";
export * from "./rules/project-router.js";
export * from "./rules/url-canonicalizer.js";
