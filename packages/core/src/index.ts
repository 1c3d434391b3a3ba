export * from "./catalog.js";
export * from "./config.js";
export * from "./defaults.js";
export * from "./discovery.js";
export * from "./displayProjector.js";
export * from "./enricher.js";
export * from "./errors.js";
export * from "./filterEvaluator.js";
export * from "./logCache.js";
export * from "./logger.js";
export * from "./logSession.js";
export * from "./namedFilters.js";
export * from "./parsers/index.js";
export * from "./parsers/types.js";
export * from "./payloadHistory.js";
export * from "./selection.js";
export * from "./snapshot.js";
export * from "./source.js";
export * from "./tailTracker.js";
export * from "./timeFilter.js";
export * from "./tree/index.js";
export * from "./utils.js";
