/**
 * CouchLift: supervised migration of document-store databases from a
 * single-node deployment to a cluster
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/http/index.js";
export * from "./lib/couch/index.js";
export * from "./lib/catalog/index.js";
export * from "./lib/monitor/index.js";
export * from "./lib/replicator/index.js";
export * from "./lib/rebuilder/index.js";
export * from "./lib/guard/index.js";
export * from "./lib/progress/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
