/**
 * Couch module - typed endpoint operations and response schemas
 */

export * from "./types.js";
export * from "./endpoint.js";
export * from "./schemas.js";
