/**
 * HTTP module - transport used to talk to both endpoints
 */

export * from "./types.js";
export * from "./client.js";
