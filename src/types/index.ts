// Core re-exports for CouchLift shared types

export * from "./config.js";
