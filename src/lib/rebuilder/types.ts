/**
 * Rebuild coordinator types
 */

import type { CouchEndpoint } from "../couch/endpoint.js";

/**
 * One index per design document: the server recomputes every view of a
 * design document in a single pass.
 */
export interface IndexDefinitionRef {
  databaseName: string;
  designDocName: string;
  oneViewName: string;
}

export type RebuildStatus = "built" | "building" | "skipped" | "failed";

export interface RebuildOutcome {
  database: string;
  designDoc: string;
  view?: string;
  status: RebuildStatus;
  reason?: string;
}

export interface RebuildOptions {
  /** Endpoint whose indexes are rebuilt */
  endpoint: CouchEndpoint;
  timeoutSeconds: number;
}
