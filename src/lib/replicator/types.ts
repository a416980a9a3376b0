/**
 * Replication orchestrator types
 */

import type { CouchEndpoint } from "../couch/endpoint.js";
import type { ProgressSinkFactory } from "../progress/index.js";
import type { Sleep } from "../utils/sleep.js";
import type { MigrationConfig } from "../../types/config.js";

export type ReplicationStatus = "completed" | "up-to-date";

export interface ReplicationOutcome {
  database: string;
  status: ReplicationStatus;
  /** Doc count of the source when the monitor started */
  docCount: number;
  polls: number;
  filter?: "created" | "present";
  durationMs: number;
}

export interface ReplicatorDeps {
  source: CouchEndpoint;
  target: CouchEndpoint;
  config: MigrationConfig;
  progress?: ProgressSinkFactory;
  sleep?: Sleep;
}
