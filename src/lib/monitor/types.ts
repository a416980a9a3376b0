/**
 * Replication monitor types
 */

import type { CouchEndpoint } from "../couch/endpoint.js";
import type { ProgressSink } from "../progress/types.js";
import type { Sleep } from "../utils/sleep.js";
import type { CouchLiftError } from "../../utils/errors.js";

/**
 * Mutable per-database polling state
 */
export interface ReplicationProgress {
  /** Source doc count the target has to reach */
  targetDocCount: number;
  observedDocCount: number;
  observedSize: number;
  /** Consecutive polls without a doc-count change */
  stallStreak: number;
  polls: number;
}

export type MonitorResult =
  | { status: "completed"; progress: ReplicationProgress }
  | { status: "stalled"; progress: ReplicationProgress }
  | {
      status: "failed";
      reason: string;
      error: CouchLiftError;
      progress: ReplicationProgress;
    }
  | { status: "cancelled"; progress: ReplicationProgress };

export interface MonitorOptions {
  source: CouchEndpoint;
  target: CouchEndpoint;
  stallTimeoutSeconds: number;
  pollIntervalMs: number;
  progress?: ProgressSink;
  sleep?: Sleep;
}
