/**
 * Deletion guard types
 */

import type { CouchEndpoint } from "../couch/endpoint.js";

export interface ParityCheck {
  database: string;
  sourceDocCount: number;
  targetDocCount: number;
  inParity: boolean;
}

export type DeletionDecision =
  | { authorized: true; parity?: ParityCheck }
  | { authorized: false; reason: string; parity: ParityCheck };

export interface DeletionOutcome {
  database: string;
  forced: boolean;
  parity?: ParityCheck;
}

export interface GuardOptions {
  source: CouchEndpoint;
  target: CouchEndpoint;
}
