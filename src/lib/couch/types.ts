/**
 * Types for the document-store HTTP surface
 */

/**
 * Database metadata as returned by `GET /{db}`
 */
export interface RawDatabaseInfo {
  doc_count: number;
  data_size?: number;
  sizes?: {
    active?: number;
    external?: number;
  };
}

export interface DatabaseInfo {
  docCount: number;
  dataSize: number;
}

export interface RawReplicationResult {
  ok?: boolean;
  no_changes?: boolean;
}

export interface ReplicationResult {
  noChanges: boolean;
}

export interface AllDocsResponse {
  rows: { id: string }[];
}

export interface DesignDocument {
  _id: string;
  _rev?: string;
  language?: string;
  views?: Record<string, unknown>;
  filters?: Record<string, string>;
}

export interface ReplicatorEndpoint {
  url: string;
  headers?: Record<string, string>;
}

/**
 * Body of a one-shot `POST /_replicate` request
 */
export interface ReplicationJobDocument {
  continuous: boolean;
  create_target: boolean;
  source: ReplicatorEndpoint;
  target: ReplicatorEndpoint;
  filter?: string;
}

/**
 * Target metadata probe; `missing` when the database does not exist yet
 */
export type DatabaseProbe =
  | { kind: "found"; info: DatabaseInfo }
  | { kind: "missing" }
  | { kind: "error"; status: number; body: unknown };
