/**
 * Runtime configuration shared by every migration component
 */

export interface Credentials {
  login: string;
  password: string;
}

export interface EndpointConfig {
  url: string;
}

export interface ReplicateSettings {
  filterDeleted: boolean;
  stallTimeoutSeconds: number;
  /** Delay between two target polls; one poll is one stall tick */
  pollIntervalMs: number;
}

export interface RebuildSettings {
  timeoutSeconds: number;
  /** `designDoc/viewName` pairs; only valid for a single database */
  views: string[];
}

export interface DeleteSettings {
  force: boolean;
}

export interface SelectionSettings {
  databases: string[];
  allDbs: boolean;
  includeSystem: boolean;
}

/**
 * Immutable configuration for one invocation
 */
export type MigrationConfig = Readonly<{
  source: Readonly<EndpointConfig>;
  target: Readonly<EndpointConfig>;
  credentials?: Readonly<Credentials>;
  quiet: boolean;
  requestTimeoutSeconds: number;
  selection: Readonly<SelectionSettings>;
  replicate: Readonly<ReplicateSettings>;
  rebuild: Readonly<RebuildSettings>;
  delete: Readonly<DeleteSettings>;
}>;

export const DEFAULT_STALL_TIMEOUT_SECONDS = 300;
export const DEFAULT_REBUILD_TIMEOUT_SECONDS = 5;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 30;
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_SOURCE_URL = "http://127.0.0.1:5986";
export const DEFAULT_TARGET_URL = "http://127.0.0.1:5984";
