/**
 * CLI configuration types
 */

/**
 * Configuration file structure (JSON or YAML)
 */
export interface CouchLiftConfigFile {
  source?: string;
  target?: string;
  credentials?: {
    login: string;
    password: string;
  };
  requestTimeoutSeconds?: number;
  replicate?: {
    filterDeleted?: boolean;
    stallTimeoutSeconds?: number;
    pollIntervalMs?: number;
  };
  rebuild?: {
    timeoutSeconds?: number;
    views?: string[];
  };
  delete?: {
    force?: boolean;
  };
}

/**
 * Options shared by every command (from commander)
 */
export interface CommonCommandOptions {
  source?: string;
  target?: string;
  login?: string;
  password?: string;
  requestTimeout?: number;
  config?: string;
  quiet?: boolean;
  logLevel?: string;
}

export interface SelectionCommandOptions extends CommonCommandOptions {
  allDbs?: boolean;
  includeSystem?: boolean;
}

export interface ListCommandOptions extends CommonCommandOptions {
  endpoint?: string;
  includeSystem?: boolean;
}

export interface ReplicateCommandOptions extends SelectionCommandOptions {
  filterDeleted?: boolean;
  stallTimeout?: number;
  pollInterval?: number;
}

export interface RebuildCommandOptions extends SelectionCommandOptions {
  views?: string; // Comma-separated design/view pairs
  timeout?: number;
}

export interface DeleteCommandOptions extends SelectionCommandOptions {
  force?: boolean;
}

/**
 * Union of everything a command may pass to the config loader
 */
export type AnyCommandOptions = CommonCommandOptions &
  Partial<
    Omit<ReplicateCommandOptions, keyof CommonCommandOptions> &
      Omit<RebuildCommandOptions, keyof CommonCommandOptions> &
      Omit<DeleteCommandOptions, keyof CommonCommandOptions>
  >;
