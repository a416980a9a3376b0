/**
 * Builds the immutable MigrationConfig from CLI options, config file and environment
 */

import { parseConfigFile } from "../cli/config/parser.js";
import type {
  AnyCommandOptions,
  CouchLiftConfigFile,
} from "../cli/config/types.js";
import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_REBUILD_TIMEOUT_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
  DEFAULT_SOURCE_URL,
  DEFAULT_STALL_TIMEOUT_SECONDS,
  DEFAULT_TARGET_URL,
  type Credentials,
  type MigrationConfig,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger, sanitizeUrl } from "./logger.js";

export const PASSWORD_ENV_VAR = "COUCHLIFT_PASSWORD";

export interface LoadConfigInput {
  options: AnyCommandOptions;
  databases?: string[];
  env?: NodeJS.ProcessEnv;
  /** Pre-parsed config file; read from `options.config` when omitted */
  configFile?: CouchLiftConfigFile;
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function resolveCredentials(
  options: AnyCommandOptions,
  file: CouchLiftConfigFile,
  env: NodeJS.ProcessEnv,
): Credentials | undefined {
  const login = options.login ?? file.credentials?.login;
  const explicitPassword = options.password ?? file.credentials?.password;

  if (login === undefined) {
    if (explicitPassword !== undefined) {
      throw new ConfigError("A password was given without a login");
    }
    return undefined;
  }

  const password = explicitPassword ?? env[PASSWORD_ENV_VAR];
  if (password === undefined) {
    throw new ConfigError(
      `Login "${login}" needs a password (--password or ${PASSWORD_ENV_VAR})`,
    );
  }
  return { login, password };
}

function validateUrl(value: string, name: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    throw new ConfigError(`Invalid ${name} URL: ${value}`, undefined, {
      cause: error,
    });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(
      `${name} URL must use http or https, got ${parsed.protocol}`,
    );
  }
  return value;
}

function validatePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Merge configuration with precedence: CLI > config file > environment > defaults
 */
export function loadMigrationConfig(input: LoadConfigInput): MigrationConfig {
  const { options } = input;
  const env = input.env ?? process.env;
  const file =
    input.configFile ??
    (options.config ? parseConfigFile(options.config) : {});

  const credentials = resolveCredentials(options, file, env);

  const config: MigrationConfig = {
    source: {
      url: validateUrl(options.source ?? file.source ?? DEFAULT_SOURCE_URL, "source"),
    },
    target: {
      url: validateUrl(options.target ?? file.target ?? DEFAULT_TARGET_URL, "target"),
    },
    ...(credentials ? { credentials: Object.freeze(credentials) } : {}),
    quiet: options.quiet ?? false,
    requestTimeoutSeconds: validatePositiveInteger(
      options.requestTimeout ??
        file.requestTimeoutSeconds ??
        DEFAULT_REQUEST_TIMEOUT_SECONDS,
      "request timeout",
    ),
    selection: Object.freeze({
      databases: [...(input.databases ?? [])],
      allDbs: options.allDbs ?? false,
      includeSystem: options.includeSystem ?? false,
    }),
    replicate: Object.freeze({
      filterDeleted:
        options.filterDeleted ?? file.replicate?.filterDeleted ?? false,
      stallTimeoutSeconds: validatePositiveInteger(
        options.stallTimeout ??
          file.replicate?.stallTimeoutSeconds ??
          DEFAULT_STALL_TIMEOUT_SECONDS,
        "stall timeout",
      ),
      pollIntervalMs: validatePositiveInteger(
        options.pollInterval ??
          file.replicate?.pollIntervalMs ??
          DEFAULT_POLL_INTERVAL_MS,
        "poll interval",
      ),
    }),
    rebuild: Object.freeze({
      timeoutSeconds: validatePositiveInteger(
        options.timeout ??
          file.rebuild?.timeoutSeconds ??
          DEFAULT_REBUILD_TIMEOUT_SECONDS,
        "rebuild timeout",
      ),
      views: options.views ? splitList(options.views) : [...(file.rebuild?.views ?? [])],
    }),
    delete: Object.freeze({
      force: options.force ?? file.delete?.force ?? false,
    }),
  };

  logger.debug("Migration config loaded", {
    source: sanitizeUrl(config.source.url),
    target: sanitizeUrl(config.target.url),
    authenticated: credentials !== undefined,
    replicate: config.replicate,
    rebuild: config.rebuild,
  });

  return Object.freeze({
    ...config,
    source: Object.freeze(config.source),
    target: Object.freeze(config.target),
  });
}
