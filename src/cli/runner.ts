/**
 * Shared command execution: logging setup, endpoints, JSON summaries, exit codes
 */

import { CouchEndpoint } from "../lib/couch/endpoint.js";
import { createHttpClient, type HttpClient } from "../lib/http/index.js";
import {
  createBarSinkFactory,
  type ProgressSinkFactory,
} from "../lib/progress/index.js";
import type { Sleep } from "../lib/utils/sleep.js";
import type { MigrationConfig } from "../types/config.js";
import { ConfigError, toCouchLiftError } from "../utils/errors.js";
import { isLogLevel, logger } from "../utils/logger.js";
import type { CommonCommandOptions } from "./config/types.js";

export interface CommandDeps {
  http: HttpClient;
  sleep?: Sleep;
  progress?: ProgressSinkFactory;
}

export interface Endpoints {
  source: CouchEndpoint;
  target: CouchEndpoint;
}

export function defaultDeps(): CommandDeps {
  return { http: createHttpClient() };
}

export function createEndpoints(
  config: MigrationConfig,
  http: HttpClient,
): Endpoints {
  const shared = {
    http,
    credentials: config.credentials,
    requestTimeoutMs: config.requestTimeoutSeconds * 1000,
  };
  return {
    source: new CouchEndpoint({ ...shared, url: config.source.url }),
    target: new CouchEndpoint({ ...shared, url: config.target.url }),
  };
}

/**
 * Progress bars unless the run is quiet or the caller supplied its own sinks
 */
export function progressFor(
  config: MigrationConfig,
  deps: CommandDeps,
): ProgressSinkFactory {
  return deps.progress ?? createBarSinkFactory(config.quiet);
}

function applyLogLevel(options: CommonCommandOptions): void {
  if (options.quiet) {
    logger.setLevel("silent");
    return;
  }
  if (options.logLevel === undefined) {
    logger.setLevel("info");
    return;
  }
  if (!isLogLevel(options.logLevel)) {
    throw new ConfigError(`Unknown log level: ${options.logLevel}`);
  }
  logger.setLevel(options.logLevel);
}

export interface CommandResult {
  summary: Record<string, unknown>;
  /** Non-zero when the command finished but some item failed */
  exitCode?: number;
}

/**
 * Run a command body and report it. Resolves to the process exit code.
 */
export async function runCommand(
  phase: string,
  options: CommonCommandOptions,
  body: () => Promise<CommandResult>,
): Promise<number> {
  const startTime = Date.now();

  try {
    applyLogLevel(options);
    const { summary, exitCode = 0 } = await body();

    if (!options.quiet) {
      console.log(
        JSON.stringify(
          {
            status: exitCode === 0 ? "success" : "partial",
            phase,
            ...summary,
            durationMs: Date.now() - startTime,
          },
          null,
          2,
        ),
      );
    }
    return exitCode;
  } catch (error) {
    const liftError = toCouchLiftError(error);
    if (!options.quiet) {
      console.error(JSON.stringify(liftError.toResponse(phase), null, 2));
    }
    return 1;
  }
}
