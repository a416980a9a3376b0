/**
 * Option declarations shared by the CLI commands
 */

import { Command, InvalidArgumentError } from "commander";

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Endpoint, credential and output options every command accepts
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option("--source <url>", "Source (single-node) endpoint URL")
    .option("--target <url>", "Target (clustered) endpoint URL")
    .option("--login <name>", "Login used on both endpoints")
    .option(
      "--password <password>",
      "Password for --login (default: $COUCHLIFT_PASSWORD)",
    )
    .option(
      "--request-timeout <seconds>",
      "Bound for ordinary HTTP requests (default: 30)",
      parsePositiveInteger,
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("-q, --quiet", "Suppress all output; the exit code still reports failure")
    .option(
      "--log-level <level>",
      "Logging verbosity: silent, error, warn, info, debug",
    );
}

/**
 * Program-level options. A `--log-level` given before the subcommand applies
 * unless the subcommand sets its own.
 */
export function addGlobalOptions(program: Command): Command {
  return program
    .option(
      "--log-level <level>",
      "Logging verbosity: silent, error, warn, info, debug",
    )
    .hook("preAction", (_program, actionCommand) => {
      const { logLevel } = program.opts<{ logLevel?: string }>();
      if (
        logLevel !== undefined &&
        actionCommand !== program &&
        actionCommand.getOptionValue("logLevel") === undefined
      ) {
        actionCommand.setOptionValue("logLevel", logLevel);
      }
    });
}

/**
 * Database selection options for commands taking `[databases...]`
 */
export function addSelectionOptions(command: Command): Command {
  return command
    .argument("[databases...]", "Databases to process")
    .option("--all-dbs", "Process every local-style database of the endpoint")
    .option("--include-system", "Include databases whose name starts with _");
}
