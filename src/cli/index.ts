#!/usr/bin/env node

/**
 * CouchLift CLI - supervised migration from a single-node store to a cluster
 */

import { Command } from "commander";
import { createListCommand } from "./commands/list.js";
import { createReplicateCommand } from "./commands/replicate.js";
import { createRebuildCommand } from "./commands/rebuild.js";
import { createDeleteCommand } from "./commands/delete.js";
import { createCompareCommand } from "./commands/compare.js";
import { addGlobalOptions } from "./config/options.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "couchlift",
  version: "0.1.0",
  description:
    "Migrate databases from a single-node document store to a clustered deployment",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  addGlobalOptions(
    program.name(pkg.name).description(pkg.description).version(pkg.version),
  );

  program.addCommand(createListCommand());
  program.addCommand(createReplicateCommand());
  program.addCommand(createRebuildCommand());
  program.addCommand(createDeleteCommand());
  program.addCommand(createCompareCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
