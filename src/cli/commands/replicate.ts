/**
 * Replicate command - copy databases source to target under monitoring
 */

import { Command } from "commander";
import { selectDatabases } from "../../lib/catalog/index.js";
import { ReplicationOrchestrator } from "../../lib/replicator/index.js";
import { loadMigrationConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import {
  addCommonOptions,
  addSelectionOptions,
  parsePositiveInteger,
} from "../config/options.js";
import type { ReplicateCommandOptions } from "../config/types.js";
import {
  createEndpoints,
  defaultDeps,
  progressFor,
  runCommand,
  type CommandDeps,
} from "../runner.js";

export async function executeReplicate(
  databases: string[],
  options: ReplicateCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  return runCommand("replicate", options, async () => {
    const config = loadMigrationConfig({ options, databases });
    const { source, target } = createEndpoints(config, deps.http);
    const selected = await selectDatabases(config.selection, source);

    logger.info("Replicating databases", { count: selected.length });

    const orchestrator = new ReplicationOrchestrator({
      source,
      target,
      config,
      progress: progressFor(config, deps),
      sleep: deps.sleep,
    });
    const outcomes = await orchestrator.replicate(selected);

    return { summary: { databases: outcomes } };
  });
}

export function createReplicateCommand(): Command {
  const command = new Command("replicate")
    .description("Replicate databases from source to target, watching for stalls")
    .option(
      "--filter-deleted",
      "Skip deleted documents via a _design/migrate filter on the source",
    )
    .option(
      "--stall-timeout <seconds>",
      "Give up when the target doc count stops moving for this long (default: 300)",
      parsePositiveInteger,
    )
    .option(
      "--poll-interval <ms>",
      "Delay between two target polls (default: 1000)",
      parsePositiveInteger,
    );

  return addCommonOptions(addSelectionOptions(command)).action(
    async (databases: string[], options: ReplicateCommandOptions) => {
      process.exit(await executeReplicate(databases, options));
    },
  );
}
