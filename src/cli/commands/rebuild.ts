/**
 * Rebuild command - trigger view index recomputation on the target
 */

import { Command } from "commander";
import { selectDatabases } from "../../lib/catalog/index.js";
import { RebuildCoordinator } from "../../lib/rebuilder/index.js";
import { loadMigrationConfig } from "../../utils/config-loader.js";
import {
  addCommonOptions,
  addSelectionOptions,
  parsePositiveInteger,
} from "../config/options.js";
import type { RebuildCommandOptions } from "../config/types.js";
import {
  createEndpoints,
  defaultDeps,
  runCommand,
  type CommandDeps,
} from "../runner.js";

export async function executeRebuild(
  databases: string[],
  options: RebuildCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  return runCommand("rebuild", options, async () => {
    const config = loadMigrationConfig({ options, databases });
    const { target } = createEndpoints(config, deps.http);
    const selected = await selectDatabases(config.selection, target);

    const coordinator = new RebuildCoordinator({
      endpoint: target,
      timeoutSeconds: config.rebuild.timeoutSeconds,
    });
    const outcomes = await coordinator.rebuild(selected, config.rebuild.views);
    const failed = outcomes.filter((outcome) => outcome.status === "failed");

    return {
      summary: { indexes: outcomes, failed: failed.length },
      exitCode: failed.length > 0 ? 1 : 0,
    };
  });
}

export function createRebuildCommand(): Command {
  const command = new Command("rebuild")
    .description("Trigger a rebuild of every design document's views on the target")
    .option(
      "--views <list>",
      "Only these views, as design/view pairs (comma-separated); needs exactly one database",
    )
    .option(
      "--timeout <seconds>",
      "How long to wait on each view before leaving it to build (default: 5)",
      parsePositiveInteger,
    );

  return addCommonOptions(addSelectionOptions(command)).action(
    async (databases: string[], options: RebuildCommandOptions) => {
      process.exit(await executeRebuild(databases, options));
    },
  );
}
