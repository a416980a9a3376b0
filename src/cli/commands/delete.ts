/**
 * Delete command - remove migrated databases from the source
 */

import { Command } from "commander";
import { selectDatabases } from "../../lib/catalog/index.js";
import { DeletionGuard } from "../../lib/guard/index.js";
import { loadMigrationConfig } from "../../utils/config-loader.js";
import { addCommonOptions, addSelectionOptions } from "../config/options.js";
import type { DeleteCommandOptions } from "../config/types.js";
import {
  createEndpoints,
  defaultDeps,
  runCommand,
  type CommandDeps,
} from "../runner.js";

export async function executeDelete(
  databases: string[],
  options: DeleteCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  return runCommand("delete", options, async () => {
    const config = loadMigrationConfig({ options, databases });
    const { source, target } = createEndpoints(config, deps.http);
    const selected = await selectDatabases(config.selection, source);

    const guard = new DeletionGuard({ source, target });
    const deleted = await guard.deleteDatabases(selected, config.delete.force);

    return { summary: { deleted } };
  });
}

export function createDeleteCommand(): Command {
  const command = new Command("delete")
    .description(
      "Delete databases from the source once the target holds at least as many documents",
    )
    .option("--force", "Delete without comparing doc counts");

  return addCommonOptions(addSelectionOptions(command)).action(
    async (databases: string[], options: DeleteCommandOptions) => {
      process.exit(await executeDelete(databases, options));
    },
  );
}
