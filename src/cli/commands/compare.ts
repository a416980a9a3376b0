/**
 * Compare command - doc-count parity report, source vs target
 */

import { Command } from "commander";
import { selectDatabases } from "../../lib/catalog/index.js";
import { DeletionGuard, type ParityCheck } from "../../lib/guard/index.js";
import { loadMigrationConfig } from "../../utils/config-loader.js";
import { addCommonOptions, addSelectionOptions } from "../config/options.js";
import type { SelectionCommandOptions } from "../config/types.js";
import {
  createEndpoints,
  defaultDeps,
  runCommand,
  type CommandDeps,
} from "../runner.js";

export async function executeCompare(
  databases: string[],
  options: SelectionCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  return runCommand("compare", options, async () => {
    const config = loadMigrationConfig({ options, databases });
    const { source, target } = createEndpoints(config, deps.http);
    const selected = await selectDatabases(config.selection, source);

    const guard = new DeletionGuard({ source, target });
    const parity: ParityCheck[] = [];
    for (const database of selected) {
      parity.push(await guard.checkParity(database));
    }

    return {
      summary: {
        parity,
        inParity: parity.every((check) => check.inParity),
      },
    };
  });
}

export function createCompareCommand(): Command {
  const command = new Command("compare").description(
    "Compare doc counts of each database on source and target",
  );

  return addCommonOptions(addSelectionOptions(command)).action(
    async (databases: string[], options: SelectionCommandOptions) => {
      process.exit(await executeCompare(databases, options));
    },
  );
}
