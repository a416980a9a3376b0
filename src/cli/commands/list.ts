/**
 * List command - show the databases of an endpoint, split by naming style
 */

import { Command } from "commander";
import { enumerate } from "../../lib/catalog/index.js";
import { UsageError } from "../../utils/errors.js";
import { loadMigrationConfig } from "../../utils/config-loader.js";
import { addCommonOptions } from "../config/options.js";
import type { ListCommandOptions } from "../config/types.js";
import {
  createEndpoints,
  defaultDeps,
  runCommand,
  type CommandDeps,
} from "../runner.js";

export async function executeList(
  options: ListCommandOptions,
  deps: CommandDeps = defaultDeps(),
): Promise<number> {
  return runCommand("list", options, async () => {
    const which = options.endpoint ?? "source";
    if (which !== "source" && which !== "target") {
      throw new UsageError(`--endpoint must be source or target, got ${which}`);
    }

    const config = loadMigrationConfig({ options });
    const endpoints = createEndpoints(config, deps.http);
    const listing = await enumerate(
      endpoints[which],
      config.selection.includeSystem,
    );

    return {
      summary: {
        endpoint: which,
        local: listing.local.map((record) => record.name),
        clustered: listing.clustered.map((record) => record.name),
      },
    };
  });
}

export function createListCommand(): Command {
  const command = new Command("list")
    .description("List local-style and clustered-style databases of an endpoint")
    .option("--endpoint <which>", "Endpoint to list: source or target", "source")
    .option("--include-system", "Include databases whose name starts with _");

  return addCommonOptions(command).action(async (options: ListCommandOptions) => {
    process.exit(await executeList(options));
  });
}
