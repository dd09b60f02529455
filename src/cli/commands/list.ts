import Table from "cli-table3";
import { Command } from "commander";

import { parseNameList, selectRepositories } from "../../batch/selection.js";
import type { EntityType } from "../../core/types.js";
import { truncate } from "../../core/utils.js";
import { fetchRepositories } from "../../sync/sync.js";
import { resolveSyncConfigWithToken } from "../config-loader.js";
import {
  createCliLogger,
  createSpinner,
  createUi,
  getGlobalOptions,
  loadOptionalConfig,
  parseEntityType,
} from "../helpers.js";

interface ListCommandOptions {
  repos?: string;
  cached?: boolean;
  refreshCache?: boolean;
  baseFolder?: string;
}

export function createListCommand(): Command {
  const command = new Command("list");

  command
    .description("List the repositories of an organisation or user and refresh the cache")
    .argument("<entity-type>", "org or user", parseEntityType)
    .argument("<name>", "Organisation or user name")
    .option("--repos <list>", "Comma-separated repository names to show")
    .option("--cached", "Read the cached repository listing instead of the API")
    .option("--no-refresh-cache", "Do not write the repository cache after fetching")
    .option("--base-folder <path>", "Absolute folder that holds the repository cache")
    .action(async (entityType: EntityType, name: string, options: ListCommandOptions, cmd) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const logger = createCliLogger(globalOptions);

      const fileConfig = await loadOptionalConfig(globalOptions.config, globalOptions.verbose, ui);
      const config = resolveSyncConfigWithToken(
        fileConfig,
        options.baseFolder !== undefined ? { baseFolder: options.baseFolder } : {},
        { cached: options.cached },
      );

      const spinner = createSpinner(
        globalOptions.json || globalOptions.quiet,
        `Listing repositories for ${entityType} ${name}...`,
      );

      const fetched = await fetchRepositories(
        config,
        {
          entityType,
          entityName: name,
          cached: options.cached,
          refreshCache: options.refreshCache,
        },
        { logger },
      ).catch((error: unknown) => {
        spinner?.fail("Listing failed");
        throw error;
      });
      spinner?.succeed(`Found ${fetched.repositories.length} repositories (${fetched.source})`);

      const names = options.repos !== undefined ? parseNameList(options.repos) : config.filters.names;
      const { selected, missing } = selectRepositories(fetched.repositories, names);

      if (globalOptions.json) {
        console.log(
          JSON.stringify(
            { source: fetched.source, cacheFile: fetched.cacheFile, repositories: selected, missing },
            null,
            2,
          ),
        );
        return;
      }

      if (selected.length === 0) {
        console.log(ui.yellow("No repositories found."));
      } else {
        const table = new Table({
          head: ["Repository", "Default branch", "Private", "Fork", "Archived"],
        });

        for (const info of selected) {
          table.push([
            truncate(info.name, 50),
            info.defaultBranch,
            info.private ? "yes" : "",
            info.fork ? "yes" : "",
            info.archived ? "yes" : "",
          ]);
        }

        console.log(table.toString());
      }

      if (missing.length > 0) {
        console.log(ui.yellow(`Not found: ${missing.join(", ")}`));
      }
      if (fetched.source === "api" && options.refreshCache !== false) {
        console.log(ui.blue(`Cache written to ${fetched.cacheFile}`));
      }
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ gitfleet list org my-org
  $ gitfleet list user octocat --json`,
  );

  return command;
}
