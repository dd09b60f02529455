import type { ChalkInstance } from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import type { Ora } from "ora";

import { parseNameList } from "../../batch/selection.js";
import type { SyncConfig, SyncConfigInput } from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";
import { createEventBus } from "../../core/event-bus.js";
import type { EntityType } from "../../core/types.js";
import { type SyncReport, syncRepositories } from "../../sync/sync.js";
import { resolveSyncConfigWithToken } from "../config-loader.js";
import { EXIT_GENERAL_ERROR } from "../exit-codes.js";
import {
  createCliLogger,
  createSpinner,
  createUi,
  getGlobalOptions,
  loadOptionalConfig,
  parseEntityType,
  parseInteger,
} from "../helpers.js";

interface SyncCommandOptions {
  ssh?: boolean;
  dryRun?: boolean;
  workers?: number;
  repos?: string;
  cached?: boolean;
  refreshCache?: boolean;
  includeArchived?: boolean;
  excludeForks?: boolean;
  protocolPolicy?: string;
  baseFolder?: string;
}

const PROTOCOL_POLICIES = ["ask", "switch", "keep"] as const;

export function createSyncCommand(): Command {
  const command = new Command("sync");

  command
    .description("Clone missing repositories and pull existing ones")
    .argument("<entity-type>", "org or user", parseEntityType)
    .argument("<name>", "Organisation or user name")
    .option("--ssh", "Use SSH remote URLs instead of HTTPS")
    .option("--dry-run", "Report what would happen without running git")
    .option("--workers <n>", "Number of repositories processed in parallel", parseInteger)
    .option("--repos <list>", "Comma-separated repository names to sync")
    .option("--cached", "Use the cached repository listing instead of the API")
    .option("--no-refresh-cache", "Do not write the repository cache after fetching")
    .option("--include-archived", "Also sync archived repositories")
    .option("--exclude-forks", "Skip forked repositories")
    .option("--protocol-policy <policy>", "Remote protocol mismatches: ask, switch or keep")
    .option("--base-folder <path>", "Absolute folder that receives the working copies")
    .action(async (entityType: EntityType, name: string, options: SyncCommandOptions, cmd) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const logger = createCliLogger(globalOptions);

      const fileConfig = await loadOptionalConfig(globalOptions.config, globalOptions.verbose, ui);
      const config = resolveSyncConfigWithToken(fileConfig, buildOverrides(options), {
        cached: options.cached,
      });

      const controller = new AbortController();
      const onSigint = (): void => {
        logger.warn("Interrupted: finishing running repositories, skipping the rest");
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      const eventBus = createEventBus();
      const suppressSpinner = globalOptions.json || globalOptions.quiet;
      const progress: { spinner: Ora | null; finished: number } = { spinner: null, finished: 0 };

      // Started lazily so it never draws over the protocol prompt.
      eventBus.on("repo:started", ({ name: repoName, total }) => {
        progress.spinner ??= createSpinner(suppressSpinner, "Syncing repositories...");
        if (progress.spinner) {
          progress.spinner.text = `Syncing ${repoName} (${progress.finished}/${total} done)`;
        }
      });
      const countFinished = (): void => {
        progress.finished += 1;
      };
      eventBus.on("repo:completed", countFinished);
      eventBus.on("repo:failed", countFinished);
      eventBus.on("repo:skipped", countFinished);

      let report: SyncReport;
      try {
        report = await syncRepositories(
          config,
          {
            entityType,
            entityName: name,
            cached: options.cached,
            refreshCache: options.refreshCache,
            signal: controller.signal,
          },
          { eventBus, logger },
        );
      } finally {
        process.off("SIGINT", onSigint);
        progress.spinner?.stop();
      }

      if (globalOptions.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        renderSyncSummary(ui, report, config);
      }

      if (report.result.failed > 0) {
        process.exitCode = EXIT_GENERAL_ERROR;
      }
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ gitfleet sync org my-org --ssh
  $ gitfleet sync user octocat --repos api,web --dry-run
  $ gitfleet sync org my-org --cached --workers 8`,
  );

  return command;
}

function buildOverrides(options: SyncCommandOptions): Partial<SyncConfigInput> {
  const overrides: Partial<SyncConfigInput> = {};
  const filters: NonNullable<SyncConfigInput["filters"]> = {};

  if (options.ssh) {
    overrides.transport = "ssh";
  }
  if (options.dryRun) {
    overrides.dryRun = true;
  }
  if (options.workers !== undefined) {
    overrides.maxWorkers = options.workers;
  }
  if (options.baseFolder !== undefined) {
    overrides.baseFolder = options.baseFolder;
  }
  if (options.protocolPolicy !== undefined) {
    overrides.protocolPolicy = parseProtocolPolicy(options.protocolPolicy);
  }
  if (options.repos !== undefined) {
    filters.names = parseNameList(options.repos);
  }
  if (options.includeArchived) {
    filters.includeArchived = true;
  }
  if (options.excludeForks) {
    filters.includeForks = false;
  }
  if (Object.keys(filters).length > 0) {
    overrides.filters = filters;
  }

  return overrides;
}

function parseProtocolPolicy(value: string): SyncConfig["protocolPolicy"] {
  const normalized = value.trim().toLowerCase();
  for (const policy of PROTOCOL_POLICIES) {
    if (policy === normalized) {
      return policy;
    }
  }
  throw new ConfigError(
    `Unsupported --protocol-policy value "${value}". Use ask, switch or keep.`,
    "CONFIG_INVALID",
  );
}

function renderSyncSummary(ui: ChalkInstance, report: SyncReport, config: SyncConfig): void {
  const { result } = report;
  const label = `${report.entityType} ${report.entityName}`;

  console.log("");
  console.log(
    `${config.dryRun ? "Dry run for" : "Synced"} ${label} from ${report.source}: ` +
      `${ui.green(`${result.processed} processed`)}, ` +
      `${result.failed > 0 ? ui.red(`${result.failed} failed`) : `${result.failed} failed`}, ` +
      `${result.skipped} skipped (${result.total} total)`,
  );

  if (result.cancelled) {
    console.log(ui.yellow("Run was interrupted; repositories not yet started were skipped."));
  }

  if (report.missing.length > 0) {
    console.log(ui.yellow(`Not found: ${report.missing.join(", ")}`));
  }

  const leftAlone = result.outcomes.filter(
    (outcome) => outcome.action === "skipped-dirty" || outcome.action === "skipped-empty",
  );
  if (leftAlone.length > 0) {
    const described = leftAlone.map(
      (outcome) =>
        `${outcome.name} (${outcome.action === "skipped-dirty" ? "uncommitted changes" : "no commits"})`,
    );
    console.log(ui.yellow(`Left unchanged: ${described.join(", ")}`));
  }

  if (result.errors.length === 0) {
    return;
  }

  const table = new Table({
    head: ["Repository", "Code", "Error"],
    colWidths: [30, 24, 80],
    wordWrap: true,
  });

  for (const failure of result.errors) {
    table.push([failure.name, failure.code ?? "--", failure.error]);
  }

  console.log("");
  console.log(table.toString());
}
