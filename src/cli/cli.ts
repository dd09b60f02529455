import { readFileSync } from "node:fs";

import { Command } from "commander";

import { isRecord } from "../core/utils.js";
import { DEFAULT_CONFIG_FILE } from "./config-loader.js";
import { createDoctorCommand } from "./commands/doctor.js";
import { createListCommand } from "./commands/list.js";
import { createSyncCommand } from "./commands/sync.js";

export interface GlobalCliOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  color?: boolean;
}

function registerCommands(program: Command): void {
  program.addCommand(createSyncCommand());
  program.addCommand(createListCommand());
  program.addCommand(createDoctorCommand());
}

export function readPackageVersion(): string {
  try {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
    );
    if (isRecord(manifest) && typeof manifest.version === "string") {
      return manifest.version;
    }
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
  }
  return "0.0.0";
}

export function createCliProgram(): Command {
  const program = new Command();
  program
    .name("gitfleet")
    .description("Clone or update every repository of a GitHub organisation or user")
    .version(readPackageVersion())
    .option("--config <path>", "Config file path", DEFAULT_CONFIG_FILE)
    .option("--verbose", "Enable verbose logging", false)
    .option("--quiet", "Suppress non-error output", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  registerCommands(program);

  program.addHelpText(
    "after",
    `\nGetting Started:\n  $ gitfleet doctor                 Verify your environment is ready\n  $ gitfleet list org my-org        Show the repositories that would be synced\n  $ gitfleet sync org my-org --ssh  Clone or pull all of them over SSH\n`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = createCliProgram();
  await program.parseAsync([...argv]);
}
