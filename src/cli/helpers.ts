import chalk, { Chalk, type ChalkInstance } from "chalk";
import { type Command, InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";

import { createLogger, createSilentLogger, type Logger } from "../core/logger.js";
import { ENTITY_TYPES, type EntityType } from "../core/types.js";
export type { GlobalCliOptions } from "./cli.js";
import type { GlobalCliOptions } from "./cli.js";
import { DEFAULT_CONFIG_FILE, loadOptionalConfigFile } from "./config-loader.js";

// ── Global options ──────────────────────────────────────────

export function getGlobalOptions(command: Command): Required<GlobalCliOptions> {
  const options = command.optsWithGlobals<GlobalCliOptions>();

  return {
    config: options.config ?? DEFAULT_CONFIG_FILE,
    verbose: options.verbose === true,
    quiet: options.quiet === true,
    json: options.json === true,
    color: options.color !== false,
  };
}

// ── UI helpers ──────────────────────────────────────────────

export function createUi(options: Required<GlobalCliOptions>): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  const colorEnabled = options.color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/** JSON output keeps stdout clean, so the logger goes quiet with it. */
export function createCliLogger(options: Required<GlobalCliOptions>): Logger {
  if (options.json) {
    return createSilentLogger();
  }

  return createLogger({ verbose: options.verbose, quiet: options.quiet, color: options.color });
}

/** `null` when output must stay machine-readable or quiet. */
export function createSpinner(suppress: boolean, text: string): Ora | null {
  if (suppress) {
    return null;
  }

  return ora({ text, color: "blue" }).start();
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer but received "${value}".`);
  }

  return Number.parseInt(value, 10);
}

export function parseEntityType(value: string): EntityType {
  const normalized = value.trim().toLowerCase();
  for (const entityType of ENTITY_TYPES) {
    if (entityType === normalized) {
      return entityType;
    }
  }

  throw new InvalidArgumentError(`Allowed choices are ${ENTITY_TYPES.join(", ")}.`);
}

// ── Config helpers ──────────────────────────────────────────

export async function loadOptionalConfig(
  configPath: string,
  verbose: boolean,
  ui: ChalkInstance,
): Promise<Record<string, unknown> | null> {
  return loadOptionalConfigFile(configPath, {
    onWarning: verbose
      ? (message) => {
          console.warn(ui.yellow(`[gitfleet] ${message}`));
        }
      : undefined,
  });
}
