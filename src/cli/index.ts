#!/usr/bin/env node

import { ConfigError } from "../core/errors.js";
import { runCli } from "./cli.js";
import { EXIT_CONFIG_ERROR, EXIT_GENERAL_ERROR } from "./exit-codes.js";

runCli().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_GENERAL_ERROR;
});
