import { readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import {
  type SyncConfig,
  type SyncConfigInput,
  loadConfig,
  resolveConfigFromEnv,
} from "../core/config.js";
import { isRecord, pathExists } from "../core/utils.js";
import { type ResolvedToken, resolveGitHubToken } from "../github/auth.js";

export const DEFAULT_CONFIG_FILE = "gitfleet.config.json";

export interface ConfigLoaderOptions {
  cwd?: string;
  onWarning?: (message: string) => void;
}

/**
 * Reads a config file (`.json`, or a `.js`/`.mjs` module with a default
 * export). A missing or unreadable file yields `null`.
 */
export async function loadOptionalConfigFile(
  configPath: string,
  options: ConfigLoaderOptions = {},
): Promise<Record<string, unknown> | null> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);
  if (!(await pathExists(absolutePath))) {
    return null;
  }

  try {
    const candidate: unknown =
      extname(absolutePath) === ".json"
        ? JSON.parse(await readFile(absolutePath, "utf8"))
        : await importCandidate(absolutePath);

    if (!isRecord(candidate) || Array.isArray(candidate)) {
      throw new Error("expected an object");
    }
    return candidate;
  } catch (error) {
    options.onWarning?.(
      `Failed to load config at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }
}

/** Environment values, then the config file, then command-line flags. */
export function resolveSyncConfig(
  fileConfig: Record<string, unknown> | null,
  overrides: Partial<SyncConfigInput>,
  env: Record<string, string | undefined> = process.env,
): SyncConfig {
  const merged: Record<string, unknown> = {
    ...resolveConfigFromEnv(env),
    ...(fileConfig ?? {}),
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }
    const existing = merged[key];
    merged[key] =
      isRecord(existing) && isRecord(value) && !Array.isArray(value)
        ? { ...existing, ...value }
        : value;
  }

  return loadConfig(merged, { env });
}

export interface TokenDiscoveryOptions {
  /** A cached run never calls the API, so it does not look for a token. */
  cached?: boolean;
  discover?: () => ResolvedToken | undefined;
  env?: Record<string, string | undefined>;
}

/**
 * `resolveSyncConfig`, then a token from `gh auth token` when none was
 * configured. A discovered token goes through the same validation.
 */
export function resolveSyncConfigWithToken(
  fileConfig: Record<string, unknown> | null,
  overrides: Partial<SyncConfigInput>,
  options: TokenDiscoveryOptions = {},
): SyncConfig {
  const env = options.env ?? process.env;
  const config = resolveSyncConfig(fileConfig, overrides, env);
  if (config.token || options.cached) {
    return config;
  }

  const discovered = options.discover ? options.discover() : resolveGitHubToken(env);
  if (discovered === undefined) {
    return config;
  }
  return resolveSyncConfig(fileConfig, { ...overrides, token: discovered.token }, env);
}

async function importCandidate(absolutePath: string): Promise<unknown> {
  const imported: unknown = await import(`${pathToFileURL(absolutePath).href}?t=${Date.now()}`);
  if (isRecord(imported) && "default" in imported) {
    return imported.default;
  }
  return imported;
}
