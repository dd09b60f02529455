import { isAbsolute, join } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { EntityType } from "./types.js";
import { expandHomePath } from "./utils.js";

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const PREFIXED_TOKEN_PATTERN = /^(ghp|gho|ghu|ghs|ghr)_(.*)$/;
const CLASSIC_TOKEN_BODY = /^[A-Za-z0-9]{36}$/;
const FINE_GRAINED_TOKEN_PATTERN = /^github_pat_[A-Za-z0-9_]{22,}$/;

export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_CACHE_DIRECTORY = ".gitfleet";

/**
 * Returns a reason when `token` cannot be a GitHub token, `null` otherwise.
 * Tokens without a recognised prefix are treated as opaque.
 */
export function tokenFormatProblem(token: string): string | null {
  if (token.length === 0) {
    return "token is empty";
  }

  if (/\s/.test(token)) {
    return "token contains whitespace";
  }

  if (token.startsWith("github_pat_")) {
    return FINE_GRAINED_TOKEN_PATTERN.test(token)
      ? null
      : "fine-grained token (github_pat_) is malformed";
  }

  const prefixed = token.match(PREFIXED_TOKEN_PATTERN);
  if (prefixed) {
    return CLASSIC_TOKEN_BODY.test(prefixed[2])
      ? null
      : `${prefixed[1]}_ token must be followed by 36 alphanumeric characters`;
  }

  return null;
}

export const ApiSchema = z
  .object({
    baseUrl: z.string().url().default("https://api.github.com"),
    perPage: z.number().int().min(1).max(100).default(100),
    maxRetries: z.number().int().min(0).max(10).default(3),
    backoffMs: z.number().int().min(0).default(1_000),
    maxBackoffMs: z.number().int().min(0).default(60_000),
    requestTimeoutMs: z.number().int().positive().default(30_000),
  })
  .strict()
  .default({});

export const GitTimeoutsSchema = z
  .object({
    metadataTimeoutMs: z.number().int().positive().default(10_000),
    cloneTimeoutMs: z.number().int().positive().default(300_000),
    pullTimeoutMs: z.number().int().positive().default(300_000),
  })
  .strict()
  .default({});

export const FiltersSchema = z
  .object({
    names: z.array(z.string().min(1)).default([]),
    includeArchived: z.boolean().default(false),
    includeForks: z.boolean().default(true),
  })
  .strict()
  .default({});

export const SyncConfigSchema = z
  .object({
    token: z
      .string()
      .optional()
      .superRefine((value, ctx) => {
        if (value === undefined) {
          return;
        }
        const problem = tokenFormatProblem(value);
        if (problem) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid token: ${problem}` });
        }
      }),
    baseFolder: z
      .string()
      .min(1)
      .transform(expandHomePath)
      .superRefine((value, ctx) => {
        if (value.includes("\u0000")) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "Base folder contains a null byte",
          });
        } else if (!isAbsolute(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Base folder must be an absolute path, received "${value}"`,
          });
        }
      }),
    transport: z.enum(["ssh", "https"]).default("https"),
    dryRun: z.boolean().default(false),
    maxWorkers: z.number().int().min(1).max(64).default(DEFAULT_MAX_WORKERS),
    cacheFile: z.string().min(1).transform(expandHomePath).optional(),
    protocolPolicy: z.enum(["ask", "switch", "keep"]).default("ask"),
    filters: FiltersSchema,
    api: ApiSchema,
    git: GitTimeoutsSchema,
  })
  .strict();

export type SyncConfig = z.output<typeof SyncConfigSchema>;
export type SyncConfigInput = z.input<typeof SyncConfigSchema>;
export type ProtocolPolicy = SyncConfig["protocolPolicy"];

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
}

export function defineConfig(config: Partial<SyncConfigInput>): Partial<SyncConfigInput> {
  return config;
}

export function interpolateEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
  path: string[] = [],
): string {
  return value.replaceAll(ENV_VAR_PATTERN, (_, variableName: string) => {
    const interpolated = env[variableName];
    if (interpolated !== undefined) {
      return interpolated;
    }

    throw new ConfigError(
      `Environment variable ${variableName} is referenced in config but not set`,
      "CONFIG_SECRET_MISSING",
      {
        context: {
          variableName,
          path: path.length > 0 ? path.join(".") : "<root>",
        },
      },
    );
  });
}

export function loadConfig(config: unknown = {}, options: LoadConfigOptions = {}): SyncConfig {
  const env = options.env ?? process.env;
  const interpolatedConfig = interpolateConfigEnvVars(config, env);
  const parsed = SyncConfigSchema.safeParse(interpolatedConfig);

  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues.map((issue) => ({
    code: issue.code,
    message: issue.message,
    path: issue.path.join("."),
  }));

  throw new ConfigError(
    `Invalid configuration: ${issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ")}`,
    "CONFIG_INVALID",
    { context: { issues } },
  );
}

/**
 * Maps environment variables onto config input. Only variables that are set
 * contribute a key, so the result can be spread under file and flag values.
 */
export function resolveConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<SyncConfigInput> {
  const input: Partial<SyncConfigInput> = {};

  const token = readEnv(env, "GITHUB_TOKEN") ?? readEnv(env, "GH_TOKEN");
  if (token !== undefined) {
    input.token = token;
  }

  const baseFolder = readEnv(env, "GITFLEET_LOCAL_FOLDER") ?? readEnv(env, "LOCAL_FOLDER");
  if (baseFolder !== undefined) {
    input.baseFolder = baseFolder;
  }

  const transport = readEnv(env, "GITFLEET_TRANSPORT");
  if (transport === "ssh" || transport === "https") {
    input.transport = transport;
  } else if (transport !== undefined) {
    throw new ConfigError(
      `GITFLEET_TRANSPORT must be "ssh" or "https", received "${transport}".`,
      "CONFIG_INVALID",
      { context: { variableName: "GITFLEET_TRANSPORT" } },
    );
  }

  const maxWorkers = readEnv(env, "GITFLEET_MAX_WORKERS");
  if (maxWorkers !== undefined) {
    const parsed = Number.parseInt(maxWorkers, 10);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(
        `GITFLEET_MAX_WORKERS must be an integer, received "${maxWorkers}".`,
        "CONFIG_INVALID",
        { context: { variableName: "GITFLEET_MAX_WORKERS" } },
      );
    }
    input.maxWorkers = parsed;
  }

  return input;
}

export function defaultCacheFile(
  config: Pick<SyncConfig, "baseFolder" | "cacheFile">,
  entityType: EntityType,
  entityName: string,
): string {
  if (config.cacheFile) {
    return config.cacheFile;
  }

  const safeName = entityName.toLowerCase().replace(/[^a-z0-9._-]+/g, "_");
  return join(config.baseFolder, DEFAULT_CACHE_DIRECTORY, `${entityType}-${safeName}.json`);
}

function readEnv(env: Record<string, string | undefined>, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function interpolateConfigEnvVars(
  value: unknown,
  env: Record<string, string | undefined>,
  path: string[] = [],
): unknown {
  if (typeof value === "string") {
    return interpolateEnvVars(value, env, path);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateConfigEnvVars(item, env, [...path, `${index}`]));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const interpolatedObject: Record<string, unknown> = {};

  for (const [key, nestedValue] of Object.entries(value)) {
    interpolatedObject[key] = interpolateConfigEnvVars(nestedValue, env, [...path, key]);
  }

  return interpolatedObject;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
