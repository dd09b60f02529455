import type { ChalkInstance } from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import { execa } from "execa";

import { loadConfig, resolveConfigFromEnv, tokenFormatProblem } from "../../core/config.js";
import { toErrorMessage } from "../../core/errors.js";
import { pathExists } from "../../core/utils.js";
import { maskToken, resolveGitHubToken } from "../../github/auth.js";
import { EXIT_GENERAL_ERROR } from "../exit-codes.js";
import { createUi, getGlobalOptions, loadOptionalConfig } from "../helpers.js";

export type DoctorStatus = "pass" | "warn" | "fail";

export interface DoctorCheck {
  id: string;
  name: string;
  requirement: string;
  value: string;
  status: DoctorStatus;
  message?: string;
}

/** Outcome of running an external tool for a check. */
export interface ToolResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure code such as `ENOENT`. */
  errorCode?: string;
  errorMessage?: string;
}

export interface DoctorContext {
  env: Record<string, string | undefined>;
  fileConfig: Record<string, unknown> | null;
  runCommand: (command: string, args: string[]) => Promise<ToolResult>;
}

const MINIMUM_NODE_VERSION = "20.0.0";
const TOOL_TIMEOUT_MS = 30_000;

type CheckOutcome = Pick<DoctorCheck, "value" | "status" | "message">;

function describeCheck(id: string, name: string, requirement: string) {
  return (outcome: CheckOutcome): DoctorCheck => ({ id, name, requirement, ...outcome });
}

export function createDoctorCommand(): Command {
  const command = new Command("doctor");

  command
    .description("Check that git, a GitHub token and the base folder are ready")
    .action(async (_options, cmd) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);

      const fileConfig = await loadOptionalConfig(globalOptions.config, globalOptions.verbose, ui);
      const checks = await runDoctorChecks({ env: process.env, fileConfig, runCommand: runTool });
      const ready = !checks.some((check) => check.status === "fail");

      if (globalOptions.json) {
        console.log(JSON.stringify({ checks, allPassed: ready }, null, 2));
      } else {
        printReport(ui, checks, ready);
      }

      if (!ready) {
        process.exitCode = EXIT_GENERAL_ERROR;
      }
    });

  return command;
}

export async function runDoctorChecks(context: DoctorContext): Promise<DoctorCheck[]> {
  return [
    checkNode(process.versions.node),
    await checkGit(context),
    checkGithubAuth(context),
    await checkBaseFolder(context),
  ];
}

function checkNode(version: string): DoctorCheck {
  const node = describeCheck("node", "Node.js", `>= ${MINIMUM_NODE_VERSION}`);
  const supported = isVersionAtLeast(version, MINIMUM_NODE_VERSION);

  return node({
    value: `v${version}`,
    status: supported ? "pass" : "fail",
    message: supported ? undefined : `Node.js ${MINIMUM_NODE_VERSION}+ is required.`,
  });
}

async function checkGit(context: DoctorContext): Promise<DoctorCheck> {
  const git = describeCheck("git", "git", "installed");
  const result = await context.runCommand("git", ["--version"]);

  if (!result.ok) {
    return git({ value: "--", status: "fail", message: explainToolFailure("git", result) });
  }
  return git({ value: extractVersion(result.stdout) ?? "--", status: "pass" });
}

function checkGithubAuth(context: DoctorContext): DoctorCheck {
  const auth = describeCheck("github-auth", "GitHub auth", "GITHUB_TOKEN, GH_TOKEN or gh auth");
  const resolved = resolveGitHubToken(context.env);

  if (resolved === undefined) {
    return auth({
      value: "--",
      status: "warn",
      message: "No GitHub token found; only public repositories can be listed.",
    });
  }

  const value = `${resolved.source}:${maskToken(resolved.token)}`;
  const problem = tokenFormatProblem(resolved.token);
  return problem
    ? auth({ value, status: "fail", message: `Invalid token: ${problem}` })
    : auth({ value, status: "pass" });
}

async function checkBaseFolder(context: DoctorContext): Promise<DoctorCheck> {
  const folder = describeCheck("base-folder", "Base folder", "absolute path");

  const configured = context.fileConfig?.baseFolder;
  const candidate =
    typeof configured === "string" ? configured : resolveConfigFromEnv(context.env).baseFolder;
  if (candidate === undefined) {
    return folder({
      value: "--",
      status: "fail",
      message:
        "No base folder configured. Set GITFLEET_LOCAL_FOLDER or baseFolder in the config file.",
    });
  }

  let baseFolder: string;
  try {
    ({ baseFolder } = loadConfig({ baseFolder: candidate }, { env: context.env }));
  } catch (error) {
    return folder({ value: "--", status: "fail", message: toErrorMessage(error) });
  }

  if (await pathExists(baseFolder)) {
    return folder({ value: baseFolder, status: "pass" });
  }
  return folder({
    value: baseFolder,
    status: "warn",
    message: "Folder does not exist yet; it will be created by the first sync.",
  });
}

function printReport(ui: ChalkInstance, checks: readonly DoctorCheck[], ready: boolean): void {
  const badge: Record<DoctorStatus, string> = {
    pass: ui.green("ok"),
    warn: ui.yellow("warn"),
    fail: ui.red("fail"),
  };
  const table = new Table({ head: ["Check", "Requirement", "Found", "Status"] });

  for (const check of checks) {
    table.push([check.name, check.requirement, check.value, badge[check.status]]);
  }
  console.log(table.toString());

  for (const check of checks) {
    if (check.message && check.status !== "pass") {
      const paint = check.status === "fail" ? ui.red : ui.yellow;
      console.log(paint(`${check.name}: ${check.message}`));
    }
  }

  console.log(ready ? ui.green("Ready to sync.") : ui.red("Fix the failing checks before syncing."));
}

/** Pulls the first `x.y.z` out of tool output, as `vx.y.z`. */
export function extractVersion(output: string): string | undefined {
  const found = /(\d+)\.(\d+)\.(\d+)/.exec(output);
  return found ? `v${found[1]}.${found[2]}.${found[3]}` : undefined;
}

export function isVersionAtLeast(version: string, minimum: string): boolean {
  const have = toParts(version);
  const need = toParts(minimum);

  for (let index = 0; index < Math.max(have.length, need.length); index += 1) {
    const difference = (have[index] ?? 0) - (need[index] ?? 0);
    if (difference !== 0) {
      return difference > 0;
    }
  }
  return true;
}

function toParts(version: string): number[] {
  return version
    .replace(/^v/, "")
    .split(".")
    .map((part) => Number.parseInt(part, 10) || 0);
}

function explainToolFailure(tool: string, result: ToolResult): string {
  if (result.errorCode === "ENOENT") {
    return `${tool} is not installed or not in PATH.`;
  }

  const stderr = result.stderr.trim();
  return result.errorMessage ?? (stderr || `${tool} exited with code ${String(result.exitCode)}.`);
}

async function runTool(command: string, args: string[]): Promise<ToolResult> {
  const result = await execa(command, args, {
    reject: false,
    timeout: TOOL_TIMEOUT_MS,
    stdin: "ignore",
  });

  // A binary that never started has no exit code.
  if (result instanceof Error && result.exitCode === undefined) {
    return {
      ok: false,
      exitCode: null,
      stdout: "",
      stderr: "",
      errorCode: "code" in result && typeof result.code === "string" ? result.code : undefined,
      errorMessage: result.message,
    };
  }

  return {
    ok: result.exitCode === 0,
    exitCode: result.exitCode ?? null,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}
