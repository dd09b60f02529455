import { execa } from "execa";

import { GitOperationError } from "../core/errors.js";
import { redactUrl } from "../core/utils.js";

export interface CommandResult {
  command: readonly string[];
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs: number;
}

/**
 * Runs one argument vector and resolves with its output, or rejects with a
 * `GitOperationError` on a non-zero exit, a timeout or a forbidden command.
 */
export interface CommandRunner {
  run(command: readonly string[], options: RunCommandOptions): Promise<CommandResult>;
}

/** git subcommands (and, where listed, their sub-subcommands) the runner will execute. */
export const ALLOWED_GIT_COMMANDS: Readonly<Record<string, readonly string[] | null>> = {
  clone: null,
  pull: null,
  checkout: null,
  status: null,
  "rev-parse": null,
  remote: ["get-url", "set-url"],
};

export interface SafeSubprocessRunnerOptions {
  /** Extra environment for every child; merged over `process.env`. */
  env?: Record<string, string>;
}

export class SafeSubprocessRunner implements CommandRunner {
  private readonly env: Record<string, string>;

  public constructor(options: SafeSubprocessRunnerOptions = {}) {
    // Credential prompts would otherwise wait on a terminal nobody is watching.
    this.env = { GIT_TERMINAL_PROMPT: "0", ...options.env };
  }

  public async run(command: readonly string[], options: RunCommandOptions): Promise<CommandResult> {
    assertAllowedCommand(command);

    const [file, ...args] = command;
    const display = formatCommand(command);

    const result = await execa(file, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      env: this.env,
      extendEnv: true,
      shell: false,
      stdin: "ignore",
      reject: false,
    });

    const stdout = typeof result.stdout === "string" ? result.stdout : "";
    const stderr = typeof result.stderr === "string" ? result.stderr : "";

    if (result.timedOut) {
      throw new GitOperationError(
        `${display} timed out after ${formatSeconds(options.timeoutMs)}.`,
        "GIT_TIMEOUT",
        { command: redactCommand(command), stderr, context: { cwd: options.cwd } },
      );
    }

    if (result.failed || result.exitCode !== 0) {
      const exitCode = result.exitCode;
      throw new GitOperationError(
        exitCode === undefined
          ? `${display} could not be run: ${result instanceof Error ? result.message : "unknown error"}`
          : `${display} failed with exit code ${String(exitCode)}.`,
        "GIT_COMMAND_FAILED",
        {
          command: redactCommand(command),
          exitCode,
          stderr,
          context: { cwd: options.cwd },
        },
      );
    }

    return { command, exitCode: 0, stdout, stderr };
  }
}

export function assertAllowedCommand(command: readonly string[]): void {
  const [file, subcommand, action] = command;

  if (file !== "git" || subcommand === undefined) {
    throw forbidden(command);
  }

  if (!Object.prototype.hasOwnProperty.call(ALLOWED_GIT_COMMANDS, subcommand)) {
    throw forbidden(command);
  }

  const actions = ALLOWED_GIT_COMMANDS[subcommand];
  if (actions && (action === undefined || !actions.includes(action))) {
    throw forbidden(command);
  }
}

export function formatCommand(command: readonly string[]): string {
  return redactCommand(command).slice(0, 2).join(" ");
}

function forbidden(command: readonly string[]): GitOperationError {
  return new GitOperationError(
    `Refusing to run "${redactCommand(command).join(" ")}": not an allowed git command.`,
    "GIT_COMMAND_FORBIDDEN",
    { command: redactCommand(command) },
  );
}

function redactCommand(command: readonly string[]): string[] {
  return command.map((part) => redactUrl(part));
}

function formatSeconds(ms: number): string {
  return `${String(Math.round(ms / 100) / 10)}s`;
}
