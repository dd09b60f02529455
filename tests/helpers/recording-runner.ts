import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import { GitOperationError } from "../../src/core/errors.js";
import { createRepositoryInfo } from "../../src/git/repository.js";
import type { RepositoryInfo } from "../../src/core/types.js";
import type {
  CommandResult,
  CommandRunner,
  RunCommandOptions,
} from "../../src/security/subprocess-runner.js";

export interface RecordedCall {
  command: string[];
  cwd?: string;
  timeoutMs: number;
}

/** What a scripted command prints, or the error it fails with. */
export type Responder = (
  command: readonly string[],
  options: RunCommandOptions,
) => { stdout?: string } | Error | undefined;

/** A CommandRunner that records every argument vector and never spawns. */
export class RecordingRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = [];

  public constructor(private readonly respond: Responder = () => undefined) {}

  public async run(command: readonly string[], options: RunCommandOptions): Promise<CommandResult> {
    this.calls.push({ command: [...command], cwd: options.cwd, timeoutMs: options.timeoutMs });

    const response = this.respond(command, options);
    if (response instanceof Error) {
      throw response;
    }

    return { command, exitCode: 0, stdout: response?.stdout ?? "", stderr: "" };
  }

  /** Calls made with `cwd`, as `git` subcommand lists such as `["checkout", "main"]`. */
  public commandsIn(cwd: string): string[][] {
    return this.calls.filter((call) => call.cwd === cwd).map((call) => call.command.slice(1));
  }
}

export function gitFailure(command: readonly string[], stderr: string): GitOperationError {
  return new GitOperationError(`${command.slice(0, 2).join(" ")} failed with exit code 128.`, "GIT_COMMAND_FAILED", {
    command,
    exitCode: 128,
    stderr,
  });
}

export async function createWorkingCopy(baseFolder: string, name: string): Promise<string> {
  const path = join(baseFolder, name);
  await mkdir(join(path, ".git"), { recursive: true });
  return path;
}

export function makeInfo(name: string, overrides: Partial<RepositoryInfo> = {}): RepositoryInfo {
  return createRepositoryInfo({
    name,
    cloneUrl: `https://github.com/acme/${name}.git`,
    sshUrl: `git@github.com:acme/${name}.git`,
    defaultBranch: "main",
    ...overrides,
  });
}
