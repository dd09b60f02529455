import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GitOperationError, PathValidationError } from "../../src/core/errors.js";
import type { Logger } from "../../src/core/logger.js";
import { GitService } from "../../src/git/git-service.js";
import { PathValidator } from "../../src/security/path-validator.js";
import {
  RecordingRunner,
  type Responder,
  createWorkingCopy,
  gitFailure,
  makeInfo,
} from "../helpers/recording-runner.js";

let baseFolder: string;

beforeEach(async () => {
  baseFolder = await realpath(await mkdtemp(join(tmpdir(), "gitfleet-git-")));
});

afterEach(async () => {
  await rm(baseFolder, { recursive: true, force: true });
});

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createService(respond?: Responder, logger: Logger = createLogger()) {
  const runner = new RecordingRunner(respond);
  const service = new GitService(new PathValidator(baseFolder), runner, { logger });
  return { runner, service };
}

/** rev-parse succeeds, status prints `porcelain`, everything else succeeds. */
function workingCopyState(porcelain: string): Responder {
  return (command) => (command[1] === "status" ? { stdout: porcelain } : undefined);
}

async function captureError(run: () => Promise<unknown>): Promise<Error> {
  try {
    await run();
  } catch (error) {
    if (error instanceof Error) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an error");
}

describe("GitService.cloneOrPull", () => {
  it("clones a missing repository with the HTTPS URL and nothing else", async () => {
    const { runner, service } = createService();
    const repo = service.createRepository(makeInfo("api"));

    expect(await service.cloneOrPull(repo, "https")).toBe("cloned");

    expect(runner.calls).toEqual([
      {
        command: ["git", "clone", "https://github.com/acme/api.git", join(baseFolder, "api")],
        cwd: baseFolder,
        timeoutMs: 300_000,
      },
    ]);
  });

  it("clones with the SSH URL when SSH is requested", async () => {
    const { runner, service } = createService();
    const repo = service.createRepository(makeInfo("api"));

    await service.cloneOrPull(repo, "ssh");

    expect(runner.calls.map((call) => call.command)).toEqual([
      ["git", "clone", "git@github.com:acme/api.git", join(baseFolder, "api")],
    ]);
  });

  it("issues only rev-parse for a repository without commits", async () => {
    const path = await createWorkingCopy(baseFolder, "empty");
    const { runner, service } = createService((command) =>
      command[1] === "rev-parse" ? gitFailure(command, "fatal: ambiguous argument 'HEAD'") : undefined,
    );

    const action = await service.cloneOrPull(service.createRepository(makeInfo("empty")), "https");

    expect(action).toBe("skipped-empty");
    expect(runner.calls).toEqual([
      { command: ["git", "rev-parse", "HEAD"], cwd: path, timeoutMs: 10_000 },
    ]);
  });

  it("never checks out or pulls a working copy with uncommitted changes", async () => {
    const path = await createWorkingCopy(baseFolder, "dirty");
    const logger = createLogger();
    const { runner, service } = createService(workingCopyState(" M src/index.ts\n"), logger);

    const action = await service.cloneOrPull(service.createRepository(makeInfo("dirty")), "https");

    expect(action).toBe("skipped-dirty");
    expect(runner.commandsIn(path)).toEqual([
      ["rev-parse", "HEAD"],
      ["status", "--porcelain"],
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      `Skipping pull for dirty: uncommitted changes in ${path}`,
    );
  });

  it("checks out the default branch and then pulls it for a clean working copy", async () => {
    const path = await createWorkingCopy(baseFolder, "web");
    const { runner, service } = createService(workingCopyState(""));
    const repo = service.createRepository(makeInfo("web", { defaultBranch: "develop" }));

    expect(await service.cloneOrPull(repo, "https")).toBe("pulled");

    expect(runner.calls).toEqual([
      { command: ["git", "rev-parse", "HEAD"], cwd: path, timeoutMs: 10_000 },
      { command: ["git", "status", "--porcelain"], cwd: path, timeoutMs: 10_000 },
      { command: ["git", "checkout", "develop"], cwd: path, timeoutMs: 300_000 },
      { command: ["git", "pull", "origin", "develop"], cwd: path, timeoutMs: 300_000 },
    ]);
  });

  it("clones the missing repository and updates the present one", async () => {
    const presentPath = await createWorkingCopy(baseFolder, "present");
    const { runner, service } = createService(workingCopyState(""));
    const fresh = service.createRepository(
      makeInfo("new", { cloneUrl: "https://host/u/new.git" }),
    );
    const present = service.createRepository(makeInfo("present"));

    const actions = [
      await service.cloneOrPull(fresh, "https"),
      await service.cloneOrPull(present, "https"),
    ];

    expect(actions).toEqual(["cloned", "pulled"]);
    expect(runner.calls.filter((call) => call.command[1] === "clone").map((c) => c.command)).toEqual([
      ["git", "clone", "https://host/u/new.git", join(baseFolder, "new")],
    ]);
    expect(
      runner.commandsIn(presentPath).filter(([subcommand]) => subcommand !== "rev-parse" && subcommand !== "status"),
    ).toEqual([
      ["checkout", "main"],
      ["pull", "origin", "main"],
    ]);
  });

  it("surfaces a failing pull as a git error", async () => {
    await createWorkingCopy(baseFolder, "api");
    const { service } = createService((command) =>
      command[1] === "pull" ? gitFailure(command, "fatal: couldn't find remote ref main") : undefined,
    );

    const error = await captureError(() =>
      service.cloneOrPull(service.createRepository(makeInfo("api")), "https"),
    );

    expect(error).toBeInstanceOf(GitOperationError);
    expect(error).toMatchObject({
      code: "GIT_COMMAND_FAILED",
      stderr: "fatal: couldn't find remote ref main",
    });
  });

  it("refuses a default branch that looks like an option", async () => {
    const path = await createWorkingCopy(baseFolder, "api");
    const { runner, service } = createService(workingCopyState(""));
    const repo = service.createRepository(makeInfo("api", { defaultBranch: "--upload-pack=x" }));

    const error = await captureError(() => service.cloneOrPull(repo, "https"));

    expect(error).toMatchObject({ code: "GIT_COMMAND_FORBIDDEN" });
    expect(runner.commandsIn(path).map(([subcommand]) => subcommand)).toEqual([
      "rev-parse",
      "status",
    ]);
  });

  it("refuses a remote URL that looks like an option", async () => {
    const { runner, service } = createService();
    const repo = service.createRepository(makeInfo("api", { cloneUrl: "--upload-pack=x" }));

    const error = await captureError(() => service.cloneOrPull(repo, "https"));

    expect(error).toMatchObject({ code: "GIT_COMMAND_FORBIDDEN" });
    expect(runner.calls).toEqual([]);
  });
});

describe("GitService.pullRepository", () => {
  it("fails when the working copy does not exist", async () => {
    const { runner, service } = createService();

    const error = await captureError(() =>
      service.pullRepository(service.createRepository(makeInfo("ghost"))),
    );

    expect(error).toMatchObject({ code: "GIT_NOT_CLONED" });
    expect(runner.calls).toEqual([]);
  });
});

describe("GitService remote inspection", () => {
  it("classifies the origin URL", async () => {
    const path = await createWorkingCopy(baseFolder, "api");
    const urls = ["git@github.com:acme/api.git", "https://github.com/acme/api.git", "file:///srv/api"];
    const { service } = createService(() => ({ stdout: `${urls.shift() ?? ""}\n` }));

    expect(await service.detectProtocol(path)).toBe("ssh");
    expect(await service.detectProtocol(path)).toBe("https");
    expect(await service.detectProtocol(path)).toBe("unknown");
  });

  it("treats a missing origin as unknown", async () => {
    const path = await createWorkingCopy(baseFolder, "api");
    const { runner, service } = createService((command) =>
      gitFailure(command, "error: No such remote 'origin'"),
    );

    expect(await service.getRemoteUrl(path)).toBeNull();
    expect(await service.detectProtocol(path)).toBe("unknown");
    expect(runner.calls[0]).toEqual({
      command: ["git", "remote", "get-url", "origin"],
      cwd: path,
      timeoutMs: 10_000,
    });
  });

  it("rewrites origin with a metadata timeout", async () => {
    const path = await createWorkingCopy(baseFolder, "api");
    const { runner, service } = createService();

    await service.updateRemoteUrl(path, "git@github.com:acme/api.git");

    expect(runner.calls).toEqual([
      {
        command: ["git", "remote", "set-url", "origin", "git@github.com:acme/api.git"],
        cwd: path,
        timeoutMs: 10_000,
      },
    ]);
  });

  it("refuses to touch paths outside the base folder", async () => {
    const { runner, service } = createService();

    const error = await captureError(() => service.updateRemoteUrl("/etc", "https://x/y.git"));

    expect(error).toBeInstanceOf(PathValidationError);
    expect(runner.calls).toEqual([]);
  });

  it("reports the current branch and working-copy state", async () => {
    const path = await createWorkingCopy(baseFolder, "api");
    const { service } = createService((command) => {
      if (command[2] === "--abbrev-ref") {
        return { stdout: "feature/x\n" };
      }
      return command[1] === "status" ? { stdout: "?? notes.txt\n" } : undefined;
    });

    expect(await service.getCurrentBranch(path)).toBe("feature/x");
    expect(await service.hasUncommittedChanges(path)).toBe(true);
    expect(await service.isRepositoryEmpty(path)).toBe(false);
  });

  it("propagates errors other than a failed rev-parse", async () => {
    const path = await createWorkingCopy(baseFolder, "api");
    const { service } = createService(
      () => new GitOperationError("git rev-parse timed out after 10s.", "GIT_TIMEOUT"),
    );

    const error = await captureError(() => service.isRepositoryEmpty(path));

    expect(error).toMatchObject({ code: "GIT_TIMEOUT" });
  });
});

describe("GitService paths", () => {
  it("creates repositories under the base folder", () => {
    const { service } = createService();

    expect(service.baseFolder).toBe(baseFolder);
    expect(service.createRepository(makeInfo("api")).localPath).toBe(join(baseFolder, "api"));
  });

  it("rejects repository names that would escape the base folder", () => {
    const { service } = createService();

    expect(() => service.getRepositoryPath("../outside")).toThrow(PathValidationError);
  });
});
