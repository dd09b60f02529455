import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import { GitOperationError } from "../core/errors.js";
import { type Logger, createSilentLogger } from "../core/logger.js";
import type { DetectedProtocol, RepositoryInfo, SyncAction, Transport } from "../core/types.js";
import { pathExists, redactUrl } from "../core/utils.js";
import type { PathValidator } from "../security/path-validator.js";
import type { CommandResult, CommandRunner } from "../security/subprocess-runner.js";
import { Repository } from "./repository.js";
import { classifyRemoteUrl, remoteUrlFor } from "./remote-url.js";

export const METADATA_TIMEOUT_MS = 10_000;
export const CLONE_TIMEOUT_MS = 300_000;
export const PULL_TIMEOUT_MS = 300_000;

/**
 * Allowed characters in branch names.
 * Prevents injection of arbitrary git arguments or path traversal.
 */
const SAFE_BRANCH_RE = /^[a-zA-Z0-9/_.-]+$/;

export interface GitServiceOptions {
  metadataTimeoutMs?: number;
  cloneTimeoutMs?: number;
  pullTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Clone, pull and remote inspection for working copies under one base
 * folder. Every path goes through the PathValidator and every git call goes
 * through the injected CommandRunner.
 */
export class GitService {
  private readonly metadataTimeoutMs: number;
  private readonly cloneTimeoutMs: number;
  private readonly pullTimeoutMs: number;
  private readonly logger: Logger;

  public constructor(
    private readonly pathValidator: PathValidator,
    private readonly runner: CommandRunner,
    options: GitServiceOptions = {},
  ) {
    this.metadataTimeoutMs = options.metadataTimeoutMs ?? METADATA_TIMEOUT_MS;
    this.cloneTimeoutMs = options.cloneTimeoutMs ?? CLONE_TIMEOUT_MS;
    this.pullTimeoutMs = options.pullTimeoutMs ?? PULL_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  public get baseFolder(): string {
    return this.pathValidator.baseDirectory;
  }

  public getRepositoryPath(name: string): string {
    return this.pathValidator.resolveRepositoryPath(name);
  }

  public createRepository(info: RepositoryInfo): Repository {
    return new Repository(info, this.getRepositoryPath(info.name));
  }

  /** `origin`'s URL, or `null` when the working copy has no such remote. */
  public async getRemoteUrl(path: string): Promise<string | null> {
    try {
      const result = await this.git(["remote", "get-url", "origin"], path, this.metadataTimeoutMs);
      const url = result.stdout.trim();
      return url.length > 0 ? url : null;
    } catch (error) {
      if (error instanceof GitOperationError && error.code === "GIT_COMMAND_FAILED") {
        return null;
      }
      throw error;
    }
  }

  public async detectProtocol(path: string): Promise<DetectedProtocol> {
    return classifyRemoteUrl(await this.getRemoteUrl(path));
  }

  public async hasUncommittedChanges(path: string): Promise<boolean> {
    const result = await this.git(["status", "--porcelain"], path, this.metadataTimeoutMs);
    return result.stdout.trim().length > 0;
  }

  /** An empty repository has no commit for `HEAD` to resolve to. */
  public async isRepositoryEmpty(path: string): Promise<boolean> {
    try {
      await this.git(["rev-parse", "HEAD"], path, this.metadataTimeoutMs);
      return false;
    } catch (error) {
      if (error instanceof GitOperationError && error.code === "GIT_COMMAND_FAILED") {
        return true;
      }
      throw error;
    }
  }

  public async getCurrentBranch(path: string): Promise<string> {
    const result = await this.git(
      ["rev-parse", "--abbrev-ref", "HEAD"],
      path,
      this.metadataTimeoutMs,
    );
    return result.stdout.trim();
  }

  public async cloneRepository(repo: Repository, transport: Transport): Promise<void> {
    const localPath = this.pathValidator.validatePath(repo.localPath);
    const url = assertSafeRemoteUrl(remoteUrlFor(repo.info, transport), repo.name);
    const parent = dirname(localPath);

    await mkdir(parent, { recursive: true });
    this.logger.debug(`Cloning ${repo.name} from ${redactUrl(url)}`);
    await this.runner.run(["git", "clone", url, localPath], {
      cwd: parent,
      timeoutMs: this.cloneTimeoutMs,
    });
  }

  /**
   * Brings an existing working copy up to date with its default branch.
   * Empty repositories and working copies with uncommitted changes are left
   * alone and reported through the returned action.
   */
  public async pullRepository(repo: Repository): Promise<SyncAction> {
    const localPath = this.pathValidator.validatePath(repo.localPath);
    if (!(await pathExists(localPath))) {
      throw new GitOperationError(
        `Cannot pull "${repo.name}": ${localPath} does not exist.`,
        "GIT_NOT_CLONED",
        { context: { repository: repo.name, localPath } },
      );
    }

    if (await this.isRepositoryEmpty(localPath)) {
      this.logger.debug(`Skipping ${repo.name}: repository has no commits yet`);
      return "skipped-empty";
    }

    if (await this.hasUncommittedChanges(localPath)) {
      this.logger.warn(`Skipping pull for ${repo.name}: uncommitted changes in ${localPath}`);
      return "skipped-dirty";
    }

    const branch = assertSafeBranch(repo.info.defaultBranch, repo.name);
    await this.git(["checkout", branch], localPath, this.pullTimeoutMs);
    await this.git(["pull", "origin", branch], localPath, this.pullTimeoutMs);
    return "pulled";
  }

  public async updateRemoteUrl(path: string, newUrl: string): Promise<void> {
    const localPath = this.pathValidator.validatePath(path);
    const url = assertSafeRemoteUrl(newUrl, localPath);
    await this.git(["remote", "set-url", "origin", url], localPath, this.metadataTimeoutMs);
  }

  /**
   * Decides between clone, pull and skip from the working copy's current
   * state. Nothing is remembered between calls.
   */
  public async cloneOrPull(repo: Repository, transport: Transport): Promise<SyncAction> {
    if (!(await repo.existsLocally())) {
      await this.cloneRepository(repo, transport);
      return "cloned";
    }

    return this.pullRepository(repo);
  }

  private git(args: string[], cwd: string, timeoutMs: number): Promise<CommandResult> {
    return this.runner.run(["git", ...args], {
      cwd: this.pathValidator.validatePath(cwd),
      timeoutMs,
    });
  }
}

function assertSafeBranch(branch: string, repository: string): string {
  if (!SAFE_BRANCH_RE.test(branch) || branch.startsWith("-") || branch.includes("..")) {
    throw new GitOperationError(
      `Invalid default branch name "${branch}" for ${repository}.`,
      "GIT_COMMAND_FORBIDDEN",
      { context: { repository, branch } },
    );
  }
  return branch;
}

function assertSafeRemoteUrl(url: string, subject: string): string {
  const trimmed = url.trim();
  if (trimmed.length === 0 || trimmed.startsWith("-")) {
    throw new GitOperationError(
      `Invalid remote URL "${redactUrl(url)}" for ${subject}.`,
      "GIT_COMMAND_FORBIDDEN",
      { context: { subject } },
    );
  }
  return trimmed;
}
