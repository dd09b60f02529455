import PQueue from "p-queue";

import { describeError, errorCodeOf } from "../core/errors.js";
import { type Logger, createSilentLogger } from "../core/logger.js";
import type { BatchError, ProtocolMismatch, Transport } from "../core/types.js";
import { redactUrl } from "../core/utils.js";
import type { GitService } from "../git/git-service.js";
import { classifyRemoteUrl, describeMismatch, remoteUrlFor } from "../git/remote-url.js";
import type { Repository } from "../git/repository.js";
import { type ProtocolPrompt, parseProtocolChoice } from "./prompt.js";

const DEFAULT_CONCURRENCY = 4;

export type ProtocolResolutionStatus = "no-mismatch" | "switched" | "kept" | "cancelled" | "dry-run";

export interface ProtocolResolution {
  status: ProtocolResolutionStatus;
  mismatches: ProtocolMismatch[];
  /** Repositories whose `origin` was rewritten. */
  switched: string[];
  /** Remotes that could not be inspected or rewritten. */
  errors: BatchError[];
  message: string;
}

export interface ResolveProtocolOptions {
  dryRun?: boolean;
}

export interface ProtocolHandlerOptions {
  prompt: ProtocolPrompt;
  logger?: Logger;
  concurrency?: number;
}

interface MismatchScan {
  mismatches: ProtocolMismatch[];
  errors: BatchError[];
}

/**
 * Finds working copies whose `origin` uses the other transport and, with the
 * user's consent, rewrites them to the requested one.
 */
export class ProtocolHandler {
  private readonly prompt: ProtocolPrompt;
  private readonly logger: Logger;
  private readonly concurrency: number;

  public constructor(
    private readonly gitService: GitService,
    options: ProtocolHandlerOptions,
  ) {
    this.prompt = options.prompt;
    this.logger = options.logger ?? createSilentLogger();
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  public async findMismatches(
    repositories: readonly Repository[],
    desired: Transport,
  ): Promise<MismatchScan> {
    const queue = new PQueue({ concurrency: this.concurrency });
    const found: Array<ProtocolMismatch | null> = new Array(repositories.length).fill(null);
    const errors: Array<BatchError | null> = new Array(repositories.length).fill(null);

    await Promise.all(
      repositories.map((repo, index) =>
        queue.add(async () => {
          try {
            if (!(await repo.existsLocally())) {
              return;
            }

            const currentUrl = await this.gitService.getRemoteUrl(repo.localPath);
            const detected = classifyRemoteUrl(currentUrl);
            if (currentUrl === null || detected === "unknown" || detected === desired) {
              return;
            }

            found[index] = {
              name: repo.name,
              localPath: repo.localPath,
              currentUrl: redactUrl(currentUrl),
              detected,
            };
            this.logger.debug(`${repo.name}: ${describeMismatch(detected, desired)}`);
          } catch (error) {
            errors[index] = { name: repo.name, code: errorCodeOf(error), error: describeError(error) };
          }
        }),
      ),
    );

    return {
      mismatches: found.filter((entry): entry is ProtocolMismatch => entry !== null),
      errors: errors.filter((entry): entry is BatchError => entry !== null),
    };
  }

  public async resolve(
    repositories: readonly Repository[],
    desired: Transport,
    options: ResolveProtocolOptions = {},
  ): Promise<ProtocolResolution> {
    const scan = await this.findMismatches(repositories, desired);
    for (const failure of scan.errors) {
      this.logger.warn(`Could not inspect the remote of ${failure.name}: ${failure.error}`);
    }

    const label = desired.toUpperCase();
    const { mismatches } = scan;

    if (mismatches.length === 0) {
      return {
        status: "no-mismatch",
        mismatches,
        switched: [],
        errors: scan.errors,
        message: "No action needed: every remote already matches the requested protocol.",
      };
    }

    if (options.dryRun) {
      return {
        status: "dry-run",
        mismatches,
        switched: [],
        errors: scan.errors,
        message: `Dry run: would switch ${mismatches.length} remote(s) to ${label}: ${mismatches.map((m) => m.name).join(", ")}.`,
      };
    }

    const choice = await this.askForChoice(mismatches, desired);
    if (choice === null) {
      return {
        status: "cancelled",
        mismatches,
        switched: [],
        errors: scan.errors,
        message: "Protocol switch cancelled; remotes were left unchanged.",
      };
    }

    if (choice === "keep") {
      return {
        status: "kept",
        mismatches,
        switched: [],
        errors: scan.errors,
        message: `Kept ${mismatches.length} remote(s) on their current protocol.`,
      };
    }

    const byName = new Map(repositories.map((repo) => [repo.name, repo] as const));
    const switched: string[] = [];
    const errors = [...scan.errors];

    for (const mismatch of mismatches) {
      const repo = byName.get(mismatch.name);
      if (!repo) {
        continue;
      }

      try {
        await this.gitService.updateRemoteUrl(repo.localPath, remoteUrlFor(repo.info, desired));
        switched.push(repo.name);
      } catch (error) {
        errors.push({ name: repo.name, code: errorCodeOf(error), error: describeError(error) });
        this.logger.warn(`Could not switch ${repo.name} to ${label}: ${describeError(error)}`);
      }
    }

    return {
      status: "switched",
      mismatches,
      switched,
      errors,
      message: `Switched ${switched.length} of ${mismatches.length} remote(s) to ${label}.`,
    };
  }

  /** Re-asks until the answer is recognised; `null` means cancelled. */
  private async askForChoice(
    mismatches: readonly ProtocolMismatch[],
    desired: Transport,
  ): Promise<"switch" | "keep" | null> {
    let previousAnswer: string | undefined;

    for (let attempt = 1; ; attempt += 1) {
      const answer = await this.prompt({ mismatches, desired, attempt, previousAnswer });
      if (answer === null) {
        return null;
      }

      const choice = parseProtocolChoice(answer);
      if (choice !== null) {
        return choice;
      }

      this.logger.debug(`Unrecognised protocol choice "${answer}"`);
      previousAnswer = answer;
    }
  }
}
