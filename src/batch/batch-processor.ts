import PQueue from "p-queue";

import { DEFAULT_MAX_WORKERS } from "../core/config.js";
import { describeError, errorCodeOf, toErrorMessage } from "../core/errors.js";
import type { GitfleetEventBus, GitfleetEvents } from "../core/event-bus.js";
import { type Logger, createSilentLogger } from "../core/logger.js";
import type {
  BatchError,
  BatchResult,
  RejectedRepository,
  RepositoryBatch,
  RepositoryOutcome,
  SyncAction,
  Transport,
} from "../core/types.js";
import type { Repository } from "../git/repository.js";

/** The part of GitService a batch needs; tests substitute their own. */
export interface RepositorySyncer {
  cloneOrPull(repo: Repository, transport: Transport): Promise<SyncAction>;
}

/** Returns why a repository should not be attempted, or `null` to process it. */
export type ExclusionFilter = (repo: Repository) => string | null;

export interface BatchProcessorOptions {
  maxWorkers?: number;
  eventBus?: GitfleetEventBus;
  logger?: Logger;
  now?: () => number;
}

export interface ProcessOptions {
  transport: Transport;
  dryRun?: boolean;
  maxWorkers?: number;
  signal?: AbortSignal;
  exclude?: ExclusionFilter;
}

/**
 * Runs clone-or-pull for every repository of a batch on a bounded worker
 * pool. A failing repository is recorded and never affects its siblings.
 */
export class BatchProcessor {
  private readonly maxWorkers: number;
  private readonly eventBus?: GitfleetEventBus;
  private readonly logger: Logger;
  private readonly now: () => number;

  public constructor(
    private readonly syncer: RepositorySyncer,
    options: BatchProcessorOptions = {},
  ) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? DEFAULT_MAX_WORKERS);
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  public async process(
    input: RepositoryBatch | readonly Repository[],
    options: ProcessOptions,
  ): Promise<BatchResult> {
    const repositories = isBatch(input) ? input.repositories : input;
    const rejected = isBatch(input) ? input.rejected : [];
    const slots = layoutSlots(repositories, rejected);
    const total = slots.length;
    const outcomes: Array<RepositoryOutcome | undefined> = new Array(total);

    // Rejected entries never reach a worker; their outcome is known up front.
    slots.forEach((slot, index) => {
      if (slot.kind === "rejected") {
        outcomes[index] = this.finish(index, this.rejectedOutcome(slot.entry));
      }
    });

    const queue = new PQueue({
      concurrency: Math.max(1, options.maxWorkers ?? this.maxWorkers),
    });

    const work = slots.flatMap((slot, index) =>
      slot.kind === "repository" ? [{ repo: slot.repo, index }] : [],
    );
    const settled = await Promise.allSettled(
      work.map(({ repo, index }) =>
        queue.add(async () => {
          outcomes[index] = await this.processOne(repo, index, total, options);
        }),
      ),
    );

    settled.forEach((settlement, position) => {
      const { repo, index } = work[position];
      if (outcomes[index] === undefined) {
        const reason =
          settlement.status === "rejected" ? toErrorMessage(settlement.reason) : "no result";
        outcomes[index] = {
          name: repo.name,
          status: "failed",
          error: `Worker did not report an outcome: ${reason}`,
          durationMs: 0,
        };
      }
    });

    const result = aggregate(outcomes, options.signal?.aborted === true);
    this.notify("batch:completed", (bus) => bus.emit("batch:completed", { result }));
    return result;
  }

  private async processOne(
    repo: Repository,
    index: number,
    total: number,
    options: ProcessOptions,
  ): Promise<RepositoryOutcome> {
    const startedAt = this.now();

    if (options.signal?.aborted) {
      return this.finish(index, {
        name: repo.name,
        status: "skipped",
        reason: "cancelled",
        durationMs: 0,
      });
    }

    let exclusion: string | null;
    try {
      exclusion = options.exclude?.(repo) ?? null;
    } catch (error) {
      return this.finish(index, this.failedOutcome(repo, error, startedAt));
    }

    if (exclusion !== null) {
      return this.finish(index, {
        name: repo.name,
        status: "skipped",
        reason: exclusion,
        durationMs: 0,
      });
    }

    this.notify("repo:started", (bus) => bus.emit("repo:started", { name: repo.name, index, total }));

    if (options.dryRun) {
      return this.finish(index, {
        name: repo.name,
        status: "processed",
        action: "dry-run",
        durationMs: this.now() - startedAt,
      });
    }

    try {
      const action = await this.syncer.cloneOrPull(repo, options.transport);
      return this.finish(index, {
        name: repo.name,
        status: "processed",
        action,
        durationMs: this.now() - startedAt,
      });
    } catch (error) {
      this.logger.debug(`${repo.name} failed: ${describeError(error)}`);
      return this.finish(index, this.failedOutcome(repo, error, startedAt));
    }
  }

  private finish(index: number, outcome: RepositoryOutcome): RepositoryOutcome {
    if (outcome.status === "processed") {
      this.notify("repo:completed", (bus) => bus.emit("repo:completed", { outcome, index }));
    } else if (outcome.status === "failed") {
      this.notify("repo:failed", (bus) => bus.emit("repo:failed", { outcome, index }));
    } else {
      this.notify("repo:skipped", (bus) => bus.emit("repo:skipped", { outcome, index }));
    }
    return outcome;
  }

  private failedOutcome(repo: Repository, error: unknown, startedAt: number): RepositoryOutcome {
    return {
      name: repo.name,
      status: "failed",
      error: describeError(error),
      code: errorCodeOf(error),
      durationMs: this.now() - startedAt,
    };
  }

  private rejectedOutcome(entry: RejectedRepository): RepositoryOutcome {
    return {
      name: entry.name,
      status: "failed",
      error: describeError(entry.error),
      code: errorCodeOf(entry.error),
      durationMs: 0,
    };
  }

  /** Listener failures are logged; they never change a repository's outcome. */
  private notify(event: keyof GitfleetEvents, send: (bus: GitfleetEventBus) => void): void {
    if (!this.eventBus) {
      return;
    }

    try {
      send(this.eventBus);
    } catch (error) {
      this.logger.warn(`Progress listener for ${event} threw: ${toErrorMessage(error)}`);
    }
  }
}

function aggregate(
  slots: ReadonlyArray<RepositoryOutcome | undefined>,
  cancelled: boolean,
): BatchResult {
  const outcomes = slots.filter((outcome): outcome is RepositoryOutcome => outcome !== undefined);
  const errors: BatchError[] = [];
  let processed = 0;
  let failed = 0;
  let skipped = 0;

  for (const outcome of outcomes) {
    if (outcome.status === "processed") {
      processed += 1;
    } else if (outcome.status === "failed") {
      failed += 1;
      errors.push({
        name: outcome.name,
        code: outcome.code,
        error: outcome.error ?? "unknown error",
      });
    } else {
      skipped += 1;
    }
  }

  return {
    total: outcomes.length,
    processed,
    failed,
    skipped,
    errors,
    outcomes,
    cancelled,
  };
}

type Slot =
  | { kind: "repository"; repo: Repository }
  | { kind: "rejected"; entry: RejectedRepository };

/**
 * Interleaves rejected entries back into submission order. An entry whose
 * index lies past the end of the listing goes last.
 */
function layoutSlots(
  repositories: readonly Repository[],
  rejected: readonly RejectedRepository[],
): Slot[] {
  const pending = [...rejected].sort((left, right) => left.index - right.index);
  const slots: Slot[] = [];
  let next = 0;

  while (slots.length < repositories.length + rejected.length) {
    const entry = pending[0];
    if (entry !== undefined && (entry.index <= slots.length || next >= repositories.length)) {
      slots.push({ kind: "rejected", entry });
      pending.shift();
    } else {
      slots.push({ kind: "repository", repo: repositories[next] });
      next += 1;
    }
  }

  return slots;
}

function isBatch(input: RepositoryBatch | readonly Repository[]): input is RepositoryBatch {
  return "repositories" in input;
}
