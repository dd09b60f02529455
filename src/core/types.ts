import type { Repository } from "../git/repository.js";

export type { Repository };

export type Transport = "ssh" | "https";

/** Result of classifying a remote URL. `unknown` covers "no remote" as well. */
export type DetectedProtocol = Transport | "unknown";

export type EntityType = "org" | "user";

export const ENTITY_TYPES = ["org", "user"] as const satisfies readonly EntityType[];
export const TRANSPORTS = ["ssh", "https"] as const satisfies readonly Transport[];

/**
 * Immutable description of a hosted repository, as returned by the hosting
 * API or read back from the repository cache file.
 */
export interface RepositoryInfo {
  readonly name: string;
  readonly cloneUrl: string;
  readonly sshUrl: string;
  readonly defaultBranch: string;
  readonly private: boolean;
  readonly fork: boolean;
  readonly archived: boolean;
}

export interface RepositoryBatch {
  readonly entityType: EntityType;
  readonly entityName: string;
  readonly repositories: readonly Repository[];
  /** Repositories whose local path could not be derived safely. */
  readonly rejected: readonly RejectedRepository[];
}

export interface RejectedRepository {
  readonly name: string;
  readonly error: Error;
  /** Position in the submitted listing; the outcome is reported in this slot. */
  readonly index: number;
}

export interface ProtocolMismatch {
  readonly name: string;
  readonly localPath: string;
  /** Current remote, with any credentials replaced by `***`. */
  readonly currentUrl: string;
  readonly detected: Transport;
}

export type SyncAction = "cloned" | "pulled" | "skipped-empty" | "skipped-dirty" | "dry-run";

export type RepositoryStatus = "processed" | "failed" | "skipped";

export interface RepositoryOutcome {
  name: string;
  status: RepositoryStatus;
  action?: SyncAction;
  reason?: string;
  error?: string;
  code?: string;
  durationMs: number;
}

export interface BatchError {
  name: string;
  code?: string;
  error: string;
}

/**
 * `processed + failed + skipped === total` holds for every result returned by
 * the batch processor. Dirty and empty working copies count as processed.
 */
export interface BatchResult {
  total: number;
  processed: number;
  failed: number;
  skipped: number;
  errors: BatchError[];
  outcomes: RepositoryOutcome[];
  cancelled: boolean;
}
