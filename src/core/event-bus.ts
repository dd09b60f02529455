import { EventEmitter } from "eventemitter3";

import type { BatchResult, RepositoryOutcome } from "./types.js";

export interface GitfleetEvents {
  "repo:started": { name: string; index: number; total: number };
  "repo:completed": { outcome: RepositoryOutcome; index: number };
  "repo:failed": { outcome: RepositoryOutcome; index: number };
  "repo:skipped": { outcome: RepositoryOutcome; index: number };
  "batch:completed": { result: BatchResult };
}

type GitfleetEventArgs = {
  [K in keyof GitfleetEvents]: [payload: GitfleetEvents[K]];
};

export type GitfleetEventBus = EventEmitter<GitfleetEventArgs>;

export function createEventBus(): GitfleetEventBus {
  return new EventEmitter<GitfleetEventArgs>();
}
