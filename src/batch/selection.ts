import { PathValidationError } from "../core/errors.js";
import type {
  EntityType,
  RejectedRepository,
  RepositoryBatch,
  RepositoryInfo,
} from "../core/types.js";
import type { Repository } from "../git/repository.js";
import type { ExclusionFilter } from "./batch-processor.js";

export interface RepositorySelection {
  selected: RepositoryInfo[];
  /** Requested names that matched nothing in the listing. */
  missing: string[];
}

export interface ExclusionOptions {
  includeArchived: boolean;
  includeForks: boolean;
}

/** Splits a comma list such as `"api, web"` into trimmed, non-empty names. */
export function parseNameList(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Keeps the repositories named in `names` (case-insensitive), in listing
 * order. An empty filter selects everything.
 */
export function selectRepositories(
  repositories: readonly RepositoryInfo[],
  names: readonly string[],
): RepositorySelection {
  if (names.length === 0) {
    return { selected: [...repositories], missing: [] };
  }

  const wanted = new Set(names.map((name) => name.toLowerCase()));
  const selected = repositories.filter((info) => wanted.has(info.name.toLowerCase()));
  const found = new Set(selected.map((info) => info.name.toLowerCase()));
  const missing = names.filter((name) => !found.has(name.toLowerCase()));

  return { selected, missing };
}

export function createExclusionFilter(options: ExclusionOptions): ExclusionFilter {
  return (repo: Repository) => {
    if (!options.includeArchived && repo.info.archived) {
      return "archived";
    }
    if (!options.includeForks && repo.info.fork) {
      return "fork";
    }
    return null;
  };
}

export interface RepositoryFactory {
  createRepository(info: RepositoryInfo): Repository;
}

/**
 * Pairs every listed repository with its working-copy path. Names that cannot
 * become a safe path are kept aside as rejected entries, with their listing
 * position, so the batch reports them as failures in that position.
 */
export function buildBatch(
  repositories: readonly RepositoryInfo[],
  entityType: EntityType,
  entityName: string,
  factory: RepositoryFactory,
): RepositoryBatch {
  const accepted: Repository[] = [];
  const rejected: RejectedRepository[] = [];

  repositories.forEach((info, index) => {
    try {
      accepted.push(factory.createRepository(info));
    } catch (error) {
      if (!(error instanceof PathValidationError)) {
        throw error;
      }
      rejected.push({ name: info.name, error, index });
    }
  });

  return { entityType, entityName, repositories: accepted, rejected };
}
