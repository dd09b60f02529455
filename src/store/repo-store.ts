import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { CacheError } from "../core/errors.js";
import type { RepositoryInfo } from "../core/types.js";
import { expandHomePath, pathExists } from "../core/utils.js";
import { createRepositoryInfo } from "../git/repository.js";

/** One entry of the cache file; keys follow the hosting API's snake_case. */
export const CachedRepositorySchema = z.object({
  name: z.string().min(1),
  clone_url: z.string(),
  ssh_url: z.string(),
  default_branch: z.string().min(1),
  private: z.boolean().default(false),
  fork: z.boolean().default(false),
  archived: z.boolean().default(false),
});

export const RepositoryCacheFileSchema = z.array(CachedRepositorySchema);

export type CachedRepository = z.output<typeof CachedRepositorySchema>;

/**
 * The repository listing cache: a JSON array written wholesale after a fetch
 * and read wholesale at the start of a cached run.
 */
export class RepoStore {
  public readonly filePath: string;

  public constructor(filePath: string) {
    this.filePath = expandHomePath(filePath);
  }

  public exists(): Promise<boolean> {
    return pathExists(this.filePath);
  }

  public async load(): Promise<RepositoryInfo[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isFileNotFoundError(error)) {
        throw new CacheError(`Repository cache not found: ${this.filePath}`, "CACHE_NOT_FOUND", {
          context: { filePath: this.filePath },
          cause: error,
        });
      }
      throw error;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new CacheError(
        `Repository cache ${this.filePath} is not valid JSON.`,
        "CACHE_CORRUPT",
        { context: { filePath: this.filePath }, cause: error },
      );
    }

    const parsed = RepositoryCacheFileSchema.safeParse(payload);
    if (!parsed.success) {
      const firstIssue = parsed.error.issues[0];
      throw new CacheError(
        `Repository cache ${this.filePath} has an unexpected shape${firstIssue ? ` at ${firstIssue.path.join(".") || "<root>"}: ${firstIssue.message}` : ""}.`,
        "CACHE_CORRUPT",
        { context: { filePath: this.filePath } },
      );
    }

    return parsed.data.map(fromCachedRepository);
  }

  public async save(repositories: readonly RepositoryInfo[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    const payload = repositories.map(toCachedRepository);
    await writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await rename(tempPath, this.filePath);
  }
}

export function toCachedRepository(info: RepositoryInfo): CachedRepository {
  return {
    name: info.name,
    clone_url: info.cloneUrl,
    ssh_url: info.sshUrl,
    default_branch: info.defaultBranch,
    private: info.private,
    fork: info.fork,
    archived: info.archived,
  };
}

function fromCachedRepository(entry: CachedRepository): RepositoryInfo {
  return createRepositoryInfo({
    name: entry.name,
    cloneUrl: entry.clone_url,
    sshUrl: entry.ssh_url,
    defaultBranch: entry.default_branch,
    private: entry.private,
    fork: entry.fork,
    archived: entry.archived,
  });
}

function isFileNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
