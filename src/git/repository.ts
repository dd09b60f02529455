import { join } from "node:path";

import type { RepositoryInfo } from "../core/types.js";
import { pathExists } from "../core/utils.js";

/**
 * A hosted repository paired with the working-copy path it syncs to.
 *
 * Local state is never cached on the instance: every query goes back to the
 * filesystem, since working copies can change while a batch is running.
 */
export class Repository {
  public constructor(
    public readonly info: RepositoryInfo,
    public readonly localPath: string,
  ) {}

  public get name(): string {
    return this.info.name;
  }

  /** True when the working copy has a `.git` entry. */
  public existsLocally(): Promise<boolean> {
    return pathExists(join(this.localPath, ".git"));
  }
}

export function createRepositoryInfo(
  fields: Pick<RepositoryInfo, "name" | "cloneUrl" | "sshUrl" | "defaultBranch"> &
    Partial<Pick<RepositoryInfo, "private" | "fork" | "archived">>,
): RepositoryInfo {
  return Object.freeze({
    name: fields.name,
    cloneUrl: fields.cloneUrl,
    sshUrl: fields.sshUrl,
    defaultBranch: fields.defaultBranch,
    private: fields.private ?? false,
    fork: fields.fork ?? false,
    archived: fields.archived ?? false,
  });
}
