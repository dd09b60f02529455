import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CacheError } from "../../src/core/errors.js";
import { createRepositoryInfo } from "../../src/git/repository.js";
import { RepoStore } from "../../src/store/repo-store.js";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "gitfleet-store-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

async function captureCacheError(run: () => Promise<unknown>): Promise<CacheError> {
  try {
    await run();
  } catch (error) {
    if (error instanceof CacheError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a CacheError");
}

const api = createRepositoryInfo({
  name: "api",
  cloneUrl: "https://github.com/acme/api.git",
  sshUrl: "git@github.com:acme/api.git",
  defaultBranch: "main",
  private: true,
});

describe("RepoStore", () => {
  it("writes the listing as a snake_case JSON array and reads it back", async () => {
    const store = new RepoStore(join(workDir, "nested", "org-acme.json"));

    await store.save([api]);

    const written = await readFile(store.filePath, "utf8");
    expect(JSON.parse(written)).toEqual([
      {
        name: "api",
        clone_url: "https://github.com/acme/api.git",
        ssh_url: "git@github.com:acme/api.git",
        default_branch: "main",
        private: true,
        fork: false,
        archived: false,
      },
    ]);
    expect(written.endsWith("]\n")).toBe(true);
    expect(await store.load()).toEqual([api]);
  });

  it("replaces the previous listing wholesale", async () => {
    const store = new RepoStore(join(workDir, "cache.json"));
    await store.save([api]);

    await store.save([]);

    expect(await store.load()).toEqual([]);
    expect(await store.exists()).toBe(true);
  });

  it("fails with CACHE_NOT_FOUND when the file is missing", async () => {
    const store = new RepoStore(join(workDir, "missing.json"));

    const error = await captureCacheError(() => store.load());

    expect(await store.exists()).toBe(false);
    expect(error.code).toBe("CACHE_NOT_FOUND");
    expect(error.message).toBe(`Repository cache not found: ${store.filePath}`);
  });

  it("fails with CACHE_CORRUPT on invalid JSON", async () => {
    const filePath = join(workDir, "broken.json");
    await writeFile(filePath, "[{", "utf8");

    const error = await captureCacheError(() => new RepoStore(filePath).load());

    expect(error.code).toBe("CACHE_CORRUPT");
    expect(error.message).toBe(`Repository cache ${filePath} is not valid JSON.`);
  });

  it("fails with CACHE_CORRUPT when an entry has the wrong shape", async () => {
    const filePath = join(workDir, "shape.json");
    await writeFile(filePath, JSON.stringify([{ name: "api" }]), "utf8");

    const error = await captureCacheError(() => new RepoStore(filePath).load());

    expect(error.code).toBe("CACHE_CORRUPT");
    expect(error.message).toBe(
      `Repository cache ${filePath} has an unexpected shape at 0.clone_url: Required.`,
    );
  });

  it("defaults missing flags and drops unknown keys", async () => {
    const filePath = join(workDir, "legacy.json");
    await writeFile(
      filePath,
      JSON.stringify([
        {
          name: "web",
          clone_url: "https://github.com/acme/web.git",
          ssh_url: "git@github.com:acme/web.git",
          default_branch: "develop",
          stargazers_count: 12,
        },
      ]),
      "utf8",
    );

    expect(await new RepoStore(filePath).load()).toEqual([
      {
        name: "web",
        cloneUrl: "https://github.com/acme/web.git",
        sshUrl: "git@github.com:acme/web.git",
        defaultBranch: "develop",
        private: false,
        fork: false,
        archived: false,
      },
    ]);
  });
});
