import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  type DoctorCheck,
  type DoctorContext,
  type ToolResult,
  extractVersion,
  isVersionAtLeast,
  runDoctorChecks,
} from "../../src/cli/commands/doctor.js";

const { execFileSyncMock } = vi.hoisted(() => ({
  execFileSyncMock: vi.fn(() => {
    throw new Error("gh: command not found");
  }),
}));

vi.mock("node:child_process", async (importOriginal) => ({
  ...(await importOriginal<typeof import("node:child_process")>()),
  execFileSync: execFileSyncMock,
}));

const originalNodeVersion = process.versions.node;
let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "gitfleet-doctor-"));
});

afterEach(async () => {
  setNodeVersion(originalNodeVersion);
  await rm(workDir, { recursive: true, force: true });
});

function setNodeVersion(version: string): void {
  Object.defineProperty(process.versions, "node", {
    configurable: true,
    enumerable: true,
    value: version,
  });
}

function toolResult(result: Partial<ToolResult>): DoctorContext["runCommand"] {
  return vi.fn(async () => ({ ok: true, exitCode: 0, stdout: "", stderr: "", ...result }));
}

function context(overrides: Partial<DoctorContext> = {}): DoctorContext {
  return {
    env: { GITHUB_TOKEN: "test-secret", GITFLEET_LOCAL_FOLDER: workDir },
    fileConfig: null,
    runCommand: toolResult({ stdout: "git version 2.43.0\n" }),
    ...overrides,
  };
}

function check(checks: DoctorCheck[], id: string): DoctorCheck | undefined {
  return checks.find((entry) => entry.id === id);
}

describe("runDoctorChecks", () => {
  it("passes every check in a ready environment", async () => {
    setNodeVersion("20.11.1");

    const checks = await runDoctorChecks(context());

    expect(checks.map((entry) => [entry.id, entry.status])).toEqual([
      ["node", "pass"],
      ["git", "pass"],
      ["github-auth", "pass"],
      ["base-folder", "pass"],
    ]);
    expect(check(checks, "node")?.value).toBe("v20.11.1");
    expect(check(checks, "git")?.value).toBe("v2.43.0");
    expect(check(checks, "github-auth")?.value).toBe("GITHUB_TOKEN:test****et");
    expect(check(checks, "base-folder")?.value).toBe(workDir);
  });

  it("fails an old Node.js release", async () => {
    setNodeVersion("18.19.0");

    const checks = await runDoctorChecks(context());

    expect(check(checks, "node")).toMatchObject({
      status: "fail",
      message: "Node.js 20.0.0+ is required.",
    });
  });

  it("explains a missing git binary", async () => {
    const checks = await runDoctorChecks(
      context({ runCommand: toolResult({ ok: false, exitCode: null, errorCode: "ENOENT" }) }),
    );

    expect(check(checks, "git")).toMatchObject({
      status: "fail",
      value: "--",
      message: "git is not installed or not in PATH.",
    });
  });

  it("reports git's own error output", async () => {
    const checks = await runDoctorChecks(
      context({ runCommand: toolResult({ ok: false, exitCode: 1, stderr: "  broken install \n" }) }),
    );

    expect(check(checks, "git")?.message).toBe("broken install");
  });

  it("warns when no token can be found", async () => {
    const checks = await runDoctorChecks(context({ env: { GITFLEET_LOCAL_FOLDER: workDir } }));

    expect(execFileSyncMock).toHaveBeenCalled();
    expect(check(checks, "github-auth")).toMatchObject({
      status: "warn",
      message: "No GitHub token found; only public repositories can be listed.",
    });
  });

  it("fails a token with a malformed prefix", async () => {
    const checks = await runDoctorChecks(
      context({ env: { GH_TOKEN: "ghp_short", GITFLEET_LOCAL_FOLDER: workDir } }),
    );

    expect(check(checks, "github-auth")).toMatchObject({
      status: "fail",
      value: "GH_TOKEN:ghp_****rt",
      message: "Invalid token: ghp_ token must be followed by 36 alphanumeric characters",
    });
  });

  it("fails when no base folder is configured", async () => {
    const checks = await runDoctorChecks(context({ env: { GITHUB_TOKEN: "test-secret" } }));

    expect(check(checks, "base-folder")).toMatchObject({
      status: "fail",
      message:
        "No base folder configured. Set GITFLEET_LOCAL_FOLDER or baseFolder in the config file.",
    });
  });

  it("prefers the config file and rejects a relative base folder", async () => {
    const checks = await runDoctorChecks(context({ fileConfig: { baseFolder: "repos" } }));

    expect(check(checks, "base-folder")).toMatchObject({
      status: "fail",
      message:
        'Invalid configuration: baseFolder: Base folder must be an absolute path, received "repos"',
    });
  });

  it("warns when the base folder does not exist yet", async () => {
    const missing = join(workDir, "not-yet");

    const checks = await runDoctorChecks(context({ fileConfig: { baseFolder: missing } }));

    expect(check(checks, "base-folder")).toMatchObject({ status: "warn", value: missing });
  });
});

describe("version helpers", () => {
  it("extracts a semantic version from tool output", () => {
    expect(extractVersion("git version 2.39.3 (Apple Git-146)")).toBe("v2.39.3");
    expect(extractVersion("no digits here")).toBeUndefined();
  });

  it("compares versions part by part", () => {
    expect(isVersionAtLeast("20.0.0", "20.0.0")).toBe(true);
    expect(isVersionAtLeast("20.10.0", "20.9.9")).toBe(true);
    expect(isVersionAtLeast("19.99.0", "20.0.0")).toBe(false);
  });
});
