import { execFileSync } from "node:child_process";

export type TokenSource = "GITHUB_TOKEN" | "GH_TOKEN" | "gh";

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

/**
 * Finds a GitHub token without prompting.
 * Tries: GITHUB_TOKEN → GH_TOKEN → `gh auth token`.
 */
export function resolveGitHubToken(
  env: Record<string, string | undefined> = process.env,
): ResolvedToken | undefined {
  const githubToken = env.GITHUB_TOKEN?.trim();
  if (githubToken) {
    return { token: githubToken, source: "GITHUB_TOKEN" };
  }

  const ghToken = env.GH_TOKEN?.trim();
  if (ghToken) {
    return { token: ghToken, source: "GH_TOKEN" };
  }

  try {
    const token = execFileSync("gh", ["auth", "token"], {
      timeout: 5_000,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();

    if (token.length > 0) {
      return { token, source: "gh" };
    }
  } catch {
    // gh not installed or not authenticated
    return undefined;
  }

  return undefined;
}

export function maskToken(token: string): string {
  if (token.length <= 8) {
    return `${token.slice(0, 2)}****`;
  }

  return `${token.slice(0, 4)}****${token.slice(-2)}`;
}
