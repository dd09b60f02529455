import { Octokit } from "@octokit/rest";

import { HostingApiError } from "../core/errors.js";
import { type Logger, createSilentLogger } from "../core/logger.js";
import type { EntityType, RepositoryInfo } from "../core/types.js";
import { isRecord, sleep as defaultSleep } from "../core/utils.js";
import { createRepositoryInfo } from "../git/repository.js";

export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_PER_PAGE = 100;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_MS = 1_000;
export const DEFAULT_MAX_BACKOFF_MS = 60_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const DEFAULT_MAX_PAGES = 1_000;

interface PageResponse {
  data: unknown;
}

type PageFetcher = (page: number, signal: AbortSignal) => Promise<PageResponse>;

export interface HostingApiClientOptions {
  token?: string;
  baseUrl?: string;
  perPage?: number;
  maxRetries?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  requestTimeoutMs?: number;
  /** Listings still returning items after this many pages are treated as a failure. */
  maxPages?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface ApiErrorLike {
  status?: number;
  message?: string;
  response?: {
    headers?: Record<string, string | number | undefined>;
    data?: unknown;
  };
}

/**
 * Lists the repositories of an organisation or user through the GitHub REST
 * API. Pages are fetched one at a time; a rate-limited page is retried with
 * exponential backoff, every other failure is reported immediately.
 */
export class HostingApiClient {
  private readonly octokit: Octokit;
  private readonly hasToken: boolean;
  private readonly perPage: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly requestTimeoutMs: number;
  private readonly maxPages: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private authenticatedLogin: Promise<string | null> | undefined;

  public constructor(options: HostingApiClientOptions = {}) {
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl ?? DEFAULT_API_BASE_URL,
      userAgent: "gitfleet",
    });
    this.hasToken = typeof options.token === "string" && options.token.length > 0;
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.backoffMs = Math.max(0, options.backoffMs ?? DEFAULT_BACKOFF_MS);
    this.maxBackoffMs = Math.max(0, options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  public async listRepositories(
    entityType: EntityType,
    entityName: string,
  ): Promise<RepositoryInfo[]> {
    const repositories: RepositoryInfo[] = [];
    for await (const page of this.pages(entityType, entityName)) {
      repositories.push(...page);
    }
    this.logger.debug(`Fetched ${repositories.length} repositories for ${entityType} ${entityName}`);
    return repositories;
  }

  /** Pages of repositories, in API order, ending at the first empty page. */
  public async *pages(
    entityType: EntityType,
    entityName: string,
  ): AsyncGenerator<RepositoryInfo[], void, undefined> {
    const fetchPage = await this.resolvePageFetcher(entityType, entityName);
    const label = `${entityType} ${entityName}`;

    for (let page = 1; page <= this.maxPages; page += 1) {
      const response = await this.withRateLimitRetry(
        `list repositories (${label}, page ${page})`,
        (signal) => fetchPage(page, signal),
      );

      if (!Array.isArray(response.data)) {
        throw new HostingApiError(
          `Unexpected response while listing repositories for ${label}: expected an array.`,
          "API_REQUEST_FAILED",
          { body: safeStringify(response.data), context: { page } },
        );
      }

      if (response.data.length === 0) {
        return;
      }

      yield response.data.map((item, index) => toRepositoryInfo(item, page, index));
    }

    throw new HostingApiError(
      `Listing for ${label} did not end within ${this.maxPages} pages.`,
      "API_REQUEST_FAILED",
      { context: { maxPages: this.maxPages } },
    );
  }

  private async resolvePageFetcher(
    entityType: EntityType,
    entityName: string,
  ): Promise<PageFetcher> {
    const perPage = this.perPage;

    if (entityType === "org") {
      return (page, signal) =>
        this.octokit.repos.listForOrg({
          org: entityName,
          type: "all",
          per_page: perPage,
          page,
          request: { signal },
        });
    }

    const login = await this.getAuthenticatedLogin();
    if (login !== null && login.toLowerCase() === entityName.toLowerCase()) {
      // Only the authenticated listing includes the user's private repositories.
      return (page, signal) =>
        this.octokit.repos.listForAuthenticatedUser({
          affiliation: "owner",
          per_page: perPage,
          page,
          request: { signal },
        });
    }

    return (page, signal) =>
      this.octokit.repos.listForUser({
        username: entityName,
        type: "owner",
        per_page: perPage,
        page,
        request: { signal },
      });
  }

  private getAuthenticatedLogin(): Promise<string | null> {
    if (!this.hasToken) {
      return Promise.resolve(null);
    }

    this.authenticatedLogin ??= this.withRateLimitRetry("resolve authenticated user", (signal) =>
      this.octokit.users.getAuthenticated({ request: { signal } }),
    ).then((response) => response.data.login);

    return this.authenticatedLogin;
  }

  private async withRateLimitRetry<T>(
    operationName: string,
    operation: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await operation(AbortSignal.timeout(this.requestTimeoutMs));
      } catch (error) {
        if (!isRateLimited(error)) {
          throw toHostingApiError(operationName, error);
        }

        if (attempt >= this.maxRetries) {
          throw new HostingApiError(
            `Rate limit still exceeded after ${attempt + 1} attempts (${operationName}).`,
            "API_RATE_LIMITED",
            {
              status: isApiError(error) ? error.status : undefined,
              body: responseBody(error),
              context: { attempts: attempt + 1 },
              cause: error,
            },
          );
        }

        const delayMs = this.backoffDelay(attempt, error);
        this.logger.warn(
          `Rate limited during ${operationName}; retrying in ${formatDelay(delayMs)} (attempt ${attempt + 2} of ${this.maxRetries + 1}).`,
        );
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * `backoffMs * 2^attempt`, raised to the `retry-after` or `x-ratelimit-reset`
   * wait when the response asks for longer; never more than `maxBackoffMs`.
   */
  public backoffDelay(attempt: number, error?: unknown): number {
    const headers = isApiError(error) ? error.response?.headers : undefined;
    const hinted = headers ? this.hintedDelay(headers) : undefined;
    const exponential = this.backoffMs * 2 ** attempt;
    return Math.min(Math.max(hinted ?? 0, exponential), this.maxBackoffMs);
  }

  private hintedDelay(headers: Record<string, string | number | undefined>): number | undefined {
    const retryAfter = readNumericHeader(headers, "retry-after");
    if (retryAfter !== undefined) {
      return Math.max(0, retryAfter * 1_000);
    }

    const reset = readNumericHeader(headers, "x-ratelimit-reset");
    if (reset !== undefined) {
      return Math.max(0, reset * 1_000 - this.now());
    }

    return undefined;
  }
}

export function isRateLimited(error: unknown): boolean {
  if (!isApiError(error)) {
    return false;
  }

  if (error.status === 429) {
    return true;
  }

  if (error.status !== 403) {
    return false;
  }

  const headers = error.response?.headers ?? {};
  if (String(headers["x-ratelimit-remaining"] ?? "") === "0") {
    return true;
  }

  if (headers["retry-after"] !== undefined) {
    return true;
  }

  return /rate limit/i.test(error.message ?? "");
}

function toHostingApiError(operationName: string, error: unknown): HostingApiError {
  if (error instanceof HostingApiError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (!isApiError(error) || error.response === undefined) {
    return new HostingApiError(
      `Request failed before a response was received (${operationName}): ${message}`,
      "API_TRANSPORT_FAILED",
      { cause: error },
    );
  }

  return new HostingApiError(
    `GitHub API responded with ${String(error.status)} (${operationName}): ${message}`,
    "API_REQUEST_FAILED",
    { status: error.status, body: responseBody(error), cause: error },
  );
}

function toRepositoryInfo(item: unknown, page: number, index: number): RepositoryInfo {
  if (!isRecord(item) || typeof item.name !== "string") {
    throw new HostingApiError(
      `Unexpected repository entry at page ${page}, index ${index}.`,
      "API_REQUEST_FAILED",
      { body: safeStringify(item), context: { page, index } },
    );
  }

  return createRepositoryInfo({
    name: item.name,
    cloneUrl: readString(item.clone_url) ?? "",
    sshUrl: readString(item.ssh_url) ?? "",
    defaultBranch: readString(item.default_branch) ?? "main",
    private: item.private === true,
    fork: item.fork === true,
    archived: item.archived === true,
  });
}

function isApiError(error: unknown): error is ApiErrorLike {
  return typeof error === "object" && error !== null && "status" in error;
}

function responseBody(error: unknown): string | undefined {
  if (!isApiError(error) || error.response?.data === undefined) {
    return undefined;
  }
  return safeStringify(error.response.data);
}

function readNumericHeader(
  headers: Record<string, string | number | undefined>,
  name: string,
): number | undefined {
  const value = headers[name];
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function safeStringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function formatDelay(ms: number): string {
  return ms >= 1_000 ? `${(ms / 1_000).toFixed(1)}s` : `${String(ms)}ms`;
}
