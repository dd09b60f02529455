export type GitfleetErrorSeverity = "fatal" | "recoverable" | "warning";

export const CONFIG_ERROR_CODES = ["CONFIG_INVALID", "CONFIG_SECRET_MISSING"] as const;

export const HOSTING_API_ERROR_CODES = [
  "API_REQUEST_FAILED",
  "API_TRANSPORT_FAILED",
  "API_RATE_LIMITED",
] as const;

export const GIT_ERROR_CODES = [
  "GIT_COMMAND_FAILED",
  "GIT_TIMEOUT",
  "GIT_NOT_CLONED",
  "GIT_COMMAND_FORBIDDEN",
] as const;

export const PATH_ERROR_CODES = [
  "PATH_TRAVERSAL",
  "PATH_INVALID_CHARACTERS",
  "PATH_NOT_ABSOLUTE",
  "PATH_EMPTY",
] as const;

export const CACHE_ERROR_CODES = ["CACHE_NOT_FOUND", "CACHE_CORRUPT"] as const;

export const GITFLEET_ERROR_CODES = [
  ...CONFIG_ERROR_CODES,
  ...HOSTING_API_ERROR_CODES,
  ...GIT_ERROR_CODES,
  ...PATH_ERROR_CODES,
  ...CACHE_ERROR_CODES,
] as const;

export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type HostingApiErrorCode = (typeof HOSTING_API_ERROR_CODES)[number];
export type GitErrorCode = (typeof GIT_ERROR_CODES)[number];
export type PathErrorCode = (typeof PATH_ERROR_CODES)[number];
export type CacheErrorCode = (typeof CACHE_ERROR_CODES)[number];
export type GitfleetErrorCode = (typeof GITFLEET_ERROR_CODES)[number];

export interface GitfleetErrorOptions {
  severity?: GitfleetErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class GitfleetError extends Error {
  public readonly code: GitfleetErrorCode;
  public readonly severity: GitfleetErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: GitfleetErrorCode,
    severity: GitfleetErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "GitfleetError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

export class ConfigError extends GitfleetError {
  public declare readonly code: ConfigErrorCode;

  public constructor(message: string, code: ConfigErrorCode, options: GitfleetErrorOptions = {}) {
    super(message, code, options.severity ?? "fatal", options.context, options.cause);
    this.name = "ConfigError";
  }
}

export interface HostingApiErrorOptions extends GitfleetErrorOptions {
  status?: number;
  body?: string;
}

export class HostingApiError extends GitfleetError {
  public declare readonly code: HostingApiErrorCode;
  public readonly status?: number;
  public readonly body?: string;

  public constructor(
    message: string,
    code: HostingApiErrorCode,
    options: HostingApiErrorOptions = {},
  ) {
    super(message, code, options.severity ?? "fatal", options.context, options.cause);
    this.name = "HostingApiError";
    this.status = options.status;
    this.body = options.body;
  }
}

export interface GitOperationErrorOptions extends GitfleetErrorOptions {
  command?: readonly string[];
  exitCode?: number;
  stderr?: string;
}

export class GitOperationError extends GitfleetError {
  public declare readonly code: GitErrorCode;
  public readonly command?: readonly string[];
  public readonly exitCode?: number;
  public readonly stderr?: string;

  public constructor(message: string, code: GitErrorCode, options: GitOperationErrorOptions = {}) {
    super(message, code, options.severity ?? "recoverable", options.context, options.cause);
    this.name = "GitOperationError";
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

export class PathValidationError extends GitfleetError {
  public declare readonly code: PathErrorCode;

  public constructor(message: string, code: PathErrorCode, options: GitfleetErrorOptions = {}) {
    super(message, code, options.severity ?? "recoverable", options.context, options.cause);
    this.name = "PathValidationError";
  }
}

export class CacheError extends GitfleetError {
  public declare readonly code: CacheErrorCode;

  public constructor(message: string, code: CacheErrorCode, options: GitfleetErrorOptions = {}) {
    super(message, code, options.severity ?? "fatal", options.context, options.cause);
    this.name = "CacheError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Report text for a failure: the message, followed by the captured stderr of
 * a git command or the response body of an API call when there is one.
 */
export function describeError(error: unknown): string {
  const message = toErrorMessage(error);

  if (error instanceof GitOperationError && error.stderr) {
    const stderr = error.stderr.trim();
    return stderr.length > 0 && !message.includes(stderr) ? `${message}\n${stderr}` : message;
  }

  if (error instanceof HostingApiError && error.body) {
    const body = error.body.trim();
    return body.length > 0 && !message.includes(body) ? `${message}\n${body}` : message;
  }

  return message;
}

export function errorCodeOf(error: unknown): string | undefined {
  return error instanceof GitfleetError ? error.code : undefined;
}
