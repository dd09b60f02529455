/**
 * Shared utility functions used across the codebase.
 */

import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Truncate a string to `maxLength`, appending an ellipsis when trimmed.
 * Defaults to the unicode ellipsis `"…"` (1 char).  Pass `"..."` for the
 * three-dot ASCII variant.
 */
export function truncate(value: string, maxLength: number, ellipsis = "…"): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - ellipsis.length))}${ellipsis}`;
}

/**
 * Type guard: returns `true` when `value` is a non-null object
 * (i.e.\ a `Record<string, unknown>`).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function expandHomePath(path: string): string {
  if (path === "~") {
    return homedir();
  }

  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }

  return path;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolvePromise) => {
    setTimeout(resolvePromise, ms);
  });
}

const URL_CREDENTIALS_PATTERN = /^([a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/i;

/** Replaces `user:secret@` in a URL with `***@`. */
export function redactUrl(url: string): string {
  return url.replace(URL_CREDENTIALS_PATTERN, "$1***@");
}
