import type { DetectedProtocol, RepositoryInfo, Transport } from "../core/types.js";

/** scp-like syntax: `user@host:path`, e.g. `git@github.com:owner/repo.git`. */
const SCP_LIKE_SSH_PATTERN = /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+:(?!\/\/)\S+$/;
const SSH_URL_PATTERN = /^ssh:\/\/\S+$/i;
const HTTPS_URL_PATTERN = /^https:\/\/\S+$/i;

export function classifyRemoteUrl(url: string | null | undefined): DetectedProtocol {
  const trimmed = url?.trim() ?? "";
  if (trimmed.length === 0) {
    return "unknown";
  }

  if (SCP_LIKE_SSH_PATTERN.test(trimmed) || SSH_URL_PATTERN.test(trimmed)) {
    return "ssh";
  }

  if (HTTPS_URL_PATTERN.test(trimmed)) {
    return "https";
  }

  return "unknown";
}

export function remoteUrlFor(info: RepositoryInfo, transport: Transport): string {
  return transport === "ssh" ? info.sshUrl : info.cloneUrl;
}

/**
 * One-line warning for a remote whose protocol differs from the requested
 * transport; empty when there is nothing to warn about.
 */
export function describeMismatch(detected: DetectedProtocol, desired: Transport): string {
  if (detected === "https" && desired === "ssh") {
    return "remote uses HTTPS but SSH was requested; git will keep asking for HTTPS credentials instead of using your SSH keys.";
  }

  if (detected === "ssh" && desired === "https") {
    return "remote uses SSH but HTTPS was requested; git will keep using your SSH keys instead of HTTPS credentials.";
  }

  return "";
}
