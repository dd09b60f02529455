import { isAbsolute, join, relative, resolve, sep } from "node:path";

import { PathValidationError } from "../core/errors.js";

/** Characters rejected in repository names: NTFS-forbidden, path separators and C0 controls. */
const FORBIDDEN_NAME_CHARACTERS = /[<>:"|?*\\/\u0000-\u001f]/;
const CONTROL_CHARACTERS = /[\u0000-\u001f]/;
const WINDOWS_RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

/**
 * Confines every repository-local path to one base directory.
 *
 * The base directory is checked once on construction; repository names and
 * arbitrary candidate paths are checked on every call. Nothing here touches
 * the filesystem.
 */
export class PathValidator {
  public readonly baseDirectory: string;

  public constructor(baseDirectory: string) {
    this.baseDirectory = PathValidator.validateBaseDirectory(baseDirectory);
  }

  public static validateBaseDirectory(path: string): string {
    if (path.trim().length === 0) {
      throw new PathValidationError("Base folder cannot be empty.", "PATH_EMPTY", {
        severity: "fatal",
      });
    }

    if (CONTROL_CHARACTERS.test(path)) {
      throw new PathValidationError(
        "Base folder contains null bytes or control characters.",
        "PATH_INVALID_CHARACTERS",
        { severity: "fatal" },
      );
    }

    if (!isAbsolute(path)) {
      throw new PathValidationError(
        `Base folder must be an absolute path, received "${path}".`,
        "PATH_NOT_ABSOLUTE",
        { severity: "fatal", context: { path } },
      );
    }

    return resolve(path);
  }

  /** Returns the absolute working-copy path for a repository name. */
  public resolveRepositoryPath(name: string): string {
    this.validateRepositoryName(name);
    return this.validatePath(join(this.baseDirectory, name));
  }

  public validateRepositoryName(name: string): string {
    if (name.trim().length === 0) {
      throw new PathValidationError("Repository name cannot be empty.", "PATH_EMPTY");
    }

    if (name === "." || name === "..") {
      throw new PathValidationError(
        `Repository name "${name}" would escape the base folder.`,
        "PATH_TRAVERSAL",
        { context: { name } },
      );
    }

    if (FORBIDDEN_NAME_CHARACTERS.test(name)) {
      throw new PathValidationError(
        `Repository name "${printable(name)}" contains characters that are not allowed in a folder name.`,
        name.includes("/") || name.includes("\\") ? "PATH_TRAVERSAL" : "PATH_INVALID_CHARACTERS",
        { context: { name: printable(name) } },
      );
    }

    if (WINDOWS_RESERVED_NAMES.test(name) || /[. ]$/.test(name)) {
      throw new PathValidationError(
        `Repository name "${name}" is not a portable folder name.`,
        "PATH_INVALID_CHARACTERS",
        { context: { name } },
      );
    }

    return name;
  }

  /**
   * Resolves `candidate` (absolute, or relative to the base directory) and
   * returns it when it stays inside the base directory.
   */
  public validatePath(candidate: string): string {
    if (candidate.length === 0) {
      throw new PathValidationError("Path cannot be empty.", "PATH_EMPTY");
    }

    if (CONTROL_CHARACTERS.test(candidate)) {
      throw new PathValidationError(
        `Path "${printable(candidate)}" contains null bytes or control characters.`,
        "PATH_INVALID_CHARACTERS",
        { context: { path: printable(candidate) } },
      );
    }

    const resolved = resolve(this.baseDirectory, candidate);
    if (!this.isInsideBase(resolved)) {
      throw new PathValidationError(
        `Path "${candidate}" resolves outside of the base folder "${this.baseDirectory}".`,
        "PATH_TRAVERSAL",
        { context: { path: candidate, resolved, baseDirectory: this.baseDirectory } },
      );
    }

    return resolved;
  }

  private isInsideBase(resolved: string): boolean {
    if (resolved === this.baseDirectory) {
      return true;
    }

    const fromBase = relative(this.baseDirectory, resolved);
    return (
      fromBase.length > 0 &&
      !fromBase.startsWith(`..${sep}`) &&
      fromBase !== ".." &&
      !isAbsolute(fromBase)
    );
  }
}

function printable(value: string): string {
  return value.replace(
    /[\u0000-\u001f]/g,
    (char) => `\\x${char.charCodeAt(0).toString(16).padStart(2, "0")}`,
  );
}
