import { join, resolve } from "node:path";

import { describe, expect, it } from "vitest";

import { PathValidationError } from "../../src/core/errors.js";
import { PathValidator } from "../../src/security/path-validator.js";

const BASE = resolve("/srv/gitfleet");

function captureError(run: () => unknown): PathValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof PathValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a PathValidationError");
}

describe("PathValidator.validateBaseDirectory", () => {
  it("normalises an absolute folder", () => {
    expect(PathValidator.validateBaseDirectory("/srv/gitfleet/../gitfleet/")).toBe(BASE);
  });

  it("rejects empty, relative and control-character folders as fatal", () => {
    const empty = captureError(() => PathValidator.validateBaseDirectory("  "));
    const relative = captureError(() => PathValidator.validateBaseDirectory("repos"));
    const nullByte = captureError(() => PathValidator.validateBaseDirectory("/srv/\u0000x"));

    expect(empty.code).toBe("PATH_EMPTY");
    expect(relative.code).toBe("PATH_NOT_ABSOLUTE");
    expect(nullByte.code).toBe("PATH_INVALID_CHARACTERS");
    expect([empty.severity, relative.severity, nullByte.severity]).toEqual([
      "fatal",
      "fatal",
      "fatal",
    ]);
  });
});

describe("PathValidator.resolveRepositoryPath", () => {
  const validator = new PathValidator(BASE);

  it("joins a plain repository name under the base folder", () => {
    expect(validator.resolveRepositoryPath("api-server")).toBe(join(BASE, "api-server"));
    expect(validator.resolveRepositoryPath(".github")).toBe(join(BASE, ".github"));
  });

  it("rejects traversal through dot segments and separators", () => {
    expect(captureError(() => validator.resolveRepositoryPath("..")).code).toBe("PATH_TRAVERSAL");
    expect(captureError(() => validator.resolveRepositoryPath("../etc")).code).toBe(
      "PATH_TRAVERSAL",
    );
    expect(captureError(() => validator.resolveRepositoryPath("a\\b")).code).toBe(
      "PATH_TRAVERSAL",
    );
  });

  it("rejects characters that are not allowed in folder names", () => {
    for (const name of ["a:b", "what?", "pipe|name", "star*", "null\u0000byte"]) {
      expect(captureError(() => validator.resolveRepositoryPath(name)).code).toBe(
        "PATH_INVALID_CHARACTERS",
      );
    }
  });

  it("escapes control characters in the error message", () => {
    const error = captureError(() => validator.resolveRepositoryPath("bad\u0007name"));

    expect(error.message).toBe(
      'Repository name "bad\\x07name" contains characters that are not allowed in a folder name.',
    );
  });

  it("rejects reserved device names and trailing dots", () => {
    expect(captureError(() => validator.resolveRepositoryPath("CON")).code).toBe(
      "PATH_INVALID_CHARACTERS",
    );
    expect(captureError(() => validator.resolveRepositoryPath("name.")).code).toBe(
      "PATH_INVALID_CHARACTERS",
    );
  });

  it("rejects an empty name", () => {
    expect(captureError(() => validator.resolveRepositoryPath("")).code).toBe("PATH_EMPTY");
  });

  it("reports repository errors as recoverable", () => {
    expect(captureError(() => validator.resolveRepositoryPath("..")).severity).toBe("recoverable");
  });
});

describe("PathValidator.validatePath", () => {
  const validator = new PathValidator(BASE);

  it("accepts paths inside the base folder", () => {
    expect(validator.validatePath(join(BASE, "api"))).toBe(join(BASE, "api"));
    expect(validator.validatePath("api/src")).toBe(join(BASE, "api", "src"));
    expect(validator.validatePath(BASE)).toBe(BASE);
  });

  it("rejects paths that resolve outside the base folder", () => {
    expect(captureError(() => validator.validatePath("/etc/passwd")).code).toBe("PATH_TRAVERSAL");
    expect(captureError(() => validator.validatePath(join(BASE, "..", "other"))).code).toBe(
      "PATH_TRAVERSAL",
    );
    expect(captureError(() => validator.validatePath(`${BASE}-sibling`)).code).toBe(
      "PATH_TRAVERSAL",
    );
  });

  it("rejects null bytes", () => {
    expect(captureError(() => validator.validatePath(join(BASE, "a\u0000b"))).code).toBe(
      "PATH_INVALID_CHARACTERS",
    );
  });
});
