import { describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError, renderCliWarning } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Pile not initialized.",
    message: "Missing pile.dir",
    hint: "Run `patchpile init` first.",
    next: "Then run `patchpile genpatches`.",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const error = buildUserFacingError();

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Pile not initialized.",
        "Missing pile.dir",
        "Hint: Run `patchpile init` first.",
        "Next: Then run `patchpile genpatches`.",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.pile,
      title: "Patch did not apply.",
      message: "Patch Fix-bug.patch (position 1) failed to apply",
      cause: new Error("error: a.txt: already exists in working directory\nPatch failed at 0001"),
    });
    error.stack = "UserFacingError: Patch Fix-bug.patch\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Patch did not apply.",
        "Patch Fix-bug.patch (position 1) failed to apply",
        "Code: PILE_ERROR",
        "Name: UserFacingError",
        "Cause: error: a.txt: already exists in working directory",
        "  Patch failed at 0001",
        "Stack:",
        "  UserFacingError: Patch Fix-bug.patch",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("summarizes plain errors with their message", () => {
    expect(renderCliError(new Error("boom"), { stream: nonTtyStream })).toBe("Error: boom");
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const error = buildUserFacingError();

    const output = renderCliError(error, { stream: nonTtyStream, useColor: true });

    expect(output).toContain("Error: Pile not initialized.");
    expect(output).not.toContain("\x1b[");
  });

  it("colors output on a TTY when requested", () => {
    const output = renderCliError(new Error("boom"), {
      stream: { isTTY: true },
      useColor: true,
    });

    expect(output).toBe("\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mboom\x1b[22m");
  });
});

describe("renderCliWarning", () => {
  it("prefixes the message with a warning label", () => {
    expect(renderCliWarning("Base branch moved.", { stream: nonTtyStream })).toBe(
      "Warning: Base branch moved.",
    );
  });
});
