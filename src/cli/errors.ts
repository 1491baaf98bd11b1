import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  EmptyRangeError,
  GitError,
  InvalidRangeError,
  MissingPatchError,
  NoChangesError,
  PatchApplyError,
  PatchNamingExhaustedError,
  PilePermissionError,
  UnexpectedDiffStateError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

import { NOT_INITIALIZED_HINT } from "./config.js";

/**
 * Maps engine errors to the user-facing form rendered by the CLI. Values that
 * are not pile errors pass through untouched.
 */
export function normalizePileCommandError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigError) {
    return pileError("Pile configuration problem.", error, NOT_INITIALIZED_HINT, "config");
  }
  if (error instanceof InvalidRangeError) {
    return pileError(
      "Invalid commit range.",
      error,
      "Both ends of BASE..RESULT must name existing commits.",
    );
  }
  if (error instanceof EmptyRangeError) {
    return pileError("Nothing to generate.", error, "The range must contain at least one commit.");
  }
  if (error instanceof PatchNamingExhaustedError) {
    return pileError("Patch naming failed.", error, "Too many commits share the same subject.");
  }
  if (error instanceof MissingPatchError) {
    return pileError(
      "Pile is incomplete.",
      error,
      "Restore the file or regenerate the pile with `patchpile genpatches`.",
    );
  }
  if (error instanceof PatchApplyError) {
    const detail = error.cause === undefined ? "" : formatErrorMessage(error.cause);
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.pile,
      title: "Patch did not apply.",
      message: detail.length > 0 ? `${error.message}\n${detail}` : error.message,
      hint: "Regenerate the pile or rebase the result branch onto the current base.",
      cause: error,
    });
  }
  if (error instanceof NoChangesError) {
    return pileError("No changes to send.", error);
  }
  if (error instanceof UnexpectedDiffStateError) {
    return pileError("Unexpected pile diff.", error);
  }
  if (error instanceof PilePermissionError) {
    return pileError("Permission denied.", error, "Check ownership of the pile directory.");
  }
  if (error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
      message: error.message,
      cause: error,
    });
  }

  return error;
}

function pileError(
  title: string,
  error: Error,
  hint?: string,
  code: keyof typeof USER_FACING_ERROR_CODES = "pile",
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES[code],
    title,
    message: error.message,
    hint,
    cause: error,
  });
}
