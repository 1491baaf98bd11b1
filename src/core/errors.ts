export class PileError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "PileError";
  }
}

export class ConfigError extends PileError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type GitErrorOutput = {
  stdout?: string;
  stderr?: string;
};

export class GitError extends PileError {
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, output: GitErrorOutput = {}, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
    this.stdout = output.stdout ?? "";
    this.stderr = output.stderr ?? "";
  }
}

// =============================================================================
// SYNCHRONIZATION ERRORS
// =============================================================================

export class InvalidRangeError extends PileError {
  constructor(
    public readonly token: string,
    message = `Cannot resolve "${token}" to a commit.`,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "InvalidRangeError";
  }
}

export class EmptyRangeError extends PileError {
  constructor(public readonly range: string) {
    super(`No commits found in range ${range}.`);
    this.name = "EmptyRangeError";
  }
}

export class PatchNamingExhaustedError extends PileError {
  constructor(
    public readonly fileName: string,
    public readonly attempts: number,
  ) {
    super(`Could not find a free name for ${fileName} after ${attempts} attempts.`);
    this.name = "PatchNamingExhaustedError";
  }
}

export class MissingPatchError extends PileError {
  constructor(public readonly fileName: string) {
    super(`Patch listed in series is missing or unreadable: ${fileName}`);
    this.name = "MissingPatchError";
  }
}

export class PatchApplyError extends PileError {
  constructor(
    public readonly fileName: string,
    public readonly position: number,
    cause?: unknown,
  ) {
    super(`Failed to apply patch #${position} (${fileName}).`, cause);
    this.name = "PatchApplyError";
  }
}

export class UnexpectedDiffStateError extends PileError {
  constructor(
    public readonly status: string,
    public readonly filePath: string,
  ) {
    super(`Unexpected diff status "${status}" for ${filePath}.`);
    this.name = "UnexpectedDiffStateError";
  }
}

export class NoChangesError extends PileError {
  constructor() {
    super("No patches changed since the last recorded pile state.");
    this.name = "NoChangesError";
  }
}

export class PilePermissionError extends PileError {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(`Permission denied while updating ${filePath}.`, cause);
    this.name = "PilePermissionError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  pile: "PILE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends PileError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
