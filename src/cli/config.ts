import path from "node:path";

import { createPileContext, type PileContext } from "../app/context.js";
import { loadPileConfig, type LoadedPileConfig } from "../core/config-loader.js";
import { ConfigError, GitError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger, logPileEvent } from "../core/logger.js";
import { defaultOperationId } from "../core/utils.js";
import { findRepoRoot, gitCommonDir } from "../git/git.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export const NOT_INITIALIZED_HINT = "Run `patchpile init` in this repository first.";

export type LoadPileContextArgs = {
  cwd?: string;
};

export async function resolveRepoRootForCli(cwd: string = process.cwd()): Promise<string> {
  try {
    return await findRepoRoot(cwd);
  } catch (err) {
    if (!(err instanceof GitError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Not a git repository.",
      message: `No git repository found at ${cwd}.`,
      hint: "Run patchpile from inside the repository that owns the pile.",
      cause: err,
    });
  }
}

export async function loadPileContextForCli(args: LoadPileContextArgs = {}): Promise<PileContext> {
  const repoRoot = await resolveRepoRootForCli(args.cwd);

  let loaded: LoadedPileConfig;
  try {
    loaded = await loadPileConfig(repoRoot);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Pile not initialized.",
      message: err.message,
      hint: NOT_INITIALIZED_HINT,
      cause: err,
    });
  }

  const logPath = path.join(await gitCommonDir(repoRoot), "patchpile", "events.jsonl");
  const logger = new JsonlLogger(logPath, { opId: defaultOperationId() });
  if (loaded.ignoredKeys.length > 0) {
    logPileEvent(logger, "config.ignored_keys", { keys: loaded.ignoredKeys });
  }

  return createPileContext({ repoRoot, config: loaded.config, logger });
}
