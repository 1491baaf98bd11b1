import { formatErrorMessage } from "../core/error-format.js";
import { logPileEvent, type JsonlLogger } from "../core/logger.js";
import {
  describeCleanupFailure,
  warnCleanupFailure,
  type Workspace,
} from "../git/worktree.js";

import type { PileVcs } from "./vcs.js";

export type WithWorkspaceOptions = {
  logger?: JsonlLogger;
  /** Receives cleanup failures; the worktree helper's own warning is used when absent. */
  onWarning?: (message: string) => void;
};

/**
 * Runs `fn` inside a fresh detached workspace at `revision`. The worktree
 * registration and its temp directory are released on every exit path.
 */
export async function withWorkspace<T>(
  vcs: PileVcs,
  revision: string,
  fn: (workspace: Workspace) => Promise<T>,
  options: WithWorkspaceOptions = {},
): Promise<T> {
  const { logger, onWarning } = options;
  const workspace = await vcs.createWorkspace(revision, {
    onCleanupFailure: (step, error) => {
      logPileEvent(logger, "workspace.cleanup_failed", {
        step,
        message: formatErrorMessage(error),
      });
      if (onWarning) {
        onWarning(describeCleanupFailure(step, error));
      } else {
        warnCleanupFailure(step, error);
      }
    },
  });

  logPileEvent(logger, "workspace.created", { sha: workspace.sha, root: workspace.root });
  try {
    return await fn(workspace);
  } finally {
    await workspace.cleanup();
  }
}
