import type { PileContext } from "../app/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { reconstructBranch, type ReconstructResult } from "../pile/genbranch.js";

import { renderCliWarning } from "./error-format.js";
import { normalizePileCommandError } from "./errors.js";

export type GenbranchCommandOptions = {
  branch?: string;
  verbose?: boolean;
};

export async function genbranchCommand(
  ctx: PileContext,
  opts: GenbranchCommandOptions,
): Promise<ReconstructResult> {
  let result: ReconstructResult;
  try {
    result = await reconstructBranch({
      vcs: ctx.vcs,
      pileDir: ctx.pileDir,
      baseBranch: ctx.config.baseBranch,
      targetBranch: opts.branch ?? ctx.config.resultBranch,
      logger: ctx.logger,
      onWarning: (message) => console.warn(renderCliWarning(message)),
      onPatchApplied: opts.verbose
        ? (fileName, position) => console.log(`Applied ${position}: ${fileName}`)
        : undefined,
    });
  } catch (error) {
    throw normalizePileCommandError(error);
  }

  if (result.status === "refused") {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.pile,
      title: "Branch is checked out elsewhere.",
      message: `Branch ${result.branch} is checked out at ${result.checkedOutAt}; it was not updated.`,
      hint: `The reconstructed head ${result.head} is saved in ${result.resultHeadPath}.`,
      next: `Check out another branch there and rerun, or run \`git reset --hard ${result.head}\` in that worktree.`,
    });
  }

  console.log(`Branch ${result.branch} updated to ${result.head} (${result.applied} patches)`);
  return result;
}
