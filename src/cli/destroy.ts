import type { PileContext } from "../app/context.js";
import { destroyPile, type DestroyPileResult } from "../pile/bootstrap.js";

import { normalizePileCommandError } from "./errors.js";

export async function destroyCommand(ctx: PileContext): Promise<DestroyPileResult> {
  let result: DestroyPileResult;
  try {
    result = await destroyPile(ctx.repoRoot, ctx.config);
  } catch (error) {
    throw normalizePileCommandError(error);
  }

  if (result.removedWorktree) {
    console.log(`Removed worktree ${result.removedWorktree}`);
  } else {
    console.log("No pile worktree to remove");
  }
  console.log(
    result.deletedBranch
      ? `Deleted branch ${ctx.config.branch}`
      : `Branch ${ctx.config.branch} did not exist`,
  );
  if (result.clearedConfig) {
    console.log("Removed pile.* configuration");
  }
  return result;
}
