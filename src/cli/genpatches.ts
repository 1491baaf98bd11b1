import path from "node:path";

import type { PileContext } from "../app/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import {
  generatePatches,
  inspectPileDestination,
  type GeneratePatchesResult,
} from "../pile/genpatches.js";
import { resolveCommitRange } from "../pile/range.js";

import { normalizePileCommandError } from "./errors.js";

export type GenpatchesCommandOptions = {
  outputDir?: string;
  force?: boolean;
  range?: string;
};

export async function genpatchesCommand(
  ctx: PileContext,
  opts: GenpatchesCommandOptions,
): Promise<GeneratePatchesResult> {
  try {
    const destDir = opts.outputDir ? path.resolve(opts.outputDir) : ctx.pileDir;

    const state = await inspectPileDestination(destDir);
    if (state === "foreign" && !opts.force) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.pile,
        title: "Refusing to write patches.",
        message: `${destDir} is not empty and does not contain a pile.`,
        hint: "Pass -f to write into it anyway.",
      });
    }

    const range = await resolveCommitRange(ctx.vcs, opts.range, {
      base: ctx.config.baseBranch,
      result: ctx.config.resultBranch,
    });
    const result = await generatePatches({
      vcs: ctx.vcs,
      range,
      destDir,
      logger: ctx.logger,
    });

    console.log(`Generated ${result.patches.length} patches in ${result.destDir}`);
    return result;
  } catch (error) {
    throw normalizePileCommandError(error);
  }
}
