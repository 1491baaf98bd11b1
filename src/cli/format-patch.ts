import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import type { PileContext } from "../app/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { pathExists } from "../core/utils.js";
import {
  extractChangedPatches,
  type ExtractChangedPatchesResult,
} from "../pile/format-patch.js";
import { resolveCommitRange } from "../pile/range.js";
import { isPatchFileName } from "../pile/series.js";

import { renderCliWarning } from "./error-format.js";
import { normalizePileCommandError } from "./errors.js";

export const DEFAULT_FORMAT_PATCH_DIR = "patches";

export type FormatPatchCommandOptions = {
  outputDir?: string;
  force?: boolean;
  range?: string;
};

export async function formatPatchCommand(
  ctx: PileContext,
  opts: FormatPatchCommandOptions,
): Promise<ExtractChangedPatchesResult> {
  try {
    const outputDir = path.resolve(opts.outputDir ?? DEFAULT_FORMAT_PATCH_DIR);
    await prepareOutputDir(outputDir, opts.force ?? false);

    const range = await resolveCommitRange(ctx.vcs, opts.range, {
      base: ctx.config.baseBranch,
      result: "HEAD",
    });
    const result = await extractChangedPatches({
      vcs: ctx.vcs,
      pileBranch: ctx.config.branch,
      range,
      outputDir,
      logger: ctx.logger,
      onWarning: (message) => console.warn(renderCliWarning(message)),
    });

    console.log(result.coverLetter);
    for (const patch of result.patches) {
      console.log(patch);
    }
    return result;
  } catch (error) {
    throw normalizePileCommandError(error);
  }
}

async function prepareOutputDir(outputDir: string, force: boolean): Promise<void> {
  if (!(await pathExists(outputDir))) return;

  const existing = (await fs.readdir(outputDir)).filter(isPatchFileName);
  if (existing.length === 0) return;

  if (!force) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.pile,
      title: "Output directory has patches.",
      message: `${outputDir} already contains ${existing.length} patch files.`,
      hint: "Pass -f to remove them first.",
    });
  }

  for (const name of existing) {
    await fse.remove(path.join(outputDir, name));
  }
}
