import path from "node:path";

import {
  ConfigError,
  GitError,
  InvalidRangeError,
  MissingPatchError,
  PatchApplyError,
} from "../core/errors.js";
import { logPileEvent, type JsonlLogger } from "../core/logger.js";
import { isReadableFile } from "../core/utils.js";

import { readBaseline } from "./baseline.js";
import { writeResultHead } from "./result-head.js";
import { readSeries } from "./series.js";
import type { PileVcs } from "./vcs.js";
import { withWorkspace } from "./workspace.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReconstructBranchOptions = {
  vcs: PileVcs;
  pileDir: string;
  baseBranch: string;
  targetBranch: string;
  logger?: JsonlLogger;
  onWarning?: (message: string) => void;
  onPatchApplied?: (fileName: string, position: number) => void;
};

export type BaselineDrift = {
  baseline: string;
  baseTip: string;
};

type ReconstructOutcomeBase = {
  branch: string;
  head: string;
  /** Where the computed head was recorded, whatever happened to the branch. */
  resultHeadPath: string;
  applied: number;
  drift: BaselineDrift | null;
};

export type ReconstructResult =
  | (ReconstructOutcomeBase & { status: "updated" })
  | (ReconstructOutcomeBase & { status: "refused"; checkedOutAt: string });

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Replays the pile's series on top of the base branch tip in a throwaway
 * workspace, records the resulting head, then moves `targetBranch` to it unless
 * that branch is checked out somewhere.
 */
export async function reconstructBranch(opts: ReconstructBranchOptions): Promise<ReconstructResult> {
  const { vcs, baseBranch, targetBranch, logger } = opts;
  const pileDir = path.resolve(opts.pileDir);

  const drift = await checkBaselineDrift(vcs, pileDir, baseBranch);
  if (drift) {
    const message =
      `Pile baseline ${shortSha(drift.baseline)} differs from ${baseBranch} ` +
      `(${shortSha(drift.baseTip)}); patches may no longer apply cleanly.`;
    opts.onWarning?.(message);
    logPileEvent(logger, "genbranch.baseline_drift", { ...drift, base_branch: baseBranch });
  }
  const baseTip = drift?.baseTip ?? (await resolveBaseTip(vcs, baseBranch));

  const patches = await loadSeriesPatches(pileDir);

  const head = await withWorkspace(
    vcs,
    baseTip,
    async (workspace) => {
      for (const [index, patchPath] of patches.entries()) {
        const fileName = path.basename(patchPath);
        const position = index + 1;
        const outcome = await vcs.applyPatch(workspace.root, patchPath);
        if (!outcome.ok) {
          logPileEvent(logger, "genbranch.apply_failed", { patch: fileName, position });
          throw new PatchApplyError(fileName, position, new GitError(outcome.output));
        }
        opts.onPatchApplied?.(fileName, position);
      }
      return vcs.headSha(workspace.root);
    },
    { logger, onWarning: opts.onWarning },
  );

  const resultHeadPath = await writeResultHead(vcs, head);
  logPileEvent(logger, "genbranch.applied", { head, patches: patches.length });

  const outcome: ReconstructOutcomeBase = {
    branch: targetBranch,
    head,
    resultHeadPath,
    applied: patches.length,
    drift,
  };

  // Advisory: nothing stops a checkout between this check and the ref update.
  const checkedOutAt = await findCheckout(vcs, targetBranch);
  if (checkedOutAt) {
    logPileEvent(logger, "genbranch.refused", { branch: targetBranch, worktree: checkedOutAt, head });
    return { ...outcome, status: "refused", checkedOutAt };
  }

  await vcs.setBranch(targetBranch, head);
  logPileEvent(logger, "genbranch.updated", { branch: targetBranch, head });
  return { ...outcome, status: "updated" };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function checkBaselineDrift(
  vcs: PileVcs,
  pileDir: string,
  baseBranch: string,
): Promise<BaselineDrift | null> {
  const recorded = await readBaseline(pileDir);
  if (!recorded) {
    throw new ConfigError(`Pile at ${pileDir} has no BASELINE record.`);
  }

  const baseline = (await vcs.resolveCommit(recorded)) ?? recorded;
  const baseTip = await resolveBaseTip(vcs, baseBranch);
  return baseline === baseTip ? null : { baseline, baseTip };
}

async function resolveBaseTip(vcs: PileVcs, baseBranch: string): Promise<string> {
  const baseTip = await vcs.resolveCommit(baseBranch);
  if (!baseTip) throw new InvalidRangeError(baseBranch);
  return baseTip;
}

async function loadSeriesPatches(pileDir: string): Promise<string[]> {
  const names = await readSeries(pileDir);
  if (!names) {
    throw new ConfigError(`Pile at ${pileDir} has no series file.`);
  }

  const patches: string[] = [];
  for (const name of names) {
    const patchPath = path.join(pileDir, name);
    if (!(await isReadableFile(patchPath))) {
      throw new MissingPatchError(name);
    }
    patches.push(patchPath);
  }
  return patches;
}

async function findCheckout(vcs: PileVcs, branch: string): Promise<string | null> {
  const worktrees = await vcs.listWorktrees();
  const match = worktrees.find((entry) => entry.branch === branch);
  return match ? match.path : null;
}

function shortSha(sha: string): string {
  return sha.slice(0, 12);
}
