/**
 * Git-backed VCS adapter.
 * Purpose: map PileVcs calls to the git helpers.
 * Assumptions: git is available and the repo path is local.
 * Usage: createGitVcs({ repoRoot }) and inject into engine operations.
 */

import path from "node:path";

import type { PileVcs } from "../pile/vcs.js";

import {
  currentIdentity,
  gitCommonDir,
  headSha,
  listCommits,
  resolveCommit,
  setBranch,
} from "./git.js";
import {
  applyMailbox,
  diffStagedStatus,
  diffStagedText,
  formatPatches,
  stageAll,
} from "./patches.js";
import { createWorkspace, listWorktrees } from "./worktree.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitVcsOptions = {
  repoRoot: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(options: GitVcsOptions): PileVcs {
  const repoRoot = path.resolve(options.repoRoot);

  return {
    repoRoot,
    resolveCommit: (ref) => resolveCommit(repoRoot, ref),
    listCommits: (base, result) => listCommits(repoRoot, base, result),
    renderPatches: (base, result, outDir) => formatPatches(repoRoot, base, result, outDir),
    applyPatch: applyMailbox,
    stageAll,
    diffStagedStatus,
    diffStagedText,
    createWorkspace: (revision, workspaceOptions) =>
      createWorkspace(repoRoot, revision, workspaceOptions),
    listWorktrees: () => listWorktrees(repoRoot),
    headSha,
    setBranch: (branch, commit) => setBranch(repoRoot, branch, commit),
    currentIdentity: () => currentIdentity(repoRoot),
    commonDir: () => gitCommonDir(repoRoot),
  };
}
