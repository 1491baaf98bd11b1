/**
 * Version-control capability surface used by the pile engine.
 * Purpose: keep commit storage, patch formatting/application and diffing behind one port.
 * Assumptions: an implementation is bound to a single repository.
 * Usage: createGitVcs({ repoRoot }) and pass it to the engine operations.
 */

import type { GitIdentity } from "../git/git.js";
import type { ApplyOutcome, DiffStatusEntry } from "../git/patches.js";
import type { CreateWorkspaceOptions, Workspace, WorktreeEntry } from "../git/worktree.js";

// =============================================================================
// TYPES
// =============================================================================

export interface PileVcs {
  readonly repoRoot: string;

  resolveCommit(ref: string): Promise<string | null>;
  listCommits(base: string, result: string): Promise<string[]>;
  renderPatches(base: string, result: string, outDir: string): Promise<string[]>;
  applyPatch(worktreeRoot: string, patchPath: string): Promise<ApplyOutcome>;

  stageAll(worktreeRoot: string): Promise<void>;
  diffStagedStatus(worktreeRoot: string): Promise<DiffStatusEntry[]>;
  diffStagedText(worktreeRoot: string): Promise<string>;

  createWorkspace(revision: string, options?: CreateWorkspaceOptions): Promise<Workspace>;
  listWorktrees(): Promise<WorktreeEntry[]>;
  headSha(worktreeRoot: string): Promise<string>;
  setBranch(branch: string, commit: string): Promise<void>;

  currentIdentity(): Promise<GitIdentity>;
  commonDir(): Promise<string>;
}
