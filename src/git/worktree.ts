// Workspace manager.
// Purpose: ephemeral detached worktrees for generation and reconstruction.
// Assumes the target repo is a valid git checkout.

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";

import { git, resolveCommit } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type Workspace = {
  sha: string;
  root: string;
  cleanup: () => Promise<void>;
};

export type WorktreeEntry = {
  path: string;
  /** Short branch name, or null for detached or bare entries. */
  branch: string | null;
};

export type CleanupFailureHandler = (step: string, error: unknown) => void;

export type CreateWorkspaceOptions = {
  onCleanupFailure?: CleanupFailureHandler;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createWorkspace(
  repoRoot: string,
  revision: string,
  options: CreateWorkspaceOptions = {},
): Promise<Workspace> {
  const resolvedRepoRoot = path.resolve(repoRoot);
  const resolvedSha = await resolveRevisionSha(resolvedRepoRoot, revision);
  const { tempRoot, worktreeRoot } = await createTempWorktreeRoot(resolvedSha);

  try {
    await git(resolvedRepoRoot, ["worktree", "add", "--detach", worktreeRoot, resolvedSha]);
  } catch (error) {
    await fs.rm(tempRoot, { recursive: true, force: true });
    throw error;
  }

  return {
    sha: resolvedSha,
    root: worktreeRoot,
    cleanup: buildWorktreeCleanup({
      repoRoot: resolvedRepoRoot,
      tempRoot,
      worktreeRoot,
      onFailure: options.onCleanupFailure ?? warnCleanupFailure,
    }),
  };
}

export async function listWorktrees(repoRoot: string): Promise<WorktreeEntry[]> {
  const res = await git(repoRoot, ["worktree", "list", "--porcelain"]);
  return parseWorktreeList(res.stdout);
}

export function parseWorktreeList(output: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const line of output.split("\n")) {
    if (line.startsWith("worktree ")) {
      current = { path: line.slice("worktree ".length), branch: null };
      entries.push(current);
      continue;
    }
    if (current && line.startsWith("branch ")) {
      const ref = line.slice("branch ".length);
      current.branch = ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
    }
  }

  return entries;
}

export async function addBranchWorktree(
  repoRoot: string,
  worktreePath: string,
  branch: string,
): Promise<void> {
  await git(repoRoot, ["worktree", "add", worktreePath, branch]);
}

export async function removeWorktree(repoRoot: string, worktreePath: string): Promise<void> {
  await git(repoRoot, ["worktree", "remove", "--force", worktreePath]);
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

async function resolveRevisionSha(repoRoot: string, revision: string): Promise<string> {
  const trimmedRevision = revision.trim();
  if (trimmedRevision.length === 0) {
    throw new Error("Revision must be non-empty.");
  }

  const sha = await resolveCommit(repoRoot, trimmedRevision);
  if (!sha) {
    throw new Error(`Revision ${trimmedRevision} does not name a commit.`);
  }
  return sha;
}

async function createTempWorktreeRoot(
  resolvedSha: string,
): Promise<{ tempRoot: string; worktreeRoot: string }> {
  const tempRoot = await fs.mkdtemp(
    path.join(os.tmpdir(), `patchpile-ws-${resolvedSha.slice(0, 12)}-`),
  );
  const worktreeRoot = path.join(tempRoot, "repo");
  return { tempRoot, worktreeRoot };
}

function buildWorktreeCleanup(input: {
  repoRoot: string;
  tempRoot: string;
  worktreeRoot: string;
  onFailure: CleanupFailureHandler;
}): () => Promise<void> {
  let hasCleanedUp = false;

  return async () => {
    if (hasCleanedUp) return;
    hasCleanedUp = true;

    // Every step runs; failures go to the handler instead of being thrown.
    await runReported("worktree remove", input.onFailure, async () => {
      await removeWorktree(input.repoRoot, input.worktreeRoot);
    });
    await runReported("worktree prune", input.onFailure, async () => {
      await git(input.repoRoot, ["worktree", "prune"]);
    });
    await runReported("remove temp dir", input.onFailure, async () => {
      await fs.rm(input.tempRoot, { recursive: true, force: true });
    });
  };
}

async function runReported(
  step: string,
  onFailure: CleanupFailureHandler,
  fn: () => Promise<void>,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    onFailure(step, error);
  }
}

export function describeCleanupFailure(step: string, error: unknown): string {
  return `Workspace cleanup step "${step}" failed: ${formatErrorMessage(error)}`;
}

export function warnCleanupFailure(step: string, error: unknown): void {
  console.warn(`Warning: ${describeCleanupFailure(step, error)}`);
}
