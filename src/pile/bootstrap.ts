// Pile bootstrap and teardown.
// Purpose: write the `pile.*` git config, create the orphan pile branch and its worktree.
// Assumes `repoRoot` is the top level of a non-bare checkout.

import path from "node:path";

import fse from "fs-extra";

import type { PileConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { ensureDir, pathExists } from "../core/utils.js";
import { branchExists, deleteBranch, git, gitCommonDir, resolveCommit } from "../git/git.js";
import { addBranchWorktree, listWorktrees, removeWorktree } from "../git/worktree.js";

import { PILE_RECORD_FILE, formatBaselineRecord } from "./baseline.js";
import { SERIES_FILE, formatSeries } from "./series.js";

// =============================================================================
// TYPES
// =============================================================================

export type InitPileResult = {
  pileDir: string;
  branchCreated: boolean;
  worktreeAdded: boolean;
};

export type DestroyPileResult = {
  removedWorktree: string | null;
  deletedBranch: boolean;
  clearedConfig: boolean;
};

const EXCLUDE_MARKER = "# patchpile worktree";

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolvePileDir(repoRoot: string, config: Pick<PileConfig, "dir">): string {
  return path.resolve(repoRoot, config.dir);
}

export async function initPile(repoRoot: string, config: PileConfig): Promise<InitPileResult> {
  await writePileConfig(repoRoot, config);

  let branchCreated = false;
  if (!(await branchExists(repoRoot, config.branch))) {
    const baseTip = await resolveCommit(repoRoot, config.baseBranch);
    if (!baseTip) {
      throw new ConfigError(`Base branch ${config.baseBranch} does not resolve to a commit.`);
    }
    await createEmptyPileBranch(repoRoot, config.branch, baseTip);
    branchCreated = true;
  }

  const pileDir = resolvePileDir(repoRoot, config);
  let worktreeAdded = false;
  if (!(await pathExists(pileDir))) {
    await ensureDir(path.dirname(pileDir));
    await addBranchWorktree(repoRoot, pileDir, config.branch);
    await excludeFromRepo(repoRoot, pileDir);
    worktreeAdded = true;
  }

  return { pileDir, branchCreated, worktreeAdded };
}

export async function destroyPile(repoRoot: string, config: PileConfig): Promise<DestroyPileResult> {
  const pileDir = resolvePileDir(repoRoot, config);

  let removedWorktree: string | null = null;
  const worktrees = await listWorktrees(repoRoot);
  const pileWorktree = worktrees.find(
    (entry) => path.resolve(entry.path) === pileDir || entry.branch === config.branch,
  );
  if (pileWorktree) {
    await removeWorktree(repoRoot, pileWorktree.path);
    removedWorktree = pileWorktree.path;
  }

  let deletedBranch = false;
  if (await branchExists(repoRoot, config.branch)) {
    await deleteBranch(repoRoot, config.branch);
    deletedBranch = true;
  }

  const res = await git(repoRoot, ["config", "--remove-section", "pile"], { reject: false });
  return { removedWorktree, deletedBranch, clearedConfig: res.exitCode === 0 };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function writePileConfig(repoRoot: string, config: PileConfig): Promise<void> {
  const entries: Array<[string, string | undefined]> = [
    ["pile.dir", config.dir],
    ["pile.branch", config.branch],
    ["pile.base-branch", config.baseBranch],
    ["pile.result-branch", config.resultBranch],
    ["pile.remote-branch", config.remoteBranch],
  ];

  for (const [key, value] of entries) {
    if (value === undefined) continue;
    await git(repoRoot, ["config", key, value]);
  }
}

/**
 * Builds the first pile commit straight from blobs so the user's checkout and
 * index are never touched.
 */
async function createEmptyPileBranch(
  repoRoot: string,
  branch: string,
  baseline: string,
): Promise<void> {
  const recordBlob = await hashBlob(repoRoot, formatBaselineRecord(baseline));
  const seriesBlob = await hashBlob(repoRoot, formatSeries([]));

  const treeInput = [
    `100644 blob ${recordBlob}\t${PILE_RECORD_FILE}`,
    `100644 blob ${seriesBlob}\t${SERIES_FILE}`,
  ].join("\n");
  const tree = (await git(repoRoot, ["mktree"], { input: `${treeInput}\n` })).stdout.trim();

  const commit = (
    await git(repoRoot, ["commit-tree", tree, "-m", "Initialize patch pile"])
  ).stdout.trim();
  await git(repoRoot, ["branch", branch, commit]);
}

async function hashBlob(repoRoot: string, content: string): Promise<string> {
  const res = await git(repoRoot, ["hash-object", "-w", "--stdin"], { input: content });
  return res.stdout.trim();
}

async function excludeFromRepo(repoRoot: string, pileDir: string): Promise<void> {
  const relative = path.relative(repoRoot, pileDir);
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) return;

  const excludePath = path.join(await gitCommonDir(repoRoot), "info", "exclude");
  const pattern = `/${relative.split(path.sep).join("/")}/`;

  let existing = "";
  if (await pathExists(excludePath)) {
    existing = await fse.readFile(excludePath, "utf8");
  }

  const existingLines = existing
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (existingLines.includes(pattern)) return;

  const pieces: string[] = [existing.trimEnd()];
  if (!existing.includes(EXCLUDE_MARKER)) {
    pieces.push(EXCLUDE_MARKER);
  }
  pieces.push(pattern);

  const next = pieces.filter((part) => part.length > 0).join("\n") + "\n";
  await fse.ensureDir(path.dirname(excludePath));
  await fse.writeFile(excludePath, next, "utf8");
}
