import { readPileConfigEntries } from "../core/config-loader.js";
import type { PileConfig } from "../core/config.js";
import { initPile, type InitPileResult } from "../pile/bootstrap.js";

import { resolveRepoRootForCli } from "./config.js";
import { normalizePileCommandError } from "./errors.js";

// =============================================================================
// INIT (repo-scoped bootstrap)
// =============================================================================

export type InitCommandOptions = {
  dir: string;
  branch: string;
  baseBranch: string;
  resultBranch: string;
  remoteBranch?: string;
  cwd?: string;
};

export async function initCommand(
  opts: InitCommandOptions,
): Promise<{ status: "created" | "exists"; result?: InitPileResult }> {
  const repoRoot = await resolveRepoRootForCli(opts.cwd);

  try {
    const existing = await readPileConfigEntries(repoRoot);
    if (existing.dir && existing.branch) {
      console.log(`Pile already initialized (dir=${existing.dir}, branch=${existing.branch})`);
      return { status: "exists" };
    }

    const config: PileConfig = {
      dir: opts.dir,
      branch: opts.branch,
      baseBranch: opts.baseBranch,
      resultBranch: opts.resultBranch,
    };
    if (opts.remoteBranch) {
      config.remoteBranch = opts.remoteBranch;
    }

    const result = await initPile(repoRoot, config);
    console.log(`Initialized pile in ${result.pileDir} (branch ${config.branch})`);
    if (!result.branchCreated) {
      console.log(`Reused existing branch ${config.branch}`);
    }
    return { status: "created", result };
  } catch (error) {
    throw normalizePileCommandError(error);
  }
}
