/**
 * PileContext carries the repo, validated config and collaborators into every command.
 * Purpose: keep configuration explicit instead of read from globals per use.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createPileContext({ repoRoot, config, logger }).
 */

import type { PileConfig } from "../core/config.js";
import type { JsonlLogger } from "../core/logger.js";
import { createGitVcs } from "../git/git-vcs.js";
import { resolvePileDir } from "../pile/bootstrap.js";
import type { PileVcs } from "../pile/vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type PileContext = {
  repoRoot: string;
  config: PileConfig;
  pileDir: string;
  vcs: PileVcs;
  logger?: JsonlLogger;
};

export type CreatePileContextInput = {
  repoRoot: string;
  config: PileConfig;
  logger?: JsonlLogger;
  vcs?: PileVcs;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createPileContext(input: CreatePileContextInput): PileContext {
  const vcs = input.vcs ?? createGitVcs({ repoRoot: input.repoRoot });
  return {
    repoRoot: vcs.repoRoot,
    config: input.config,
    pileDir: resolvePileDir(vcs.repoRoot, input.config),
    vcs,
    logger: input.logger,
  };
}
