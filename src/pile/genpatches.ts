import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import { EmptyRangeError, PileError, PilePermissionError } from "../core/errors.js";
import { logPileEvent, type JsonlLogger } from "../core/logger.js";
import { ensureDir, isPermissionError, pathExists } from "../core/utils.js";

import { PILE_RECORD_FILE, recordBaseline } from "./baseline.js";
import { PatchNameAllocator, stripSeriesNumber } from "./naming.js";
import { formatRange, type CommitRange } from "./range.js";
import { SERIES_FILE, isPatchFileName, readSeries, writeSeries } from "./series.js";
import type { PileVcs } from "./vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type GeneratePatchesOptions = {
  vcs: PileVcs;
  range: CommitRange;
  destDir: string;
  /** Suffixes tried per colliding name. Defaults to the number of commits. */
  namingRetryLimit?: number;
  logger?: JsonlLogger;
};

export type GeneratePatchesResult = {
  destDir: string;
  patches: string[];
  baseline: string;
};

export type PileDestinationState = "missing" | "empty" | "pile" | "foreign";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Regenerates the pile in `destDir` from `range`. Patches are rendered and named
 * in a private staging directory; `destDir` is only touched once all of them
 * exist.
 */
export async function generatePatches(opts: GeneratePatchesOptions): Promise<GeneratePatchesResult> {
  const { vcs, range, logger } = opts;
  const destDir = path.resolve(opts.destDir);

  const commits = await vcs.listCommits(range.base, range.result);
  if (commits.length === 0) {
    throw new EmptyRangeError(formatRange(range));
  }

  logPileEvent(logger, "genpatches.start", {
    range: formatRange(range),
    base: range.base,
    result: range.result,
    commits: commits.length,
    dest: destDir,
  });

  const stagingRoot = await fs.mkdtemp(path.join(os.tmpdir(), "patchpile-stage-"));
  try {
    const renderedDir = path.join(stagingRoot, "rendered");
    const namedDir = path.join(stagingRoot, "named");
    await ensureDir(renderedDir);
    await ensureDir(namedDir);

    const rendered = await vcs.renderPatches(range.base, range.result, renderedDir);
    if (rendered.length !== commits.length) {
      throw new PileError(
        `Expected ${commits.length} patches for ${formatRange(range)}, got ${rendered.length}.`,
      );
    }

    const allocator = new PatchNameAllocator(opts.namingRetryLimit ?? commits.length);
    const names: string[] = [];
    for (const file of rendered) {
      const name = allocator.allocate(stripSeriesNumber(path.basename(file)));
      await fse.move(file, path.join(namedDir, name));
      names.push(name);
    }

    await replacePileContents({ destDir, stagedDir: namedDir, names, baseline: range.base });

    logPileEvent(logger, "genpatches.complete", { dest: destDir, patches: names.length });
    return { destDir, patches: names, baseline: range.base };
  } finally {
    await fse.remove(stagingRoot);
  }
}

export async function inspectPileDestination(destDir: string): Promise<PileDestinationState> {
  if (!(await pathExists(destDir))) return "missing";
  if (await pathExists(path.join(destDir, SERIES_FILE))) return "pile";

  const entries = await fs.readdir(destDir);
  const visible = entries.filter((entry) => entry !== ".git");
  return visible.length === 0 ? "empty" : "foreign";
}

// =============================================================================
// INTERNALS
// =============================================================================

async function replacePileContents(input: {
  destDir: string;
  stagedDir: string;
  names: string[];
  baseline: string;
}): Promise<void> {
  const { destDir, stagedDir, names, baseline } = input;
  let currentPath = destDir;

  try {
    await ensureDir(destDir);

    for (const name of await listTrackedPatches(destDir)) {
      currentPath = path.join(destDir, name);
      await fse.remove(currentPath);
    }

    for (const name of names) {
      currentPath = path.join(destDir, name);
      await fse.copy(path.join(stagedDir, name), currentPath);
    }

    // Manifest and baseline go last, each renamed into place.
    currentPath = path.join(destDir, SERIES_FILE);
    await writeSeries(destDir, names);
    currentPath = path.join(destDir, PILE_RECORD_FILE);
    await recordBaseline(destDir, baseline);
  } catch (err) {
    if (isPermissionError(err)) {
      throw new PilePermissionError(currentPath, err);
    }
    throw err;
  }
}

async function listTrackedPatches(destDir: string): Promise<string[]> {
  const tracked = new Set<string>();

  for (const name of (await readSeries(destDir)) ?? []) {
    if (isPatchFileName(name) && (await pathExists(path.join(destDir, name)))) {
      tracked.add(name);
    }
  }

  for (const entry of await fs.readdir(destDir, { withFileTypes: true })) {
    if (entry.isFile() && isPatchFileName(entry.name)) {
      tracked.add(entry.name);
    }
  }

  return Array.from(tracked).sort();
}
