import path from "node:path";

import fse from "fs-extra";

import { NoChangesError, UnexpectedDiffStateError } from "../core/errors.js";
import { logPileEvent, type JsonlLogger } from "../core/logger.js";
import { ensureDir, writeTextFileAtomic } from "../core/utils.js";
import type { DiffStatusEntry } from "../git/patches.js";

import { COVER_LETTER_FILE, composeCoverLetter } from "./cover-letter.js";
import { generatePatches } from "./genpatches.js";
import { formatRange, type CommitRange } from "./range.js";
import { isPatchFileName, readSeries } from "./series.js";
import type { PileVcs } from "./vcs.js";
import { withWorkspace } from "./workspace.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExtractChangedPatchesOptions = {
  vcs: PileVcs;
  /** Branch holding the last recorded pile state. */
  pileBranch: string;
  range: CommitRange;
  outputDir: string;
  date?: Date;
  logger?: JsonlLogger;
  onWarning?: (message: string) => void;
};

export type ExtractChangedPatchesResult = {
  coverLetter: string;
  /** Written patch paths in send order, cover letter excluded. */
  patches: string[];
  /** Pile names the written patches were taken from, same order. */
  sources: string[];
};

// Added, Renamed, Copied, Modified, Type-changed.
const EMITTED_STATUSES = new Set(["A", "R", "C", "M", "T"]);

const NUMBER_WIDTH = 4;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Regenerates the pile for `range` on top of the recorded pile branch and writes
 * only the patches that changed, numbered for sending, plus a cover letter.
 */
export async function extractChangedPatches(
  opts: ExtractChangedPatchesOptions,
): Promise<ExtractChangedPatchesResult> {
  const { vcs, range, logger } = opts;
  const outputDir = path.resolve(opts.outputDir);

  const result = await withWorkspace(
    vcs,
    opts.pileBranch,
    async (workspace) => {
      await generatePatches({ vcs, range, destDir: workspace.root, logger });
      await vcs.stageAll(workspace.root);

      const changed = selectChangedPatches(await vcs.diffStagedStatus(workspace.root));
      if (changed.length === 0) {
        throw new NoChangesError();
      }

      const series = (await readSeries(workspace.root)) ?? [];
      const ordered = orderBySeries(changed, series);
      const changelog = await vcs.diffStagedText(workspace.root);

      await ensureDir(outputDir);
      const patches: string[] = [];
      for (const [index, name] of ordered.entries()) {
        const target = path.join(outputDir, `${formatSendNumber(index + 1)}-${name}`);
        await fse.copy(path.join(workspace.root, name), target);
        patches.push(target);
      }

      const coverLetter = path.join(outputDir, COVER_LETTER_FILE);
      const text = composeCoverLetter({
        sender: await vcs.currentIdentity(),
        date: opts.date ?? new Date(),
        patchCount: ordered.length,
        baseline: range.base,
        changelog,
      });
      await writeTextFileAtomic(coverLetter, text);

      return { coverLetter, patches, sources: ordered };
    },
    { logger, onWarning: opts.onWarning },
  );

  logPileEvent(logger, "format_patch.complete", {
    range: formatRange(range),
    output: outputDir,
    patches: result.patches.length,
  });
  return result;
}

/**
 * Keeps added or changed patch documents. Deletions are implied by the series
 * diff and other files are not sent.
 */
export function selectChangedPatches(entries: DiffStatusEntry[]): string[] {
  const selected: string[] = [];

  for (const entry of entries) {
    if (entry.status === "D") continue;
    if (!EMITTED_STATUSES.has(entry.status)) {
      throw new UnexpectedDiffStateError(entry.status, entry.path);
    }
    if (!isPatchFileName(entry.path)) continue;
    selected.push(entry.path);
  }

  return selected;
}

/**
 * Sorts by 1-based position in `series`; names missing from it get position 0
 * and come first. Ties keep their input order.
 */
export function orderBySeries(fileNames: string[], series: string[]): string[] {
  const position = (name: string): number => series.indexOf(name) + 1;
  return [...fileNames].sort((a, b) => position(a) - position(b));
}

export function formatSendNumber(value: number): string {
  return String(value).padStart(NUMBER_WIDTH, "0");
}
