import path from "node:path";

import { pathExists, readTextFile, writeTextFileAtomic } from "../core/utils.js";

export const PILE_RECORD_FILE = "config";

const BASELINE_KEY = "BASELINE";

// =============================================================================
// PARSING
// =============================================================================

/**
 * Reads the baseline from the pile's `config` file. Only `BASELINE` is
 * recognized; comments, blank lines, unknown keys and malformed lines are
 * ignored. The last `BASELINE` line wins.
 */
export function parseBaselineRecord(text: string): string | null {
  let baseline: string | null = null;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) continue;

    const separator = line.indexOf("=");
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (key === BASELINE_KEY && value.length > 0) {
      baseline = value;
    }
  }

  return baseline;
}

export function formatBaselineRecord(commit: string): string {
  return `${BASELINE_KEY}=${commit}\n`;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function readBaseline(pileDir: string): Promise<string | null> {
  const recordPath = path.join(pileDir, PILE_RECORD_FILE);
  if (!(await pathExists(recordPath))) return null;
  return parseBaselineRecord(await readTextFile(recordPath));
}

export async function recordBaseline(pileDir: string, commit: string): Promise<void> {
  await writeTextFileAtomic(path.join(pileDir, PILE_RECORD_FILE), formatBaselineRecord(commit));
}
