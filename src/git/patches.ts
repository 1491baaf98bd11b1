import path from "node:path";

import { git, splitLines } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type DiffStatusEntry = {
  /** Status letter as printed by `git diff --name-status` (score stripped). */
  status: string;
  /** Path after the change; the destination for renames and copies. */
  path: string;
  oldPath?: string;
};

export type ApplyOutcome = { ok: true } | { ok: false; output: string };

// Options that would otherwise change on every regeneration or follow the
// user's `format.*` config: the commit id in the mbox "From" line, the version
// signature, "[PATCH n/m]" numbering, generated Message-Ids, auto base-commit
// footers and the file suffix.
const STABLE_FORMAT_PATCH_ARGS = [
  "--zero-commit",
  "--no-signature",
  "--no-numbered",
  "--no-thread",
  "--no-cover-letter",
  "--no-base",
  "--suffix=.patch",
];

// =============================================================================
// PATCH RENDERING / APPLICATION
// =============================================================================

/**
 * Renders `(base, result]` into `outDir`, one file per commit, and returns the
 * absolute paths in series order.
 */
export async function formatPatches(
  cwd: string,
  base: string,
  result: string,
  outDir: string,
): Promise<string[]> {
  const res = await git(cwd, [
    "format-patch",
    ...STABLE_FORMAT_PATCH_ARGS,
    "--output-directory",
    outDir,
    `${base}..${result}`,
  ]);
  return splitLines(res.stdout).map((file) => path.resolve(cwd, file));
}

export async function applyMailbox(worktreeRoot: string, patchPath: string): Promise<ApplyOutcome> {
  const res = await git(worktreeRoot, ["am", "--quiet", patchPath], { reject: false });
  if (res.exitCode === 0) return { ok: true };
  return { ok: false, output: [res.stdout, res.stderr].filter(Boolean).join("\n").trim() };
}

// =============================================================================
// STAGED DIFF
// =============================================================================

export async function stageAll(worktreeRoot: string): Promise<void> {
  await git(worktreeRoot, ["add", "--all"]);
}

export async function diffStagedStatus(worktreeRoot: string): Promise<DiffStatusEntry[]> {
  const res = await git(worktreeRoot, ["diff", "--cached", "--find-renames", "--name-status"]);
  return parseNameStatus(res.stdout);
}

export async function diffStagedText(worktreeRoot: string): Promise<string> {
  const res = await git(worktreeRoot, ["diff", "--cached", "--find-renames"]);
  return res.stdout;
}

export function parseNameStatus(output: string): DiffStatusEntry[] {
  const entries: DiffStatusEntry[] = [];

  for (const line of output.split("\n")) {
    if (line.trim().length === 0) continue;

    const fields = line.split("\t");
    const status = fields[0].trim().charAt(0);
    if (fields.length >= 3) {
      entries.push({ status, oldPath: fields[1], path: fields[2] });
    } else if (fields.length === 2) {
      entries.push({ status, path: fields[1] });
    }
  }

  return entries;
}
