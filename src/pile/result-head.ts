import path from "node:path";

import { pathExists, readTextFile, writeTextFileAtomic } from "../core/utils.js";

import type { PileVcs } from "./vcs.js";

// Lives in the common git dir, outside refs/, so branch updates never touch it.
export const RESULT_HEAD_FILE = "PILE_RESULT_HEAD";

export async function resultHeadPath(vcs: PileVcs): Promise<string> {
  return path.join(await vcs.commonDir(), RESULT_HEAD_FILE);
}

export async function writeResultHead(vcs: PileVcs, commit: string): Promise<string> {
  const filePath = await resultHeadPath(vcs);
  await writeTextFileAtomic(filePath, `${commit}\n`);
  return filePath;
}

export async function readResultHead(vcs: PileVcs): Promise<string | null> {
  const filePath = await resultHeadPath(vcs);
  if (!(await pathExists(filePath))) return null;
  const value = (await readTextFile(filePath)).trim();
  return value.length > 0 ? value : null;
}
