import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultOperationId(now: Date = new Date()): string {
  // YYYYMMDD-HHMMSS
  const yyyy = now.getUTCFullYear();
  const mm = String(now.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(now.getUTCDate()).padStart(2, "0");
  const hh = String(now.getUTCHours()).padStart(2, "0");
  const mi = String(now.getUTCMinutes()).padStart(2, "0");
  const ss = String(now.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export async function readTextFile(filePath: string): Promise<string> {
  return fse.readFile(filePath, "utf8");
}

/**
 * Writes through a sibling temp file and renames it over the target, so readers
 * see either the old or the new contents.
 */
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.tmp-${process.pid}`;
  await fse.writeFile(tempPath, content, "utf8");
  await fse.rename(tempPath, filePath);
}

export async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fse.stat(filePath);
    if (!stat.isFile()) return false;
    await fse.access(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

export function isPermissionError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("code" in err)) return false;
  const code = err.code;
  return code === "EACCES" || code === "EPERM";
}
