import path from "node:path";

import { pathExists, readTextFile, writeTextFileAtomic } from "../core/utils.js";

export const SERIES_FILE = "series";

export const SERIES_HEADER =
  "# Patches in application order, one file name per line. Written by `patchpile genpatches`.";

export const PATCH_EXTENSION = ".patch";

export function isPatchFileName(fileName: string): boolean {
  return fileName.endsWith(PATCH_EXTENSION);
}

export function parseSeries(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export function formatSeries(fileNames: string[]): string {
  return [SERIES_HEADER, ...fileNames].join("\n") + "\n";
}

/** Returns null when the pile has no manifest yet. */
export async function readSeries(pileDir: string): Promise<string[] | null> {
  const seriesPath = path.join(pileDir, SERIES_FILE);
  if (!(await pathExists(seriesPath))) return null;
  return parseSeries(await readTextFile(seriesPath));
}

export async function writeSeries(pileDir: string, fileNames: string[]): Promise<void> {
  await writeTextFileAtomic(path.join(pileDir, SERIES_FILE), formatSeries(fileNames));
}
