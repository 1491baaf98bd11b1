import type { ZodIssue } from "zod";

import { git } from "../git/git.js";

import {
  PileConfigSchema,
  isPileConfigKey,
  toPileConfig,
  type PileConfig,
  type PileConfigKey,
} from "./config.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedPileConfig = {
  config: PileConfig;
  /** `pile.*` keys present in git config that the schema does not know. */
  ignoredKeys: string[];
};

const SECTION_PREFIX = "pile.";

// Older piles store the base branch under its former name.
const KEY_ALIASES: Record<string, PileConfigKey> = {
  "tracking-branch": "base-branch",
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function readPileConfigEntries(repoRoot: string): Promise<Record<string, string>> {
  const res = await git(repoRoot, ["config", "--get-regexp", "^pile\\."], { reject: false });
  // Exit code 1 means no matching keys.
  if (res.exitCode === 1) return {};
  if (res.exitCode !== 0) {
    throw new ConfigError(`Failed to read pile configuration from git config: ${res.stderr}`);
  }
  return parseGitConfigListing(res.stdout);
}

export async function loadPileConfig(repoRoot: string): Promise<LoadedPileConfig> {
  const entries = await readPileConfigEntries(repoRoot);
  return parsePileConfig(entries);
}

export function parsePileConfig(entries: Record<string, string>): LoadedPileConfig {
  const ignoredKeys: string[] = [];
  const known: Record<string, string> = {};

  for (const [key, value] of Object.entries(entries)) {
    if (isPileConfigKey(key)) {
      known[key] = value;
    } else if (!(key in KEY_ALIASES)) {
      ignoredKeys.push(key);
    }
  }
  for (const [alias, key] of Object.entries(KEY_ALIASES)) {
    const value = entries[alias];
    if (value !== undefined && known[key] === undefined) {
      known[key] = value;
    }
  }

  const parsed = PileConfigSchema.safeParse(known);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Pile is not initialized or its configuration is incomplete:\n${details}`);
  }

  return { config: toPileConfig(parsed.data), ignoredKeys };
}

/**
 * Parses `git config --get-regexp` output ("pile.dir patches" per line) into a
 * record keyed without the section prefix. Later duplicates win, like git does.
 */
export function parseGitConfigListing(stdout: string): Record<string, string> {
  const entries: Record<string, string> = {};

  for (const rawLine of stdout.split("\n")) {
    const line = rawLine.trim();
    if (!line.startsWith(SECTION_PREFIX)) continue;

    const separator = line.indexOf(" ");
    const fullKey = separator === -1 ? line : line.slice(0, separator);
    const value = separator === -1 ? "" : line.slice(separator + 1).trim();
    const key = fullKey.slice(SECTION_PREFIX.length);
    if (key.length === 0 || value.length === 0) continue;

    entries[key] = value;
  }

  return entries;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? `pile.${issue.path.join(".")}` : "<root>";

      if (issue.code === "invalid_type" && issue.received === "undefined") {
        return `${location}: missing`;
      }
      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}
