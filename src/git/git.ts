import path from "node:path";

import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type GitIdentity = {
  name: string;
  email: string;
};

// =============================================================================
// COMMAND RUNNER
// =============================================================================

/**
 * Runs git with an argument vector. Throws GitError on a non-zero exit unless
 * `reject: false` is passed, in which case the caller inspects `exitCode`.
 */
export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: toText(res.stdout),
      stderr: toText(res.stderr),
      exitCode: res.exitCode,
    };
  } catch (err) {
    const { stdout, stderr, message } = resolveExecaErrorOutput(err);
    throw new GitError(
      `git ${args.join(" ")} failed (cwd=${cwd}): ${stderr || message}`,
      { stdout, stderr },
      err,
    );
  }
}

// =============================================================================
// REPOSITORY
// =============================================================================

export async function findRepoRoot(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--show-toplevel"]);
  return res.stdout.trim();
}

export async function gitCommonDir(repoRoot: string): Promise<string> {
  const res = await git(repoRoot, ["rev-parse", "--git-common-dir"]);
  return path.resolve(repoRoot, res.stdout.trim());
}

export async function headSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function resolveCommit(cwd: string, ref: string): Promise<string | null> {
  const res = await git(cwd, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], {
    reject: false,
  });
  if (res.exitCode !== 0) return null;
  const sha = res.stdout.trim();
  return sha.length > 0 ? sha : null;
}

export async function branchExists(cwd: string, branch: string): Promise<boolean> {
  const res = await git(cwd, ["show-ref", "--verify", "--quiet", `refs/heads/${branch}`], {
    reject: false,
  });
  return res.exitCode === 0;
}

export async function setBranch(cwd: string, branch: string, commit: string): Promise<void> {
  await git(cwd, ["branch", "--force", branch, commit]);
}

export async function deleteBranch(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["branch", "-D", branch]);
}

export async function listCommits(cwd: string, base: string, result: string): Promise<string[]> {
  const res = await git(cwd, ["rev-list", "--reverse", "--no-merges", `${base}..${result}`]);
  return splitLines(res.stdout);
}

export async function currentIdentity(cwd: string): Promise<GitIdentity> {
  const res = await git(cwd, ["var", "GIT_AUTHOR_IDENT"]);
  const match = /^(.*) <([^>]*)> \d+ [+-]\d{4}$/.exec(res.stdout.trim());
  if (!match) {
    throw new GitError(`Unable to parse git identity: ${res.stdout.trim()}`);
  }
  return { name: match[1], email: match[2] };
}

// =============================================================================
// HELPERS
// =============================================================================

export function splitLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

function resolveExecaErrorOutput(err: unknown): {
  stdout: string;
  stderr: string;
  message: string;
} {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: String(err) };
  }

  return {
    stdout: "stdout" in err ? toText(err.stdout) : "",
    stderr: "stderr" in err ? toText(err.stderr) : "",
    message: err instanceof Error ? err.message : "",
  };
}
