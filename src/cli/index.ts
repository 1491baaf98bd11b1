import { Command } from "commander";

import type { PileContext } from "../app/context.js";

import { loadPileContextForCli } from "./config.js";
import { destroyCommand } from "./destroy.js";
import { formatPatchCommand } from "./format-patch.js";
import { genbranchCommand } from "./genbranch.js";
import { genpatchesCommand } from "./genpatches.js";
import { initCommand } from "./init.js";

type InitFlags = {
  dir: string;
  branch: string;
  baseBranch: string;
  resultBranch: string;
  remoteBranch?: string;
};

type OutputFlags = {
  output?: string;
  force: boolean;
};

type GenbranchFlags = {
  branch?: string;
  verbose: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const withPileContext = async (fn: (ctx: PileContext) => Promise<unknown>): Promise<void> => {
    const ctx = await loadPileContextForCli();
    try {
      await fn(ctx);
    } finally {
      ctx.logger?.close();
    }
  };

  program
    .name("patchpile")
    .description("Keep a branch and a pile of patch files in sync")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces")
    .option("--no-debug", "Hide debug details on errors");

  program
    .command("init")
    .description("Configure the pile and create its branch and worktree")
    .option("-d, --dir <dir>", "Directory in which to place patches", "pile")
    .option("-b, --branch <branch>", "Branch that stores the pile", "pile")
    .option("-t, --base-branch <branch>", "Branch the patches apply on top of", "master")
    .option("-r, --result-branch <branch>", "Branch reconstructed from the pile", "internal")
    .option("--remote-branch <branch>", "Remote branch the pile is pushed to")
    .action(async (opts: InitFlags) => {
      await initCommand(opts);
    });

  program
    .command("genpatches")
    .description("Regenerate the pile from a commit range")
    .argument("[range]", "BASE..RESULT (default: <base-branch>..<result-branch>)")
    .option("-o, --output <dir>", "Write the pile to DIR instead of the configured directory")
    .option("-f, --force", "Write even into a non-empty directory that is not a pile", false)
    .action(async (range: string | undefined, opts: OutputFlags) => {
      await withPileContext((ctx) =>
        genpatchesCommand(ctx, { range, outputDir: opts.output, force: opts.force }),
      );
    });

  program
    .command("genbranch")
    .description("Rebuild the result branch by applying the pile on the base branch")
    .option("-b, --branch <branch>", "Branch to update (default: <result-branch>)")
    .option("-v, --verbose", "Print each patch as it is applied", false)
    .action(async (opts: GenbranchFlags) => {
      await withPileContext((ctx) =>
        genbranchCommand(ctx, { branch: opts.branch, verbose: opts.verbose }),
      );
    });

  program
    .command("format-patch")
    .description("Write the patches that changed since the recorded pile, plus a cover letter")
    .argument("[range]", "BASE..RESULT (default: <base-branch>..HEAD)")
    .option("-o, --output <dir>", "Output directory", "patches")
    .option("-f, --force", "Remove existing patch files from the output directory", false)
    .action(async (range: string | undefined, opts: OutputFlags) => {
      await withPileContext((ctx) =>
        formatPatchCommand(ctx, { range, outputDir: opts.output, force: opts.force }),
      );
    });

  program
    .command("destroy")
    .description("Remove the pile worktree, branch and configuration")
    .action(async () => {
      await withPileContext((ctx) => destroyCommand(ctx));
    });

  return program;
}
