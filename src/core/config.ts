import { z } from "zod";

// Keys live in git config under the `pile.` section, e.g. `pile.base-branch`.
export const PileConfigSchema = z.object({
  dir: z.string().min(1),
  branch: z.string().min(1),
  "base-branch": z.string().min(1).default("master"),
  "result-branch": z.string().min(1).default("internal"),
  "remote-branch": z.string().min(1).optional(),
});

export type PileConfigKey = keyof z.input<typeof PileConfigSchema>;

export type PileConfig = {
  /** Pile directory, relative to the repository root unless absolute. */
  dir: string;
  branch: string;
  baseBranch: string;
  resultBranch: string;
  remoteBranch?: string;
};

export function toPileConfig(parsed: z.output<typeof PileConfigSchema>): PileConfig {
  const config: PileConfig = {
    dir: parsed.dir,
    branch: parsed.branch,
    baseBranch: parsed["base-branch"],
    resultBranch: parsed["result-branch"],
  };
  if (parsed["remote-branch"]) {
    config.remoteBranch = parsed["remote-branch"];
  }
  return config;
}

export function isPileConfigKey(key: string): key is PileConfigKey {
  return key in PileConfigSchema.shape;
}
