import { InvalidRangeError } from "../core/errors.js";

import type { PileVcs } from "./vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type RangeRefs = {
  base: string;
  result: string;
};

export type CommitRange = {
  /** Resolved commit ids. */
  base: string;
  result: string;
  /** Refs as the caller named them, for messages. */
  baseRef: string;
  resultRef: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Splits "A..B" into its two refs. A missing range or an empty side falls back
 * to the caller's defaults.
 */
export function parseRangeSpec(input: string | undefined, defaults: RangeRefs): RangeRefs {
  const spec = input?.trim() ?? "";
  if (spec.length === 0) return { ...defaults };

  if (spec.includes("...")) {
    throw new InvalidRangeError(spec, `Symmetric-difference range "${spec}" is not supported.`);
  }

  const separator = spec.indexOf("..");
  if (separator === -1) {
    throw new InvalidRangeError(spec, `Range "${spec}" must have the form BASE..RESULT.`);
  }

  const base = spec.slice(0, separator).trim();
  const result = spec.slice(separator + 2).trim();

  return {
    base: base.length > 0 ? base : defaults.base,
    result: result.length > 0 ? result : defaults.result,
  };
}

export async function resolveCommitRange(
  vcs: PileVcs,
  input: string | undefined,
  defaults: RangeRefs,
): Promise<CommitRange> {
  const refs = parseRangeSpec(input, defaults);

  const base = await vcs.resolveCommit(refs.base);
  if (!base) throw new InvalidRangeError(refs.base);

  const result = await vcs.resolveCommit(refs.result);
  if (!result) throw new InvalidRangeError(refs.result);

  return { base, result, baseRef: refs.base, resultRef: refs.result };
}

export function formatRange(range: CommitRange): string {
  return `${range.baseRef}..${range.resultRef}`;
}
