import type { GitIdentity } from "../git/git.js";

export const COVER_LETTER_FILE = "0000-cover-letter.patch";

// Same mbox separator `git format-patch --zero-commit` emits.
const MBOX_FROM_LINE = "From 0000000000000000000000000000000000000000 Mon Sep 17 00:00:00 2001";

export type CoverLetterInput = {
  sender: GitIdentity;
  date: Date;
  patchCount: number;
  baseline: string;
  /** Staged diff of the pile, used as the changelog. */
  changelog: string;
};

/** RFC 2822 date in UTC, e.g. "Mon, 19 Oct 2026 09:30:00 +0000". */
export function formatMailDate(date: Date): string {
  return date.toUTCString().replace(/GMT$/, "+0000");
}

export function composeCoverLetter(input: CoverLetterInput): string {
  const lines = [
    MBOX_FROM_LINE,
    `From: ${input.sender.name} <${input.sender.email}>`,
    `Date: ${formatMailDate(input.date)}`,
    `Subject: [PATCH 0/${input.patchCount}] *** SUBJECT HERE ***`,
    "",
    "*** BLURB HERE ***",
    "",
    "---",
    input.changelog.trimEnd(),
    "",
    `base-commit: ${input.baseline}`,
  ];
  return lines.join("\n") + "\n";
}
