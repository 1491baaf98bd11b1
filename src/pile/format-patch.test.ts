import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createPileFixture, type PileFixture } from "../__tests__/helpers/pile-fixture.js";
import { NoChangesError, UnexpectedDiffStateError } from "../core/errors.js";
import { pathExists } from "../core/utils.js";
import { git } from "../git/git.js";

import { initPile } from "./bootstrap.js";
import { COVER_LETTER_FILE } from "./cover-letter.js";
import {
  extractChangedPatches,
  formatSendNumber,
  orderBySeries,
  selectChangedPatches,
} from "./format-patch.js";
import { generatePatches } from "./genpatches.js";

const SEND_DATE = new Date(Date.UTC(2026, 9, 19, 9, 30, 0));

// =============================================================================
// PURE HELPERS
// =============================================================================

describe("selectChangedPatches", () => {
  it("keeps added, renamed, copied, modified and type-changed patch files", () => {
    const selected = selectChangedPatches([
      { status: "M", path: "series" },
      { status: "D", path: "Old.patch" },
      { status: "R", oldPath: "Before.patch", path: "After.patch" },
      { status: "A", path: "New.patch" },
      { status: "C", oldPath: "New.patch", path: "Copy.patch" },
      { status: "M", path: "Changed.patch" },
      { status: "T", path: "Linked.patch" },
    ]);

    expect(selected).toEqual([
      "After.patch",
      "New.patch",
      "Copy.patch",
      "Changed.patch",
      "Linked.patch",
    ]);
  });

  it("rejects unknown status letters", () => {
    expect(() => selectChangedPatches([{ status: "U", path: "Conflicted.patch" }])).toThrow(
      UnexpectedDiffStateError,
    );
  });
});

describe("orderBySeries", () => {
  it("orders by series position and puts unknown names first", () => {
    const ordered = orderBySeries(
      ["c.patch", "new.patch", "a.patch"],
      ["a.patch", "b.patch", "c.patch"],
    );

    expect(ordered).toEqual(["new.patch", "a.patch", "c.patch"]);
  });
});

describe("formatSendNumber", () => {
  it("pads to four digits", () => {
    expect(formatSendNumber(1)).toBe("0001");
    expect(formatSendNumber(12)).toBe("0012");
  });
});

// =============================================================================
// EXTRACTION
// =============================================================================

describe("extractChangedPatches", () => {
  let fixture: PileFixture;
  let pileDir: string;
  let outputDir: string;

  beforeEach(async () => {
    fixture = await createPileFixture();
    const init = await initPile(fixture.repo.repoDir, {
      dir: "pile",
      branch: "pile",
      baseBranch: "master",
      resultBranch: "internal",
    });
    pileDir = init.pileDir;

    await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic"),
      destDir: pileDir,
    });
    await git(pileDir, ["add", "--all"]);
    await git(pileDir, ["commit", "--quiet", "-m", "Update pile"]);

    outputDir = path.join(fixture.repo.root, "out");
  });

  afterEach(async () => {
    await fixture.repo.cleanup();
  });

  async function extract() {
    return extractChangedPatches({
      vcs: fixture.vcs,
      pileBranch: "pile",
      range: await fixture.range("master..topic"),
      outputDir,
      date: SEND_DATE,
    });
  }

  it("emits only the patch that changed plus a cover letter", async () => {
    await fixture.repo.writeFile("b.txt", "two v2\n");
    await fixture.repo.git(["commit", "--quiet", "--amend", "--all", "--no-edit"]);
    const pileBefore = await fixture.readDir(pileDir);

    const result = await extract();

    expect(result.sources).toEqual(["Add-feature.patch"]);
    expect(result.patches).toEqual([path.join(outputDir, "0001-Add-feature.patch")]);
    expect(result.coverLetter).toBe(path.join(outputDir, COVER_LETTER_FILE));
    expect((await fs.readdir(outputDir)).sort()).toEqual([
      "0000-cover-letter.patch",
      "0001-Add-feature.patch",
    ]);

    const patch = await fs.readFile(result.patches[0], "utf8");
    expect(patch).toContain("\nSubject: [PATCH] Add feature\n");
    expect(patch).toContain("\n+two v2\n");

    const cover = (await fs.readFile(result.coverLetter, "utf8")).split("\n");
    expect(cover.slice(0, 8)).toEqual([
      "From 0000000000000000000000000000000000000000 Mon Sep 17 00:00:00 2001",
      "From: Pile Tester <pile-tester@example.com>",
      "Date: Mon, 19 Oct 2026 09:30:00 +0000",
      "Subject: [PATCH 0/1] *** SUBJECT HERE ***",
      "",
      "*** BLURB HERE ***",
      "",
      "---",
    ]);
    expect(cover[8]).toBe("diff --git a/Add-feature.patch b/Add-feature.patch");
    expect(cover.at(-2)).toBe(`base-commit: ${fixture.base}`);

    expect(await fixture.readDir(pileDir)).toEqual(pileBefore);
  });

  it("emits a newly added patch", async () => {
    await fixture.repo.writeFile("docs.md", "docs\n");
    await fixture.repo.commit("Add docs");

    const result = await extract();

    expect(result.sources).toEqual(["Add-docs.patch"]);
    expect(result.patches).toEqual([path.join(outputDir, "0001-Add-docs.patch")]);
  });

  it("numbers several changed patches in series order", async () => {
    await fixture.repo.git(["reset", "--quiet", "--hard", "master"]);
    await fixture.repo.writeFile("a.txt", "one v2\n");
    await fixture.repo.commit("Fix bug");
    await fixture.repo.writeFile("b.txt", "two v2\n");
    await fixture.repo.commit("Add feature");

    const result = await extract();

    expect(result.sources).toEqual(["Fix-bug.patch", "Add-feature.patch"]);
    expect(result.patches).toEqual([
      path.join(outputDir, "0001-Fix-bug.patch"),
      path.join(outputDir, "0002-Add-feature.patch"),
    ]);
    const cover = await fs.readFile(result.coverLetter, "utf8");
    expect(cover.split("\n")[3]).toBe("Subject: [PATCH 0/2] *** SUBJECT HERE ***");
  });

  it("fails with NoChangesError when the pile is already up to date", async () => {
    await expect(extract()).rejects.toBeInstanceOf(NoChangesError);
    expect(await pathExists(outputDir)).toBe(false);
  });
});
