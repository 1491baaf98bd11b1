import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createPileFixture, type PileFixture } from "../__tests__/helpers/pile-fixture.js";
import { EmptyRangeError, PatchNamingExhaustedError } from "../core/errors.js";
import { pathExists } from "../core/utils.js";

import { generatePatches, inspectPileDestination } from "./genpatches.js";
import { SERIES_HEADER } from "./series.js";

let fixture: PileFixture;
let pileDir: string;

beforeEach(async () => {
  fixture = await createPileFixture();
  pileDir = path.join(fixture.repo.root, "pile");
});

afterEach(async () => {
  await fixture.repo.cleanup();
});

// =============================================================================
// HELPERS
// =============================================================================

async function commitSameSubject(branch: string, count: number): Promise<void> {
  await fixture.repo.git(["checkout", "--quiet", "-b", branch, "master"]);
  for (let i = 0; i < count; i += 1) {
    await fixture.repo.writeFile(`dup-${i}.txt`, `${i}\n`);
    await fixture.repo.commit("Same subject");
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe("generatePatches", () => {
  it("writes one patch per commit, a manifest in commit order and the baseline", async () => {
    const range = await fixture.range("master..topic");

    const result = await generatePatches({ vcs: fixture.vcs, range, destDir: pileDir });

    expect(result.patches).toEqual(["Fix-bug.patch", "Add-feature.patch"]);
    expect(result.baseline).toBe(fixture.base);

    const files = await fixture.readDir(pileDir);
    expect(Object.keys(files).sort()).toEqual([
      "Add-feature.patch",
      "Fix-bug.patch",
      "config",
      "series",
    ]);
    expect(files.series).toBe(`${SERIES_HEADER}\nFix-bug.patch\nAdd-feature.patch\n`);
    expect(files.config).toBe(`BASELINE=${fixture.base}\n`);
    expect(files["Fix-bug.patch"].split("\n")[0]).toBe(
      "From 0000000000000000000000000000000000000000 Mon Sep 17 00:00:00 2001",
    );
    expect(files["Fix-bug.patch"]).toContain("\nSubject: [PATCH] Fix bug\n");
  });

  it("produces byte-identical output when regenerated for the same range", async () => {
    const range = await fixture.range("master..topic");

    await generatePatches({ vcs: fixture.vcs, range, destDir: pileDir });
    const first = await fixture.readDir(pileDir);

    await generatePatches({ vcs: fixture.vcs, range, destDir: pileDir });
    const second = await fixture.readDir(pileDir);

    expect(second).toEqual(first);
    expect(first["Add-feature.patch"]).not.toMatch(/^-- $/m);
  });

  it("gives commits with identical subjects distinct file names", async () => {
    await commitSameSubject("dups", 2);
    const range = await fixture.range("master..dups");

    const result = await generatePatches({ vcs: fixture.vcs, range, destDir: pileDir });

    expect(result.patches).toEqual(["Same-subject.patch", "Same-subject-1.patch"]);
    const files = await fixture.readDir(pileDir);
    expect(files["Same-subject.patch"]).toContain("dup-0.txt");
    expect(files["Same-subject-1.patch"]).toContain("dup-1.txt");
  });

  it("fails naming exhaustion without touching the existing pile", async () => {
    await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic"),
      destDir: pileDir,
    });
    const before = await fixture.readDir(pileDir);

    await commitSameSubject("dups", 3);
    const range = await fixture.range("master..dups");

    await expect(
      generatePatches({ vcs: fixture.vcs, range, destDir: pileDir, namingRetryLimit: 1 }),
    ).rejects.toBeInstanceOf(PatchNamingExhaustedError);

    expect(await fixture.readDir(pileDir)).toEqual(before);
  });

  it("rejects an empty range before creating the destination", async () => {
    const range = await fixture.range("topic..topic");

    await expect(
      generatePatches({ vcs: fixture.vcs, range, destDir: pileDir }),
    ).rejects.toBeInstanceOf(EmptyRangeError);

    expect(await pathExists(pileDir)).toBe(false);
  });

  it("removes patches that are no longer part of the series", async () => {
    await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic"),
      destDir: pileDir,
    });
    await fs.writeFile(path.join(pileDir, "Stray.patch"), "stray\n", "utf8");
    await fs.writeFile(path.join(pileDir, "NOTES"), "keep me\n", "utf8");

    const result = await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic~1"),
      destDir: pileDir,
    });

    expect(result.patches).toEqual(["Fix-bug.patch"]);
    const files = await fixture.readDir(pileDir);
    expect(Object.keys(files).sort()).toEqual(["Fix-bug.patch", "NOTES", "config", "series"]);
    expect(files.series).toBe(`${SERIES_HEADER}\nFix-bug.patch\n`);
  });
});

describe("generatePatches with user format config", () => {
  it("ignores format.suffix and removes stale patches on regeneration", async () => {
    await fixture.repo.git(["config", "format.suffix", ".diff"]);

    const first = await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic"),
      destDir: pileDir,
    });
    expect(first.patches).toEqual(["Fix-bug.patch", "Add-feature.patch"]);

    await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic~1"),
      destDir: pileDir,
    });

    const files = await fixture.readDir(pileDir);
    expect(Object.keys(files).sort()).toEqual(["Fix-bug.patch", "config", "series"]);
    expect(files.series).toBe(`${SERIES_HEADER}\nFix-bug.patch\n`);
  });

  it("ignores format.useAutoBase", async () => {
    await fixture.repo.git(["config", "format.useAutoBase", "true"]);

    await generatePatches({
      vcs: fixture.vcs,
      range: await fixture.range("master..topic"),
      destDir: pileDir,
    });

    const files = await fixture.readDir(pileDir);
    expect(files["Fix-bug.patch"]).not.toContain("base-commit:");
  });
});

describe("inspectPileDestination", () => {
  it("classifies missing, empty, pile and foreign directories", async () => {
    expect(await inspectPileDestination(pileDir)).toBe("missing");

    await fs.mkdir(pileDir);
    expect(await inspectPileDestination(pileDir)).toBe("empty");

    await fs.writeFile(path.join(pileDir, "other.txt"), "x\n", "utf8");
    expect(await inspectPileDestination(pileDir)).toBe("foreign");

    await fs.writeFile(path.join(pileDir, "series"), `${SERIES_HEADER}\n`, "utf8");
    expect(await inspectPileDestination(pileDir)).toBe("pile");
  });
});
