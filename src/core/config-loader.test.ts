import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempGitRepo, type TempGitRepo } from "../__tests__/helpers/temp-git-repo.js";

import { loadPileConfig, parseGitConfigListing, parsePileConfig } from "./config-loader.js";
import { ConfigError } from "./errors.js";

describe("parseGitConfigListing", () => {
  it("strips the section prefix and keeps the last duplicate", () => {
    const stdout = [
      "pile.dir patches",
      "pile.branch pile",
      "pile.base-branch main",
      "pile.base-branch upstream",
      "pile.empty",
      "other.key value",
      "",
    ].join("\n");

    expect(parseGitConfigListing(stdout)).toEqual({
      dir: "patches",
      branch: "pile",
      "base-branch": "upstream",
    });
  });

  it("keeps spaces inside values", () => {
    expect(parseGitConfigListing("pile.dir my patches\n")).toEqual({ dir: "my patches" });
  });
});

describe("parsePileConfig", () => {
  it("applies defaults for optional branches", () => {
    const loaded = parsePileConfig({ dir: "patches", branch: "pile" });

    expect(loaded).toEqual({
      config: {
        dir: "patches",
        branch: "pile",
        baseBranch: "master",
        resultBranch: "internal",
      },
      ignoredKeys: [],
    });
  });

  it("maps every known key and reports unknown ones", () => {
    const loaded = parsePileConfig({
      dir: "patches",
      branch: "pile",
      "base-branch": "main",
      "result-branch": "downstream",
      "remote-branch": "origin/main",
      colour: "blue",
    });

    expect(loaded.config).toEqual({
      dir: "patches",
      branch: "pile",
      baseBranch: "main",
      resultBranch: "downstream",
      remoteBranch: "origin/main",
    });
    expect(loaded.ignoredKeys).toEqual(["colour"]);
  });

  it("reads the base branch from tracking-branch when base-branch is absent", () => {
    const loaded = parsePileConfig({ dir: "patches", branch: "pile", "tracking-branch": "main" });

    expect(loaded.config.baseBranch).toBe("main");
    expect(loaded.ignoredKeys).toEqual([]);
  });

  it("prefers base-branch over tracking-branch", () => {
    const loaded = parsePileConfig({
      dir: "patches",
      branch: "pile",
      "tracking-branch": "old",
      "base-branch": "new",
    });

    expect(loaded.config.baseBranch).toBe("new");
  });

  it("lists every missing required key", () => {
    expect(() => parsePileConfig({})).toThrow(
      "Pile is not initialized or its configuration is incomplete:\npile.dir: missing\npile.branch: missing",
    );
  });
});

describe("loadPileConfig", () => {
  let repo: TempGitRepo;

  beforeEach(async () => {
    repo = await createTempGitRepo();
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  it("reads pile keys from the repository's git config", async () => {
    await repo.git(["config", "pile.dir", "patches"]);
    await repo.git(["config", "pile.branch", "pile"]);
    await repo.git(["config", "pile.result-branch", "downstream"]);

    const loaded = await loadPileConfig(repo.repoDir);

    expect(loaded.config).toEqual({
      dir: "patches",
      branch: "pile",
      baseBranch: "master",
      resultBranch: "downstream",
    });
  });

  it("fails with ConfigError when the pile was never initialized", async () => {
    await expect(loadPileConfig(repo.repoDir)).rejects.toBeInstanceOf(ConfigError);
  });
});
