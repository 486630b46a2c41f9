/**
 * Tests for effective configuration resolution.
 */

import { describe, expect, it } from "vitest";
import { DEFAULT_BRANCH_RULES, DEFAULT_CONFIG } from "../src/config/defaults.js";
import { mergeBranchRules, resolveEffectiveConfig } from "../src/config/resolver.js";
import { ConfigError } from "../src/core/errors.js";

describe("resolveEffectiveConfig", () => {
  describe("built-in branch rules", () => {
    it("should release from main without a pre-release label", () => {
      const config = resolveEffectiveConfig({ branchName: "main" });

      expect(config.matchedRules).toEqual(["main"]);
      expect(config.preReleaseLabel).toBe("");
      expect(config.increment).toBe("Patch");
      expect(config.mode).toBe("ContinuousDelivery");
      expect(config.preventIncrementOfMergedBranchVersion).toBe(true);
    });

    it("should treat master like main", () => {
      expect(resolveEffectiveConfig({ branchName: "master" }).matchedRules).toEqual(["main"]);
    });

    it("should give develop an alpha label and a minor increment", () => {
      const config = resolveEffectiveConfig({ branchName: "develop" });

      expect(config.preReleaseLabel).toBe("alpha");
      expect(config.increment).toBe("Minor");
      expect(config.mode).toBe("ContinuousDeployment");
    });

    it("should label release branches beta", () => {
      const config = resolveEffectiveConfig({ branchName: "release/2.0.0" });

      expect(config.matchedRules).toEqual(["release"]);
      expect(config.preReleaseLabel).toBe("beta");
      expect(config.increment).toBe("Patch");
    });

    it("should expand {BranchName} without the rule prefix", () => {
      const config = resolveEffectiveConfig({ branchName: "feature/login-page" });

      expect(config.matchedRules).toEqual(["feature"]);
      expect(config.preReleaseLabel).toBe("login-page");
      expect(config.increment).toBe("Patch");
    });

    it("should escape the expanded branch name", () => {
      const config = resolveEffectiveConfig({ branchName: "features/JIRA_12.fix" });
      expect(config.preReleaseLabel).toBe("JIRA-12-fix");
    });

    it("should match branch rules case-insensitively", () => {
      const config = resolveEffectiveConfig({ branchName: "Feature/Search" });
      expect(config.matchedRules).toEqual(["feature"]);
      expect(config.preReleaseLabel).toBe("Search");
    });

    it("should normalize ref names before matching", () => {
      const config = resolveEffectiveConfig({ branchName: "refs/heads/hotfix/crash" });

      expect(config.branchName).toBe("hotfix/crash");
      expect(config.matchedRules).toEqual(["hotfix"]);
      expect(config.preReleaseLabel).toBe("beta");
    });

    it("should recognise pull request refs", () => {
      const config = resolveEffectiveConfig({ branchName: "refs/pull/12/merge" });

      expect(config.branchName).toBe("pull/12/merge");
      expect(config.matchedRules).toEqual(["pull-request"]);
      expect(config.preReleaseLabel).toBe("PullRequest");
    });

    it("should label a detached head without stray dashes", () => {
      const config = resolveEffectiveConfig({ branchName: "(no branch)" });
      expect(config.preReleaseLabel).toBe("no-branch");
    });

    it("should use the full branch name for unmatched branches", () => {
      const config = resolveEffectiveConfig({ branchName: "experiment" });

      expect(config.matchedRules).toEqual([]);
      expect(config.preReleaseLabel).toBe("experiment");
      expect(config.increment).toBe("Patch");
    });
  });

  describe("document layering", () => {
    it("should resolve Inherit to the global increment", () => {
      const config = resolveEffectiveConfig({
        branchName: "feature/x",
        document: { increment: "Minor" },
      });
      expect(config.increment).toBe("Minor");
    });

    it("should resolve Inherit to Patch when the global increment is Inherit too", () => {
      const config = resolveEffectiveConfig({
        branchName: "feature/x",
        document: { increment: "Inherit" },
      });
      expect(config.increment).toBe("Patch");
    });

    it("should override a built-in rule field by field", () => {
      const config = resolveEffectiveConfig({
        branchName: "main",
        document: { branches: { main: { tag: "rc" } } },
      });

      expect(config.preReleaseLabel).toBe("rc");
      expect(config.preventIncrementOfMergedBranchVersion).toBe(true);
    });

    it("should append new rules after the built-in ones", () => {
      const config = resolveEffectiveConfig({
        branchName: "exp/rocket",
        document: { branches: { custom: { regex: "^exp/", tag: "exp", increment: "Major" } } },
      });

      expect(config.matchedRules).toEqual(["custom"]);
      expect(config.preReleaseLabel).toBe("exp");
      expect(config.increment).toBe("Major");
    });

    it("should let a branch rule override the tag prefix", () => {
      const document = { tagPrefix: "release-", branches: { main: { tagPrefix: "rel-" } } };

      expect(resolveEffectiveConfig({ branchName: "main", document }).tagPrefix).toBe("rel-");
      expect(resolveEffectiveConfig({ branchName: "develop", document }).tagPrefix).toBe("release-");
    });

    it("should keep an explicit empty global tag", () => {
      const config = resolveEffectiveConfig({
        branchName: "experiment",
        document: { tag: "" },
      });
      expect(config.preReleaseLabel).toBe("");
    });

    it("should let the override layer win over the document", () => {
      const config = resolveEffectiveConfig({
        branchName: "main",
        document: { nextVersion: "2.0", mode: "ContinuousDeployment" },
        override: { nextVersion: "3.0" },
      });

      expect(config.nextVersion).toBe("3.0");
      // the main rule sets its own mode, which outranks global settings
      expect(config.mode).toBe("ContinuousDelivery");
    });

    it("should compile bump patterns case-insensitively", () => {
      const config = resolveEffectiveConfig({ branchName: "main" });
      expect(config.bumpPatterns.major.test("+SEMVER: Breaking")).toBe(true);
      expect(config.bumpPatterns.none.test("+semver: skip")).toBe(true);
    });

    it("should return a frozen configuration", () => {
      const config = resolveEffectiveConfig({ branchName: "main" });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
      expect(Object.isFrozen(DEFAULT_BRANCH_RULES)).toBe(true);
    });
  });
});

describe("mergeBranchRules", () => {
  it("should require a regex for new rules", () => {
    let caught: unknown;
    try {
      mergeBranchRules(DEFAULT_BRANCH_RULES, { custom: { tag: "x" } }, "branchver.yml");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toEqual(["branches.custom.regex: Required for a new branch rule"]);
    }
  });

  it("should not modify the built-in rules", () => {
    mergeBranchRules(DEFAULT_BRANCH_RULES, { main: { tag: "rc" } }, "branchver.yml");
    expect(DEFAULT_BRANCH_RULES[0].overrides.tag).toBe("");
  });
});
