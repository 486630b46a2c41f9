/**
 * End-to-end tests for computeVersion against an in-memory repository.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, readFile, rm, stat, utimes, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { computeVersion } from "../src/calculator.js";
import { NoCommitsError, RepositoryNotFoundError } from "../src/core/errors.js";
import { configureLogger, resetLogger } from "../src/core/logger.js";
import {
  FakeRepository,
  HAND_WRITTEN_CACHE_ENTRY,
  createCapture,
  createTempRepositoryDir,
  sha,
} from "./fixtures/index.js";

describe("computeVersion", () => {
  const capture = createCapture();
  const cleanup: string[] = [];

  function messages(): string[] {
    return capture.lines.map((line) => line.message);
  }

  async function repositoryDir(): Promise<string> {
    const dir = await createTempRepositoryDir();
    cleanup.push(dir);
    return dir;
  }

  beforeEach(() => {
    capture.lines.length = 0;
    configureLogger({ sink: capture.sink });
  });

  afterEach(async () => {
    resetLogger();
    for (const dir of cleanup.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("should version a fresh repository, then honour the cache and next-version", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    const first = await computeVersion({ workingDirectory: root, repository: repo });

    expect(first.SemVer).toBe("0.1.0");
    expect(first.AssemblySemVer).toBe("0.1.0.0");
    expect(first.CommitsSinceVersionSource).toBe(0);
    expect(first.FileName).toMatch(/branchver_cache[\\/][0-9a-f]{16}\.yml$/);

    const cacheFile = first.FileName ?? "";
    await writeFile(cacheFile, HAND_WRITTEN_CACHE_ENTRY);

    const second = await computeVersion({ workingDirectory: root, repository: repo });

    expect(second.AssemblySemVer).toBe("4.10.3.0");
    expect(second.Major).toBe(4);
    expect(second.FileName).toBe(cacheFile);
    expect(messages()).toContain(`Deserializing version variables from cache file ${cacheFile}`);

    await writeFile(join(root, "branchver.yml"), "next-version: 5.0\n");

    const third = await computeVersion({ workingDirectory: root, repository: repo });

    expect(third.AssemblySemVer).toBe("5.0.0.0");
    expect(third.SemVer).toBe("5.0.0");
    expect(third.FileName).not.toBe(cacheFile);
  });

  it("should return the same variables on repeated runs", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");
    repo.tag("v1.0.0");
    repo.commit("Add search +semver: minor");
    repo.commit("Fix typo");

    const first = await computeVersion({ workingDirectory: root, repository: repo });
    const second = await computeVersion({ workingDirectory: root, repository: repo });

    expect(second).toEqual(first);
    expect(first.SemVer).toBe("1.1.0");
    expect(first.FullSemVer).toBe("1.1.0+2");
    expect(first.VersionSourceSha).toBe(sha(1));
    const computing = messages().filter((line) => line.startsWith("Computing version variables"));
    expect(computing).toHaveLength(1);
    expect(computing[0]).toMatch(/^Computing version variables, no cache entry for key [0-9a-f]{16}$/);
  });

  it("should use the same cache key in different working copies of one repository", async () => {
    const cloneA = await repositoryDir();
    const cloneB = await repositoryDir();

    const repoA = new FakeRepository();
    repoA.remote = "https://example.com/org/app.git";
    repoA.commit("Initial commit");
    const repoB = new FakeRepository();
    repoB.remote = "git@example.com:org/app.git";
    repoB.commit("Initial commit");

    const a = await computeVersion({ workingDirectory: cloneA, repository: repoA });
    const b = await computeVersion({ workingDirectory: cloneB, repository: repoB });

    expect(basename(b.FileName ?? "b")).toBe(basename(a.FileName ?? "a"));
  });

  it("should ignore a stale cache entry under NoCache or override configuration", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    const first = await computeVersion({ workingDirectory: root, repository: repo });
    const cacheFile = first.FileName ?? "";
    await writeFile(cacheFile, HAND_WRITTEN_CACHE_ENTRY);

    const cached = await computeVersion({ workingDirectory: root, repository: repo });
    expect(cached.AssemblySemVer).toBe("4.10.3.0");

    const cacheDirMtime = (await stat(dirname(cacheFile))).mtimeMs;

    const uncached = await computeVersion({ workingDirectory: root, repository: repo, noCache: true });
    expect(uncached.AssemblySemVer).toBe("0.1.0.0");

    const overridden = await computeVersion({
      workingDirectory: root,
      repository: repo,
      overrideConfig: { increment: "Patch" },
    });
    expect(overridden.AssemblySemVer).toBe("0.1.0.0");

    expect((await stat(dirname(cacheFile))).mtimeMs).toBe(cacheDirMtime);
    expect(await readFile(cacheFile, "utf-8")).toBe(HAND_WRITTEN_CACHE_ENTRY);
  });

  it("should bypass the cache for override configuration", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    const variables = await computeVersion({
      workingDirectory: root,
      repository: repo,
      overrideConfig: { nextVersion: "3.0" },
    });

    expect(variables.SemVer).toBe("3.0.0");
    expect(variables.FileName).toBeUndefined();
    expect(messages()).toContain("Override configuration supplied, skipping the version cache");
    await expect(stat(join(root, ".git", "branchver_cache"))).rejects.toThrow();
  });

  it("should bypass the cache when NoCache is set by option or configuration", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    const byOption = await computeVersion({ workingDirectory: root, repository: repo, noCache: true });
    await writeFile(join(root, "branchver.yml"), "no-cache: true\n");
    const byConfig = await computeVersion({ workingDirectory: root, repository: repo });

    expect(byOption.FileName).toBeUndefined();
    expect(byConfig.FileName).toBeUndefined();
    expect(messages().filter((line) => line === "NoCache set, skipping the version cache")).toHaveLength(2);
    await expect(stat(join(root, ".git", "branchver_cache"))).rejects.toThrow();
  });

  it("should recompute when the configuration file is newer than the cache", async () => {
    const root = await repositoryDir();
    const configPath = join(root, "branchver.yml");
    await writeFile(configPath, "increment: Minor\n");
    const repo = new FakeRepository();
    repo.commit("Initial commit");
    repo.tag("v1.0.0");
    repo.commit("Second");

    const first = await computeVersion({ workingDirectory: root, repository: repo });
    const future = new Date(Date.now() + 60_000);
    await utimes(configPath, future, future);
    capture.lines.length = 0;
    const second = await computeVersion({ workingDirectory: root, repository: repo });

    expect(messages()).toContain(
      `Cache invalidated: configuration file ${configPath} is newer than the cache directory`
    );
    expect(second).toEqual(first);
  });

  it("should explain when no configuration file is found", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    await computeVersion({ workingDirectory: root, repository: repo, noCache: true });

    expect(messages()).toContain(
      `branchver.yml not found in ${root}, using default configuration`
    );
  });

  it("should find the repository from a subdirectory", async () => {
    const root = await repositoryDir();
    const nested = join(root, "src", "deep");
    await writeFile(join(root, "branchver.yml"), "next-version: 2.0\n");
    await mkdir(nested, { recursive: true });
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    const variables = await computeVersion({ workingDirectory: nested, repository: repo, noCache: true });

    expect(variables.SemVer).toBe("2.0.0");
  });

  it("should version the target branch when one is given", async () => {
    const root = await repositoryDir();
    const repo = new FakeRepository();
    repo.commit("Initial commit");
    repo.tag("v1.0.0");
    repo.commit("Start next");

    const variables = await computeVersion({
      workingDirectory: root,
      repository: repo,
      noCache: true,
      repositoryInfo: { targetBranch: "develop" },
    });

    expect(variables.BranchName).toBe("develop");
    expect(variables.SemVer).toBe("1.1.0-alpha.1");
    expect(variables.FullSemVer).toBe("1.1.0-alpha.1");
  });

  it("should write to a custom cache directory", async () => {
    const root = await repositoryDir();
    const cacheDirectory = join(root, "custom-cache");
    const repo = new FakeRepository();
    repo.commit("Initial commit");

    const variables = await computeVersion({ workingDirectory: root, repository: repo, cacheDirectory });

    expect(variables.FileName?.startsWith(cacheDirectory)).toBe(true);
  });

  it("should fail without commits", async () => {
    const root = await repositoryDir();
    await expect(
      computeVersion({ workingDirectory: root, repository: new FakeRepository() })
    ).rejects.toBeInstanceOf(NoCommitsError);
  });

  it("should fail outside a repository", async () => {
    const dir = await mkdtemp(join(tmpdir(), "branchver-norepo-"));
    cleanup.push(dir);

    await expect(
      computeVersion({ workingDirectory: dir, repository: new FakeRepository() })
    ).rejects.toBeInstanceOf(RepositoryNotFoundError);
  });
});
