import { describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import path from "node:path";

import { locateRepositoryRoot } from "../src/repo/repoRoot.js";

import { withTempDir } from "./tempRepo.js";

describe("locateRepositoryRoot()", () => {
  it("walks upward to the nearest directory containing .git", async () => {
    await withTempDir("librarian-root-", async (dir) => {
      const repoPath = path.join(dir, "repo");
      const nested = path.join(repoPath, "packages", "app", "src");
      await fs.mkdir(path.join(repoPath, ".git"), { recursive: true });
      await fs.mkdir(nested, { recursive: true });

      expect(await locateRepositoryRoot(nested)).toBe(repoPath);
      expect(await locateRepositoryRoot(repoPath)).toBe(repoPath);
    });
  });

  it("accepts a .git file (worktrees, submodules)", async () => {
    await withTempDir("librarian-root-", async (dir) => {
      const repoPath = path.join(dir, "worktree");
      await fs.mkdir(path.join(repoPath, "lib"), { recursive: true });
      await fs.writeFile(path.join(repoPath, ".git"), "gitdir: /elsewhere\n", "utf8");

      expect(await locateRepositoryRoot(path.join(repoPath, "lib"))).toBe(repoPath);
    });
  });
});
