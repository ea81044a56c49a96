import { describe, expect, it } from "vitest";

import { createRepositoryIndexer } from "../src/indexing/repositoryIndexer.js";
import { computeStats, sortedTypeCounts } from "../src/query/stats.js";
import { buildWorkspaceIndex } from "../src/workspace/workspaceIndex.js";

import { withTempDir, writeScenarioRepo } from "./tempRepo.js";

describe("computeStats()", () => {
  it("aggregates the scenario repository", async () => {
    await withTempDir("librarian-stats-", async (repoPath) => {
      await writeScenarioRepo(repoPath);
      const indexer = await createRepositoryIndexer({ repoPath });
      const index = await indexer.createIndex();

      const stats = computeStats(index, indexer.indexPath);
      expect(stats.total_files).toBe(4);
      expect(stats.file_types).toEqual({ python: 2, javascript: 1, typescript: 1 });
      expect(stats.total_size).toBe(14 + 25 + 20 + 29);
      expect(stats.last_updated).toBe(index.last_updated);
      expect(stats.index_path).toBe(indexer.indexPath);
    });
  });

  it("handles an empty index", () => {
    const lastUpdated = new Date("2026-01-01T00:00:00.000Z");
    const stats = computeStats(
      buildWorkspaceIndex({ repoPath: "/repo", files: [], lastUpdated }),
      "/repo/.claude/workspace/workspace.yml",
    );

    expect(stats).toEqual({
      total_files: 0,
      total_size: 0,
      file_types: {},
      last_updated: lastUpdated,
      index_path: "/repo/.claude/workspace/workspace.yml",
    });
  });
});

describe("sortedTypeCounts()", () => {
  it("orders by count, ties in type order", () => {
    const modified = new Date(0);
    const index = buildWorkspaceIndex({
      repoPath: "/repo",
      files: [
        { path: "a.css", type: "css", size: 1, modified, hash: "" },
        { path: "b.go", type: "go", size: 1, modified, hash: "" },
        { path: "c.go", type: "go", size: 1, modified, hash: "" },
        { path: "d.py", type: "python", size: 1, modified, hash: "" },
      ],
    });

    expect(sortedTypeCounts(computeStats(index, "x"))).toEqual([
      { type: "go", count: 2 },
      { type: "python", count: 1 },
      { type: "css", count: 1 },
    ]);
  });
});
