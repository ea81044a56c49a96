import { describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import path from "node:path";

import { readWorkspaceIndexFile } from "@repo-librarian/core";

import { getResultPaths, getStructuredContent } from "./testUtils/assert.js";
import { withMcpStdioServer } from "./testUtils/mcpStdio.js";
import { withTempDir, writeRepoFile, writeScenarioRepo } from "./testUtils/tempDir.js";

describe("get_index_stats", () => {
  it("reports counts per type and total size", async () => {
    await withTempDir("librarian-mcp-stats-", async (dir) => {
      const repoPath = path.join(dir, "repo");
      await writeScenarioRepo(repoPath);

      await withMcpStdioServer({ repoPath }, async ({ callTool, deps }) => {
        const stats = getStructuredContent(await callTool("get_index_stats"));
        expect(stats["total_files"]).toBe(4);
        expect(stats["total_size"]).toBe(88);
        expect(stats["file_types"]).toEqual({ python: 2, javascript: 1, typescript: 1 });
        expect(stats["index_path"]).toBe(deps.indexer.indexPath);
        expect(typeof stats["last_updated"]).toBe("string");
      });
    });
  });

  it("persists the first index to the configured path", async () => {
    await withTempDir("librarian-mcp-stats-", async (dir) => {
      const repoPath = path.join(dir, "repo");
      const indexPath = path.join(dir, "state", "index.yml");
      await writeScenarioRepo(repoPath);

      await withMcpStdioServer({ repoPath, indexPath }, async ({ callTool, logLines }) => {
        getStructuredContent(await callTool("get_index_stats"));

        const saved = await readWorkspaceIndexFile(indexPath);
        expect(saved?.files.map((f) => f.path)).toEqual([
          "js/app.js",
          "js/component.tsx",
          "src/main.py",
          "src/utils.py",
        ]);
        expect(logLines).toContain("[librarian] no existing index found, creating a new one");
      });
    });
  });
});

describe("refresh_index", () => {
  it("keeps serving the old snapshot until refreshed", async () => {
    await withTempDir("librarian-mcp-refresh-", async (dir) => {
      const repoPath = path.join(dir, "repo");
      await writeScenarioRepo(repoPath);

      await withMcpStdioServer({ repoPath }, async ({ callTool, deps }) => {
        const before = getStructuredContent(await callTool("search_files", { query: "helpers" }));
        expect(before["count"]).toBe(0);

        await writeRepoFile(repoPath, "src/helpers.py", "X = 1\n");

        const stale = getStructuredContent(await callTool("search_files", { query: "helpers" }));
        expect(stale["count"]).toBe(0);

        const refreshed = getStructuredContent(await callTool("refresh_index"));
        expect(refreshed["repository"]).toBe(deps.indexer.repoPath);
        expect(refreshed["total_files"]).toBe(5);
        expect(refreshed["index_path"]).toBe(deps.indexer.indexPath);
        expect(refreshed["skipped"]).toBe(0);
        expect(refreshed["diagnostics"]).toEqual([]);
        expect(refreshed["diagnostics_truncated"]).toBe(false);

        const after = getStructuredContent(await callTool("search_files", { query: "helpers" }));
        expect(getResultPaths(after)).toEqual(["src/helpers.py"]);

        const saved = await readWorkspaceIndexFile(deps.indexer.indexPath);
        expect(saved?.repository.total_files).toBe(5);
      });
    });
  });

  it("reports directories beyond the depth bound as skipped", async () => {
    await withTempDir("librarian-mcp-refresh-", async (dir) => {
      const repoPath = path.join(dir, "repo");
      await writeRepoFile(repoPath, "top.go", "package main\n");
      await writeRepoFile(repoPath, "a/b/deep.go", "package b\n");

      await withMcpStdioServer({ repoPath, maxDepth: "1" }, async ({ callTool }) => {
        const refreshed = getStructuredContent(await callTool("refresh_index"));
        expect(refreshed["total_files"]).toBe(1);
        expect(refreshed["skipped"]).toBe(1);
        expect(refreshed["diagnostics"]).toEqual([
          {
            path: "a/b",
            reason: "max_depth_exceeded",
            message: "Directory exceeds max depth 1: a/b",
          },
        ]);
      });
    });
  });

  it("loads a previously saved index instead of rescanning", async () => {
    await withTempDir("librarian-mcp-refresh-", async (dir) => {
      const repoPath = path.join(dir, "repo");
      await writeScenarioRepo(repoPath);

      await withMcpStdioServer({ repoPath }, async ({ callTool }) => {
        getStructuredContent(await callTool("get_index_stats"));
      });

      await fs.rm(path.join(repoPath, "src", "utils.py"));

      await withMcpStdioServer({ repoPath }, async ({ callTool, logLines }) => {
        const stats = getStructuredContent(await callTool("get_index_stats"));
        expect(stats["total_files"]).toBe(4);
        expect(logLines).toContain("[librarian] loaded existing index with 4 files");
      });
    });
  });
});
