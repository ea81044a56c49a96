import { describe, expect, it } from "vitest";

import path from "node:path";

import { FILE_TYPES } from "@repo-librarian/core";

import {
  getResultPaths,
  getStructuredContent,
  getToolFailureMessage,
} from "./testUtils/assert.js";
import { withMcpStdioServer } from "./testUtils/mcpStdio.js";
import type { McpStdioClient } from "./testUtils/mcpStdio.js";
import { withTempDir, writeScenarioRepo } from "./testUtils/tempDir.js";

async function withScenarioServer(fn: (client: McpStdioClient) => Promise<void>): Promise<void> {
  await withTempDir("librarian-mcp-search-", async (dir) => {
    const repoPath = path.join(dir, "repo");
    await writeScenarioRepo(repoPath);
    await withMcpStdioServer({ repoPath }, fn);
  });
}

describe("search_files", () => {
  it("matches path substrings case-insensitively by default", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(await callTool("search_files", { query: "PY" }));
      expect(getResultPaths(structured)).toEqual(["src/main.py", "src/utils.py"]);
    });
  });

  it("treats an empty query as matching every indexed file", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(await callTool("search_files", { query: "" }));
      expect(getResultPaths(structured)).toEqual([
        "js/app.js",
        "js/component.tsx",
        "src/main.py",
        "src/utils.py",
      ]);
    });
  });

  it("honors case_sensitive", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(
        await callTool("search_files", { query: "PY", case_sensitive: true }),
      );
      expect(structured["count"]).toBe(0);
      expect(getResultPaths(structured)).toEqual([]);
    });
  });

  it("truncates to limit in index order", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(
        await callTool("search_files", { query: "s", limit: 1 }),
      );
      expect(getResultPaths(structured)).toEqual(["js/app.js"]);
    });
  });

  it("never returns ignored files", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const logs = getStructuredContent(await callTool("search_files", { query: ".log" }));
      expect(logs["count"]).toBe(0);

      const modules = getStructuredContent(
        await callTool("search_files", { query: "node_modules" }),
      );
      expect(modules["count"]).toBe(0);
    });
  });
});

describe("search_files_regex", () => {
  it("matches anywhere in the path", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const py = getStructuredContent(
        await callTool("search_files_regex", { pattern: "\\.py$" }),
      );
      expect(getResultPaths(py)).toEqual(["src/main.py", "src/utils.py"]);

      const js = getStructuredContent(await callTool("search_files_regex", { pattern: "^js/" }));
      expect(getResultPaths(js)).toEqual(["js/app.js", "js/component.tsx"]);
    });
  });

  it("reports an invalid pattern as a tool error", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const message = getToolFailureMessage(
        await callTool("search_files_regex", { pattern: "[invalid" }),
      );
      expect(message.startsWith("Invalid regex pattern: ")).toBe(true);
    });
  });
});

describe("search_by_type", () => {
  it("accepts type names in any case and reports the canonical name", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(
        await callTool("search_by_type", { file_type: "PYTHON" }),
      );
      expect(structured["file_type"]).toBe("python");
      expect(structured["pattern"]).toBeNull();
      expect(getResultPaths(structured)).toEqual(["src/main.py", "src/utils.py"]);
    });
  });

  it("narrows by an optional case-insensitive pattern", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(
        await callTool("search_by_type", { file_type: "python", pattern: "UTIL" }),
      );
      expect(structured["pattern"]).toBe("UTIL");
      expect(getResultPaths(structured)).toEqual(["src/utils.py"]);
    });
  });

  it("classifies .tsx as typescript", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const structured = getStructuredContent(
        await callTool("search_by_type", { file_type: "typescript" }),
      );
      expect(getResultPaths(structured)).toEqual(["js/component.tsx"]);
    });
  });

  it("lists valid types when the type is unknown", async () => {
    await withScenarioServer(async ({ callTool }) => {
      const message = getToolFailureMessage(
        await callTool("search_by_type", { file_type: "cobol" }),
      );
      expect(message).toBe(`Invalid file type "cobol". Valid types are: ${FILE_TYPES.join(", ")}`);
    });
  });
});
