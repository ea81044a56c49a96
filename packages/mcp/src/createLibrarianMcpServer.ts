import { createRepositoryIndexer, loadEnv } from "@repo-librarian/core";
import type { IndexerLogger } from "@repo-librarian/core";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { IndexHolder } from "./lib/indexHolder.js";
import type { McpToolDeps } from "./mcpDeps.js";
import { registerIndexResources } from "./resources/indexResources.js";
import { registerGetIndexStatsTool } from "./tools/getIndexStats.js";
import { registerRefreshIndexTool } from "./tools/refreshIndex.js";
import { registerSearchByTypeTool } from "./tools/searchByType.js";
import { registerSearchFilesTool } from "./tools/searchFiles.js";
import { registerSearchFilesRegexTool } from "./tools/searchFilesRegex.js";

export const MCP_SERVER_NAME = "repo-librarian";
export const MCP_SERVER_VERSION = "0.1.0";

export type LibrarianMcpRuntime = {
  deps: McpToolDeps;
};

// stdout carries the protocol, so every log line goes to stderr
export const stderrLogger: IndexerLogger = {
  log: (line) => console.error(line),
  warn: (line) => console.error(line),
};

export async function createLibrarianMcpRuntimeFromEnv(
  options: { logger?: IndexerLogger } = {},
): Promise<LibrarianMcpRuntime> {
  const env = loadEnv();
  const logger = options.logger ?? stderrLogger;

  const indexer = await createRepositoryIndexer({
    repoPath: env.repoPath,
    indexPath: env.indexPath,
    maxDepth: env.maxDepth,
    extraIgnorePatterns: env.extraIgnorePatterns,
    logger,
  });

  return {
    deps: {
      indexer,
      holder: new IndexHolder(indexer),
      logger,
    },
  };
}

export function createLibrarianMcpServerFromRuntime(runtime: LibrarianMcpRuntime): {
  server: McpServer;
  deps: McpToolDeps;
} {
  const deps = runtime.deps;

  const server = new McpServer({ name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION });

  registerSearchFilesTool(server, deps);
  registerSearchFilesRegexTool(server, deps);
  registerSearchByTypeTool(server, deps);
  registerRefreshIndexTool(server, deps);
  registerGetIndexStatsTool(server, deps);
  registerIndexResources(server, deps);

  return { server, deps };
}

export async function createLibrarianMcpServer(
  options: { logger?: IndexerLogger } = {},
): Promise<{
  server: McpServer;
  deps: McpToolDeps;
}> {
  const runtime = await createLibrarianMcpRuntimeFromEnv(options);
  return createLibrarianMcpServerFromRuntime(runtime);
}
