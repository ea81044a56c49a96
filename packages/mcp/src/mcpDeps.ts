// Shared dependency container for MCP tool/resource registration

import type { IndexerLogger, RepositoryIndexer } from "@repo-librarian/core";

import type { IndexHolder } from "./lib/indexHolder.js";

export type McpToolDeps = {
  indexer: RepositoryIndexer;
  holder: IndexHolder;
  logger?: IndexerLogger;
};
