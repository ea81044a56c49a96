#!/usr/bin/env node
// Repo librarian MCP server - STDIO transport
// - path/type search, stats, refresh over the repository index

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createLibrarianMcpServer } from "./createLibrarianMcpServer.js";

async function main(): Promise<void> {
  const { server, deps } = await createLibrarianMcpServer();

  // load (or build) the index before the first request arrives
  const index = await deps.holder.current();
  deps.logger?.log?.(
    `[librarian] serving ${index.repository.total_files} files from ${deps.indexer.repoPath}`,
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

await main();
