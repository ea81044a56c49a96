// get_index_stats tool

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { McpToolDeps } from "../mcpDeps.js";
import { indexStatsSchema, jsonToolResult, statsPayload } from "../lib/payloads.js";

export function registerGetIndexStatsTool(server: McpServer, deps: McpToolDeps): void {
  server.registerTool(
    "get_index_stats",
    {
      title: "Get index stats",
      description:
        "Returns file counts per type, total size in bytes, and when the served index was built.",
      inputSchema: {},
      outputSchema: indexStatsSchema,
    },
    async () => {
      const index = await deps.holder.current();
      return jsonToolResult(statsPayload(index, deps.indexer.indexPath));
    },
  );
}
