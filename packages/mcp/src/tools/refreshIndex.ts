// refresh_index tool
// - full rebuild + save, then the new snapshot replaces the served one
// - concurrent calls run one after another

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { McpToolDeps } from "../mcpDeps.js";
import { jsonToolResult } from "../lib/payloads.js";

const MAX_REPORTED_DIAGNOSTICS = 50;

export function registerRefreshIndexTool(server: McpServer, deps: McpToolDeps): void {
  server.registerTool(
    "refresh_index",
    {
      title: "Refresh index",
      description:
        "Rescans the whole repository, saves the new index, and serves it to later queries. Reports skipped entries.",
      inputSchema: {},
      outputSchema: z.object({
        repository: z.string(),
        total_files: z.number().int().nonnegative(),
        last_updated: z.string(),
        index_path: z.string(),
        skipped: z.number().int().nonnegative(),
        diagnostics: z.array(
          z.object({ path: z.string(), reason: z.string(), message: z.string() }),
        ),
        diagnostics_truncated: z.boolean(),
      }),
    },
    async () => {
      const report = await deps.holder.refresh();
      const { index, diagnostics } = report;

      return jsonToolResult({
        repository: index.repository.path,
        total_files: index.repository.total_files,
        last_updated: index.last_updated.toISOString(),
        index_path: deps.indexer.indexPath,
        skipped: diagnostics.length,
        diagnostics: diagnostics.slice(0, MAX_REPORTED_DIAGNOSTICS).map((d) => ({ ...d })),
        diagnostics_truncated: diagnostics.length > MAX_REPORTED_DIAGNOSTICS,
      });
    },
  );
}
