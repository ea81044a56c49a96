// search_files tool
// - substring match on repo-relative paths (case-insensitive unless asked)

import { DEFAULT_SEARCH_LIMIT, searchBySubstring } from "@repo-librarian/core";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { McpToolDeps } from "../mcpDeps.js";
import { fileResultSchema, jsonToolResult, toFileResultRow } from "../lib/payloads.js";

export function registerSearchFilesTool(server: McpServer, deps: McpToolDeps): void {
  server.registerTool(
    "search_files",
    {
      title: "Search files",
      description:
        "Finds indexed files whose repository-relative path contains the query. Matches paths only, never file contents.",
      inputSchema: {
        query: z
          .string()
          .describe("Substring to look for in file paths (empty matches every file)"),
        case_sensitive: z.boolean().default(false).describe("Match case exactly"),
        limit: z
          .number()
          .int()
          .min(1)
          .max(10_000)
          .default(DEFAULT_SEARCH_LIMIT)
          .describe("Maximum number of results (1–10000)"),
      },
      outputSchema: z.object({
        query: z.string(),
        case_sensitive: z.boolean(),
        limit: z.number().int(),
        count: z.number().int().nonnegative(),
        results: z.array(fileResultSchema),
      }),
    },
    async (args) => {
      const index = await deps.holder.current();
      const matches = searchBySubstring(index, {
        pattern: args.query,
        caseSensitive: args.case_sensitive,
        limit: args.limit,
      });

      return jsonToolResult({
        query: args.query,
        case_sensitive: args.case_sensitive,
        limit: args.limit,
        count: matches.length,
        results: matches.map(toFileResultRow),
      });
    },
  );
}
