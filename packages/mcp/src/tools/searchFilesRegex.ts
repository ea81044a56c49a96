// search_files_regex tool
// - regular expression tested anywhere in the repo-relative path
// - a pattern that does not compile is reported as a tool error

import { DEFAULT_SEARCH_LIMIT, searchByRegex } from "@repo-librarian/core";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { McpToolDeps } from "../mcpDeps.js";
import {
  fileResultSchema,
  jsonToolResult,
  toFileResultRow,
  unwrapQueryResult,
} from "../lib/payloads.js";

export function registerSearchFilesRegexTool(server: McpServer, deps: McpToolDeps): void {
  server.registerTool(
    "search_files_regex",
    {
      title: "Search files (regex)",
      description:
        "Finds indexed files whose repository-relative path matches a regular expression (forward-slash separators).",
      inputSchema: {
        pattern: z.string().min(1).describe("Regular expression tested against file paths"),
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
        pattern: z.string(),
        case_sensitive: z.boolean(),
        limit: z.number().int(),
        count: z.number().int().nonnegative(),
        results: z.array(fileResultSchema),
      }),
    },
    async (args) => {
      const index = await deps.holder.current();
      const matches = unwrapQueryResult(
        searchByRegex(index, {
          pattern: args.pattern,
          caseSensitive: args.case_sensitive,
          limit: args.limit,
        }),
      );

      return jsonToolResult({
        pattern: args.pattern,
        case_sensitive: args.case_sensitive,
        limit: args.limit,
        count: matches.length,
        results: matches.map(toFileResultRow),
      });
    },
  );
}
