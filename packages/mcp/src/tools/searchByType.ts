// search_by_type tool
// - filter by FileType name (case-insensitive), optionally narrowed by a path substring

import {
  DEFAULT_SEARCH_LIMIT,
  FILE_TYPES,
  parseFileType,
  searchByType,
} from "@repo-librarian/core";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { McpToolDeps } from "../mcpDeps.js";
import {
  fileResultSchema,
  jsonToolResult,
  toFileResultRow,
  unwrapQueryResult,
} from "../lib/payloads.js";

export function registerSearchByTypeTool(server: McpServer, deps: McpToolDeps): void {
  server.registerTool(
    "search_by_type",
    {
      title: "Search files by type",
      description: `Lists indexed files of one type. Types: ${FILE_TYPES.join(", ")}.`,
      inputSchema: {
        file_type: z.string().min(1).describe("File type name, e.g. python or typescript"),
        pattern: z
          .string()
          .optional()
          .describe("Optional case-insensitive substring the path must also contain"),
        limit: z
          .number()
          .int()
          .min(1)
          .max(10_000)
          .default(DEFAULT_SEARCH_LIMIT)
          .describe("Maximum number of results (1–10000)"),
      },
      outputSchema: z.object({
        file_type: z.string(),
        pattern: z.string().nullable(),
        limit: z.number().int(),
        count: z.number().int().nonnegative(),
        results: z.array(fileResultSchema),
      }),
    },
    async (args) => {
      const index = await deps.holder.current();
      const pattern = args.pattern ? args.pattern : null;
      const matches = unwrapQueryResult(
        searchByType(index, { type: args.file_type, pattern, limit: args.limit }),
      );

      return jsonToolResult({
        file_type: parseFileType(args.file_type) ?? args.file_type,
        pattern,
        limit: args.limit,
        count: matches.length,
        results: matches.map(toFileResultRow),
      });
    },
  );
}
