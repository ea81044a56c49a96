// Tool/resource payload shapes
// - dates leave the server as ISO-8601 strings

import { computeStats, sortedTypeCounts } from "@repo-librarian/core";
import type { FileEntry, QueryResult, WorkspaceIndex } from "@repo-librarian/core";
import { z } from "zod";

export const fileResultSchema = z.object({
  path: z.string(),
  type: z.string(),
  size: z.number().int().nonnegative(),
  modified: z.string(),
  hash: z.string(),
});

export type FileResultRow = z.infer<typeof fileResultSchema>;

export const indexStatsSchema = z.object({
  total_files: z.number().int().nonnegative(),
  total_size: z.number().int().nonnegative(),
  file_types: z.record(z.string(), z.number().int().nonnegative()),
  last_updated: z.string(),
  index_path: z.string(),
});

export type IndexStatsPayload = z.infer<typeof indexStatsSchema>;

export function toFileResultRow(entry: FileEntry): FileResultRow {
  return {
    path: entry.path,
    type: entry.type,
    size: entry.size,
    modified: entry.modified.toISOString(),
    hash: entry.hash,
  };
}

export function statsPayload(index: WorkspaceIndex, indexPath: string): IndexStatsPayload {
  const stats = computeStats(index, indexPath);
  const fileTypes: Record<string, number> = {};
  for (const { type, count } of sortedTypeCounts(stats)) {
    fileTypes[type] = count;
  }

  return {
    total_files: stats.total_files,
    total_size: stats.total_size,
    file_types: fileTypes,
    last_updated: stats.last_updated.toISOString(),
    index_path: stats.index_path,
  };
}

// Query failures surface as tool errors (result.isError=true)
export function unwrapQueryResult<T>(result: QueryResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function jsonToolResult<T extends Record<string, unknown>>(
  payload: T,
): { structuredContent: T; content: Array<{ type: "text"; text: string }> } {
  return {
    structuredContent: payload,
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}
