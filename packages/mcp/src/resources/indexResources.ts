// index://stats, index://config resources
// - same stats payload as get_index_stats
// - config describes where the server reads and writes

import { FILE_TYPES, WORKSPACE_INDEX_VERSION } from "@repo-librarian/core";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { McpToolDeps } from "../mcpDeps.js";
import { statsPayload } from "../lib/payloads.js";

const JSON_MIME_TYPE = "application/json";

export const INDEX_STATS_URI = "index://stats";
export const INDEX_CONFIG_URI = "index://config";

export type IndexConfigPayload = {
  repository_path: string;
  index_path: string;
  version: string;
  supported_file_types: string[];
};

export function indexConfigPayload(deps: McpToolDeps): IndexConfigPayload {
  return {
    repository_path: deps.indexer.repoPath,
    index_path: deps.indexer.indexPath,
    version: WORKSPACE_INDEX_VERSION,
    supported_file_types: [...FILE_TYPES],
  };
}

export function registerIndexResources(server: McpServer, deps: McpToolDeps): void {
  server.registerResource(
    "index-stats",
    INDEX_STATS_URI,
    {
      title: "Index statistics",
      description: "File counts per type and total size of the served index",
      mimeType: JSON_MIME_TYPE,
    },
    async (uri) => {
      const index = await deps.holder.current();
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: JSON_MIME_TYPE,
            text: JSON.stringify(statsPayload(index, deps.indexer.indexPath), null, 2),
          },
        ],
      };
    },
  );

  server.registerResource(
    "index-config",
    INDEX_CONFIG_URI,
    {
      title: "Index configuration",
      description: "Repository root, index file location, format version, supported file types",
      mimeType: JSON_MIME_TYPE,
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: JSON_MIME_TYPE,
          text: JSON.stringify(indexConfigPayload(deps), null, 2),
        },
      ],
    }),
  );
}
