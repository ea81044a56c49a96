// WorkspaceIndex construction
// - total_files is derived from the entry list, never tracked separately
// - built snapshots are frozen (replace on refresh, never edit in place)

import { fileTypeExtensionTable } from "../repo/fileTypes.js";
import type { FileEntry, WorkspaceIndex } from "./types.js";
import { WORKSPACE_INDEX_VERSION } from "./types.js";

export type BuildWorkspaceIndexOptions = {
  repoPath: string;
  files: readonly FileEntry[];
  lastUpdated?: Date;
  version?: string;
};

export function buildWorkspaceIndex(options: BuildWorkspaceIndexOptions): WorkspaceIndex {
  const files = Object.freeze(options.files.map((entry) => Object.freeze({ ...entry })));

  return Object.freeze({
    version: options.version ?? WORKSPACE_INDEX_VERSION,
    last_updated: options.lastUpdated ?? new Date(),
    repository: Object.freeze({ path: options.repoPath, total_files: files.length }),
    files,
    file_type_extensions: Object.freeze(fileTypeExtensionTable()),
  });
}
