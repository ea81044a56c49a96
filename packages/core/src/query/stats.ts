// Index statistics
// - counts cover every type present in the index; absent types are implied zero

import { FILE_TYPES } from "../repo/fileTypes.js";
import type { FileType } from "../repo/fileTypes.js";
import type { IndexStats, WorkspaceIndex } from "../workspace/types.js";

export function computeStats(index: WorkspaceIndex, indexPath: string): IndexStats {
  const fileTypes: Partial<Record<FileType, number>> = {};
  let totalSize = 0;

  for (const entry of index.files) {
    fileTypes[entry.type] = (fileTypes[entry.type] ?? 0) + 1;
    totalSize += entry.size;
  }

  return {
    total_files: index.repository.total_files,
    total_size: totalSize,
    file_types: fileTypes,
    last_updated: index.last_updated,
    index_path: indexPath,
  };
}

// Descending by count; ties keep FILE_TYPES order
export function sortedTypeCounts(stats: IndexStats): Array<{ type: FileType; count: number }> {
  return FILE_TYPES.flatMap((type) => {
    const count = stats.file_types[type] ?? 0;
    return count > 0 ? [{ type, count }] : [];
  }).sort((a, b) => b.count - a.count);
}
