import type { FileType } from "../repo/fileTypes.js";

export const WORKSPACE_INDEX_VERSION = "1.0";

export type FileEntry = Readonly<{
  path: string;
  type: FileType;
  size: number;
  modified: Date;
  hash: string;
}>;

export type RepositoryInfo = Readonly<{
  path: string;
  total_files: number;
}>;

export type WorkspaceIndex = Readonly<{
  version: string;
  last_updated: Date;
  repository: RepositoryInfo;
  files: readonly FileEntry[];
  file_type_extensions: Readonly<Record<string, readonly string[]>>;
}>;

export type IndexStats = {
  total_files: number;
  total_size: number;
  file_types: Partial<Record<FileType, number>>;
  last_updated: Date;
  index_path: string;
};
