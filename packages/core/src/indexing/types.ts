import type { FileEntry, WorkspaceIndex } from "../workspace/types.js";

export type IndexerLogger = {
  log?: (line: string) => void;
  warn?: (line: string) => void;
};

export type ScanDiagnosticReason =
  | "file_read_error"
  | "hash_unavailable"
  | "directory_access_error"
  | "symlinked_directory"
  | "not_regular_file"
  | "ignore_rule_error"
  | "max_depth_exceeded";

export type ScanDiagnostic = {
  path: string;
  reason: ScanDiagnosticReason;
  message: string;
};

// Per-entry traversal result
export type ScanOutcome =
  | { kind: "indexed"; entry: FileEntry; diagnostic?: ScanDiagnostic }
  | { kind: "directory"; relPath: string }
  | { kind: "skipped"; diagnostic: ScanDiagnostic };

export type ScanResult = {
  files: FileEntry[];
  diagnostics: ScanDiagnostic[];
};

export type IndexReport = {
  index: WorkspaceIndex;
  diagnostics: ScanDiagnostic[];
};
