// Librarian error taxonomy
// - traversal errors are recorded as skips, query errors are returned as values,
//   persistence/root errors are thrown to the caller

export type LibrarianErrorCode =
  | "REPOSITORY_NOT_FOUND"
  | "FILE_READ_ERROR"
  | "DIRECTORY_ACCESS_ERROR"
  | "PERSISTENCE_READ_ERROR"
  | "PERSISTENCE_WRITE_ERROR"
  | "INVALID_PATTERN"
  | "UNKNOWN_FILE_TYPE";

export class LibrarianError extends Error {
  readonly code: LibrarianErrorCode;

  constructor(code: LibrarianErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class RepositoryNotFoundError extends LibrarianError {
  constructor(repoPath: string, options?: { cause?: unknown }) {
    super("REPOSITORY_NOT_FOUND", `Repository root is not accessible: ${repoPath}`, options);
  }
}

export class FileReadError extends LibrarianError {
  constructor(relPath: string, options?: { cause?: unknown }) {
    super("FILE_READ_ERROR", `Cannot read file: ${relPath}`, options);
  }
}

export class DirectoryAccessError extends LibrarianError {
  constructor(relPath: string, options?: { cause?: unknown }) {
    super("DIRECTORY_ACCESS_ERROR", `Cannot read directory: ${relPath}`, options);
  }
}

export class PersistenceReadError extends LibrarianError {
  constructor(indexPath: string, detail: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_READ_ERROR", `Cannot load index from ${indexPath}: ${detail}`, options);
  }
}

export class PersistenceWriteError extends LibrarianError {
  constructor(indexPath: string, detail: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_WRITE_ERROR", `Cannot save index to ${indexPath}: ${detail}`, options);
  }
}

export class InvalidPatternError extends LibrarianError {
  readonly pattern: string;

  constructor(pattern: string, diagnostic: string) {
    super("INVALID_PATTERN", `Invalid regex pattern: ${diagnostic}`);
    this.pattern = pattern;
  }
}

export class UnknownFileTypeError extends LibrarianError {
  readonly requested: string;
  readonly validTypes: readonly string[];

  constructor(requested: string, validTypes: readonly string[]) {
    super(
      "UNKNOWN_FILE_TYPE",
      `Invalid file type "${requested}". Valid types are: ${validTypes.join(", ")}`,
    );
    this.requested = requested;
    this.validTypes = validTypes;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
