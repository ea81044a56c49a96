// Path search over a WorkspaceIndex
// - read-only, results keep index order and are truncated to `limit`
// - malformed input is returned as a QueryResult failure

import { InvalidPatternError, UnknownFileTypeError, errorMessage } from "../errors.js";
import { FILE_TYPES, parseFileType } from "../repo/fileTypes.js";
import type { FileEntry, WorkspaceIndex } from "../workspace/types.js";
import type {
  QueryResult,
  RegexSearchOptions,
  SubstringSearchOptions,
  TypeSearchOptions,
} from "./types.js";
import { DEFAULT_SEARCH_LIMIT } from "./types.js";

function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
  return Math.max(0, Math.floor(limit));
}

function takeMatching(
  files: readonly FileEntry[],
  predicate: (entry: FileEntry) => boolean,
  limit: number,
): FileEntry[] {
  const out: FileEntry[] = [];
  for (const entry of files) {
    if (out.length >= limit) break;
    if (predicate(entry)) out.push(entry);
  }
  return out;
}

export function searchBySubstring(
  index: WorkspaceIndex,
  options: SubstringSearchOptions,
): FileEntry[] {
  const caseSensitive = options.caseSensitive ?? false;
  const needle = caseSensitive ? options.pattern : options.pattern.toLowerCase();

  return takeMatching(
    index.files,
    (entry) => (caseSensitive ? entry.path : entry.path.toLowerCase()).includes(needle),
    normalizeLimit(options.limit),
  );
}

export function compilePathRegex(
  pattern: string,
  caseSensitive: boolean,
): QueryResult<RegExp> {
  try {
    return { ok: true, value: new RegExp(pattern, caseSensitive ? "" : "i") };
  } catch (error) {
    return { ok: false, error: new InvalidPatternError(pattern, errorMessage(error)) };
  }
}

export function searchByRegex(
  index: WorkspaceIndex,
  options: RegexSearchOptions,
): QueryResult<FileEntry[]> {
  const compiled = compilePathRegex(options.pattern, options.caseSensitive ?? false);
  if (!compiled.ok) return compiled;

  const re = compiled.value;
  return {
    ok: true,
    value: takeMatching(index.files, (entry) => re.test(entry.path), normalizeLimit(options.limit)),
  };
}

export function searchByType(
  index: WorkspaceIndex,
  options: TypeSearchOptions,
): QueryResult<FileEntry[]> {
  const type = parseFileType(options.type);
  if (type === null) {
    return { ok: false, error: new UnknownFileTypeError(options.type, FILE_TYPES) };
  }

  const needle = options.pattern ? options.pattern.toLowerCase() : null;
  return {
    ok: true,
    value: takeMatching(
      index.files,
      (entry) =>
        entry.type === type && (needle === null || entry.path.toLowerCase().includes(needle)),
      normalizeLimit(options.limit),
    ),
  };
}
