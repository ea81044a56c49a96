import type { InvalidPatternError, UnknownFileTypeError } from "../errors.js";

export type QueryError = InvalidPatternError | UnknownFileTypeError;

export type QueryResult<T> = { ok: true; value: T } | { ok: false; error: QueryError };

export const DEFAULT_SEARCH_LIMIT = 100;

export type SubstringSearchOptions = {
  pattern: string;
  caseSensitive?: boolean;
  limit?: number;
};

export type RegexSearchOptions = {
  pattern: string;
  caseSensitive?: boolean;
  limit?: number;
};

export type TypeSearchOptions = {
  type: string;
  pattern?: string | null;
  limit?: number;
};
