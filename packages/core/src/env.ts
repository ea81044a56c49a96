// 환경변수(environment variable) 로딩 유틸
// - indexer CLI, mcp 서버 양쪽에서 공통으로 사용

import { config as loadDotenv } from "dotenv";

export type LibrarianEnv = {
  repoPath: string | undefined;
  indexPath: string | undefined;
  maxDepth: number | undefined;
  extraIgnorePatterns: string[];
};

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

export function parseMaxDepth(raw: string | undefined, source: string): number | undefined {
  const value = nonEmpty(raw);
  if (value === undefined) return undefined;

  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${source}: "${value}". Expected a non-negative integer.`);
  }
  return n;
}

export function parsePatternList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

export function loadEnv(): LibrarianEnv {
  // .env는 개발 편의용, 운영에서는 환경변수만으로도 동작
  loadDotenv({ quiet: true });

  return {
    repoPath: nonEmpty(process.env.LIBRARIAN_REPO_PATH),
    indexPath: nonEmpty(process.env.LIBRARIAN_INDEX_PATH),
    maxDepth: parseMaxDepth(process.env.LIBRARIAN_MAX_DEPTH, "LIBRARIAN_MAX_DEPTH"),
    extraIgnorePatterns: parsePatternList(process.env.LIBRARIAN_EXTRA_IGNORE),
  };
}
