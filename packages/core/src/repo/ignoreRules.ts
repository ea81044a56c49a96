// Ignore rules for repository traversal
// - .gitignore patterns (gitignore syntax via `ignore`) + implicit VCS/state directories
//   and the root .gitignore itself
// - no .gitignore: dot-segments and a fixed directory denylist

import { promises as fs } from "node:fs";
import path from "node:path";

import ignore from "ignore";

export const VCS_METADATA_DIR = ".git";
export const WORKSPACE_STATE_DIR = ".claude";
export const IGNORE_RULE_FILE = ".gitignore";

export const DEFAULT_IGNORE_DIRS: ReadonlySet<string> = new Set([
  "node_modules",
  "__pycache__",
  "venv",
  "env",
  "build",
  "dist",
  "target",
]);

// The root rule file itself is never indexed
const IMPLICIT_PATTERNS = [
  `${VCS_METADATA_DIR}/`,
  `${WORKSPACE_STATE_DIR}/`,
  `/${IGNORE_RULE_FILE}`,
];

export type IgnoreSource = "gitignore" | "default";

export type ShouldIgnoreOptions = {
  isDirectory?: boolean;
};

export type IgnoreMatcher = {
  repoPath: string;
  source: IgnoreSource;
  patterns: readonly string[];
  shouldIgnore(candidatePath: string, options?: ShouldIgnoreOptions): boolean;
};

export type LoadIgnoreMatcherOptions = {
  extraPatterns?: readonly string[];
};

export function parseIgnoreRuleLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

// Repo-relative posix path, or null when the candidate is the root itself or outside it
export function toRepoRelPath(repoPath: string, candidatePath: string): string | null {
  const root = path.resolve(repoPath);
  const abs = path.isAbsolute(candidatePath)
    ? path.resolve(candidatePath)
    : path.resolve(root, candidatePath);

  const rel = path.relative(root, abs);
  if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return rel.split(path.sep).join(path.posix.sep);
}

function isDefaultIgnoredRelPath(relPath: string): boolean {
  return relPath
    .split("/")
    .some((segment) => segment.startsWith(".") || DEFAULT_IGNORE_DIRS.has(segment));
}

async function readIgnoreRuleFile(repoPath: string): Promise<string | null> {
  try {
    return await fs.readFile(path.join(repoPath, IGNORE_RULE_FILE), "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw error;
  }
}

export function createIgnoreMatcher(options: {
  repoPath: string;
  ignoreRuleText: string | null;
  extraPatterns?: readonly string[];
}): IgnoreMatcher {
  const repoPath = path.resolve(options.repoPath);
  const source: IgnoreSource = options.ignoreRuleText === null ? "default" : "gitignore";
  const patterns = [
    ...(options.ignoreRuleText === null ? [] : parseIgnoreRuleLines(options.ignoreRuleText)),
    ...IMPLICIT_PATTERNS,
    ...(options.extraPatterns ?? []).map((p) => p.trim()).filter(Boolean),
  ];

  // CJS package: under NodeNext the default import is the module object.
  // Matching is case-sensitive, as git is on case-sensitive filesystems.
  const rules = ignore.default({ ignorecase: false }).add(patterns);

  return {
    repoPath,
    source,
    patterns,
    shouldIgnore(candidatePath, shouldIgnoreOptions = {}) {
      const relPath = toRepoRelPath(repoPath, candidatePath);
      if (relPath === null) return true;

      if (source === "default" && isDefaultIgnoredRelPath(relPath)) return true;

      const testPath = shouldIgnoreOptions.isDirectory ? `${relPath}/` : relPath;
      try {
        return rules.ignores(testPath);
      } catch (error) {
        // `ignore` rejects paths whose first segment is only dots ("...", "..../x");
        // no gitignore pattern can name them, so they are kept
        if (error instanceof RangeError) return false;
        throw error;
      }
    },
  };
}

export async function loadIgnoreMatcher(
  repoPath: string,
  options: LoadIgnoreMatcherOptions = {},
): Promise<IgnoreMatcher> {
  const ignoreRuleText = await readIgnoreRuleFile(repoPath);
  return createIgnoreMatcher({
    repoPath,
    ignoreRuleText,
    ...(options.extraPatterns ? { extraPatterns: options.extraPatterns } : {}),
  });
}
