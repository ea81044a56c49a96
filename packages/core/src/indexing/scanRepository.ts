// Repository traversal
// - depth-first, entries sorted by name per directory
// - ignored entries are skipped (ignored directories are not descended)
// - per-entry failures become diagnostics; only an unreadable root is fatal

import type { Dirent, Stats } from "node:fs";
import { promises as fs } from "node:fs";
import path from "node:path";

import {
  DirectoryAccessError,
  FileReadError,
  RepositoryNotFoundError,
  errorMessage,
} from "../errors.js";
import { hashFileContent } from "../repo/contentHash.js";
import { classifyFile } from "../repo/fileTypes.js";
import type { IgnoreMatcher } from "../repo/ignoreRules.js";
import type { ScanDiagnostic, ScanOutcome, ScanResult } from "./types.js";

export const DEFAULT_MAX_DEPTH = 64;

// Filesystem calls the walk depends on (stat follows symlinks)
export type ScanFileSystem = {
  readdir(absDir: string): Promise<Dirent[]>;
  stat(absPath: string): Promise<Stats>;
  hashFile(absPath: string): Promise<string>;
};

export const nodeScanFileSystem: ScanFileSystem = {
  readdir: (absDir) => fs.readdir(absDir, { withFileTypes: true }),
  stat: (absPath) => fs.stat(absPath),
  hashFile: hashFileContent,
};

export type ScanRepositoryOptions = {
  repoPath: string;
  matcher: IgnoreMatcher;
  maxDepth?: number;
  fileSystem?: ScanFileSystem;
};

type ScanContext = {
  repoPath: string;
  matcher: IgnoreMatcher;
  fileSystem: ScanFileSystem;
};

function joinRelPath(parentRelPath: string, name: string): string {
  return parentRelPath ? `${parentRelPath}/${name}` : name;
}

function diagnosticFrom(
  relPath: string,
  reason: ScanDiagnostic["reason"],
  error: Error,
): ScanDiagnostic {
  return { path: relPath, reason, message: error.message };
}

function fileReadDiagnostic(relPath: string, error: unknown): ScanDiagnostic {
  return diagnosticFrom(
    relPath,
    "file_read_error",
    new FileReadError(`${relPath} (${errorMessage(error)})`, { cause: error }),
  );
}

// true/false from the matcher, or a skip when the matcher itself fails on the path
function checkIgnored(
  ctx: ScanContext,
  relPath: string,
  isDirectory: boolean,
): boolean | ScanDiagnostic {
  try {
    return ctx.matcher.shouldIgnore(relPath, { isDirectory });
  } catch (error) {
    return {
      path: relPath,
      reason: "ignore_rule_error",
      message: `Cannot evaluate ignore rules for ${relPath}: ${errorMessage(error)}`,
    };
  }
}

async function indexFileEntry(
  ctx: ScanContext,
  absPath: string,
  relPath: string,
  knownStat?: Stats,
): Promise<ScanOutcome> {
  try {
    const stat = knownStat ?? (await ctx.fileSystem.stat(absPath));
    const hash = await ctx.fileSystem.hashFile(absPath);
    const entry = {
      path: relPath,
      type: classifyFile(relPath),
      size: stat.size,
      modified: stat.mtime,
      hash,
    };

    if (hash === "") {
      return {
        kind: "indexed",
        entry,
        diagnostic: diagnosticFrom(relPath, "hash_unavailable", new FileReadError(relPath)),
      };
    }
    return { kind: "indexed", entry };
  } catch (error) {
    return { kind: "skipped", diagnostic: fileReadDiagnostic(relPath, error) };
  }
}

async function classifyDirent(
  ctx: ScanContext,
  parentRelPath: string,
  dirent: Dirent,
): Promise<ScanOutcome | null> {
  const relPath = joinRelPath(parentRelPath, dirent.name);
  const absPath = path.join(ctx.repoPath, relPath);

  if (dirent.isDirectory()) {
    const ignored = checkIgnored(ctx, relPath, true);
    if (ignored === true) return null;
    if (ignored !== false) return { kind: "skipped", diagnostic: ignored };
    return { kind: "directory", relPath };
  }

  if (dirent.isSymbolicLink()) {
    let target: Stats;
    try {
      target = await ctx.fileSystem.stat(absPath);
    } catch (error) {
      const ignored = checkIgnored(ctx, relPath, false);
      if (ignored === true) return null;
      if (ignored !== false) return { kind: "skipped", diagnostic: ignored };
      return { kind: "skipped", diagnostic: fileReadDiagnostic(relPath, error) };
    }

    const ignored = checkIgnored(ctx, relPath, target.isDirectory());
    if (ignored === true) return null;
    if (ignored !== false) return { kind: "skipped", diagnostic: ignored };

    if (target.isDirectory()) {
      return {
        kind: "skipped",
        diagnostic: {
          path: relPath,
          reason: "symlinked_directory",
          message: `Not following symlinked directory: ${relPath}`,
        },
      };
    }
    // FIFOs, sockets and devices behind a link would block or never end when read
    if (!target.isFile()) {
      return {
        kind: "skipped",
        diagnostic: {
          path: relPath,
          reason: "not_regular_file",
          message: `Symlink target is not a regular file: ${relPath}`,
        },
      };
    }
    return await indexFileEntry(ctx, absPath, relPath, target);
  }

  if (!dirent.isFile()) return null;
  const ignored = checkIgnored(ctx, relPath, false);
  if (ignored === true) return null;
  if (ignored !== false) return { kind: "skipped", diagnostic: ignored };
  return await indexFileEntry(ctx, absPath, relPath);
}

async function readSortedDir(ctx: ScanContext, absDir: string): Promise<Dirent[]> {
  const entries = await ctx.fileSystem.readdir(absDir);
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export async function scanRepository(options: ScanRepositoryOptions): Promise<ScanResult> {
  const repoPath = path.resolve(options.repoPath);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const ctx: ScanContext = {
    repoPath,
    matcher: options.matcher,
    fileSystem: options.fileSystem ?? nodeScanFileSystem,
  };

  const files: ScanResult["files"] = [];
  const diagnostics: ScanDiagnostic[] = [];

  let rootEntries: Dirent[];
  try {
    const stat = await ctx.fileSystem.stat(repoPath);
    if (!stat.isDirectory()) throw new Error("not a directory");
    rootEntries = await readSortedDir(ctx, repoPath);
  } catch (error) {
    throw new RepositoryNotFoundError(repoPath, { cause: error });
  }

  async function walk(relDir: string, entries: Dirent[], depth: number): Promise<void> {
    for (const dirent of entries) {
      const outcome = await classifyDirent(ctx, relDir, dirent);
      if (!outcome) continue;

      if (outcome.kind === "indexed") {
        files.push(outcome.entry);
        if (outcome.diagnostic) diagnostics.push(outcome.diagnostic);
        continue;
      }

      if (outcome.kind === "skipped") {
        diagnostics.push(outcome.diagnostic);
        continue;
      }

      if (depth + 1 > maxDepth) {
        diagnostics.push({
          path: outcome.relPath,
          reason: "max_depth_exceeded",
          message: `Directory exceeds max depth ${maxDepth}: ${outcome.relPath}`,
        });
        continue;
      }

      let children: Dirent[];
      try {
        children = await readSortedDir(ctx, path.join(repoPath, outcome.relPath));
      } catch (error) {
        diagnostics.push(
          diagnosticFrom(
            outcome.relPath,
            "directory_access_error",
            new DirectoryAccessError(`${outcome.relPath} (${errorMessage(error)})`, {
              cause: error,
            }),
          ),
        );
        continue;
      }

      await walk(outcome.relPath, children, depth + 1);
    }
  }

  await walk("", rootEntries, 0);
  return { files, diagnostics };
}
