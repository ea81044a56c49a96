// Repository indexer
// - full traversal -> WorkspaceIndex, persisted to <repo>/.claude/workspace/workspace.yml
// - refresh is a full rebuild (no diffing against the previous snapshot)

import path from "node:path";

import { errorMessage } from "../errors.js";
import { loadIgnoreMatcher } from "../repo/ignoreRules.js";
import { locateRepositoryRoot } from "../repo/repoRoot.js";
import {
  readWorkspaceIndexFile,
  resolveDefaultIndexPath,
  writeWorkspaceIndexFile,
} from "../workspace/persistence.js";
import type { WorkspaceIndex } from "../workspace/types.js";
import { buildWorkspaceIndex } from "../workspace/workspaceIndex.js";
import { DEFAULT_MAX_DEPTH, scanRepository } from "./scanRepository.js";
import type { ScanFileSystem } from "./scanRepository.js";
import type { IndexReport, IndexerLogger } from "./types.js";

export type RepositoryIndexerOptions = {
  repoPath?: string;
  cwd?: string;
  indexPath?: string;
  maxDepth?: number;
  extraIgnorePatterns?: readonly string[];
  logger?: IndexerLogger;
  now?: () => Date;
  fileSystem?: ScanFileSystem;
};

export type RepositoryIndexer = {
  repoPath: string;
  indexPath: string;
  maxDepth: number;
  createIndex(): Promise<WorkspaceIndex>;
  createIndexWithReport(): Promise<IndexReport>;
  saveIndex(index: WorkspaceIndex): Promise<void>;
  loadIndex(): Promise<WorkspaceIndex | null>;
  refreshIndex(): Promise<WorkspaceIndex>;
  getOrCreateIndex(): Promise<WorkspaceIndex>;
};

const LOG_PREFIX = "[librarian]";

function logLine(logger: IndexerLogger | undefined, line: string): void {
  logger?.log?.(`${LOG_PREFIX} ${line}`);
}

function warnLine(logger: IndexerLogger | undefined, line: string): void {
  logger?.warn?.(`${LOG_PREFIX} ${line}`);
}

export async function createRepositoryIndexer(
  options: RepositoryIndexerOptions = {},
): Promise<RepositoryIndexer> {
  const repoPath = path.resolve(
    options.repoPath ?? (await locateRepositoryRoot(options.cwd ?? process.cwd())),
  );
  const indexPath = options.indexPath
    ? path.resolve(repoPath, options.indexPath)
    : resolveDefaultIndexPath(repoPath);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const logger = options.logger;
  const now = options.now ?? (() => new Date());

  const createIndexWithReport = async (): Promise<IndexReport> => {
    logLine(logger, `indexing repository at ${repoPath}`);

    const matcher = await loadIgnoreMatcher(repoPath, {
      ...(options.extraIgnorePatterns ? { extraPatterns: options.extraIgnorePatterns } : {}),
    });
    const scan = await scanRepository({
      repoPath,
      matcher,
      maxDepth,
      fileSystem: options.fileSystem,
    });

    for (const diagnostic of scan.diagnostics) {
      warnLine(logger, `skip ${diagnostic.reason}: ${diagnostic.message}`);
    }

    const index = buildWorkspaceIndex({ repoPath, files: scan.files, lastUpdated: now() });
    logLine(
      logger,
      `indexed files=${index.repository.total_files} diagnostics=${scan.diagnostics.length}`,
    );
    return { index, diagnostics: scan.diagnostics };
  };

  const createIndex = async (): Promise<WorkspaceIndex> => (await createIndexWithReport()).index;

  const saveIndex = async (index: WorkspaceIndex): Promise<void> => {
    await writeWorkspaceIndexFile(indexPath, index);
    logLine(logger, `index saved to ${indexPath}`);
  };

  const loadIndex = async (): Promise<WorkspaceIndex | null> => {
    try {
      return await readWorkspaceIndexFile(indexPath);
    } catch (error) {
      warnLine(logger, `error loading index: ${errorMessage(error)}`);
      return null;
    }
  };

  const getOrCreateIndex = async (): Promise<WorkspaceIndex> => {
    const existing = await loadIndex();
    if (existing) {
      logLine(logger, `loaded existing index with ${existing.repository.total_files} files`);
      return existing;
    }

    logLine(logger, "no existing index found, creating a new one");
    const index = await createIndex();
    await saveIndex(index);
    return index;
  };

  return {
    repoPath,
    indexPath,
    maxDepth,
    createIndex,
    createIndexWithReport,
    saveIndex,
    loadIndex,
    refreshIndex: createIndex,
    getOrCreateIndex,
  };
}
