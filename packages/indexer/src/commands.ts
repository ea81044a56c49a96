// librarian-indexer commands
// - index: full scan -> workspace.yml
// - stats / search: read the persisted index (building it on first use)

import {
  computeStats,
  createRepositoryIndexer,
  loadEnv,
  searchByRegex,
  searchBySubstring,
  searchByType,
  sortedTypeCounts,
} from "@repo-librarian/core";
import type {
  FileEntry,
  IndexStats,
  QueryResult,
  RepositoryIndexer,
  ScanDiagnostic,
} from "@repo-librarian/core";

export type CliOutput = {
  log: (line: string) => void;
  warn: (line: string) => void;
};

export type CommonCommandOptions = {
  repo?: string | undefined;
  indexPath?: string | undefined;
  maxDepth?: number | undefined;
};

export type SearchCommandOptions = CommonCommandOptions & {
  regex: boolean;
  type?: string | undefined;
  caseSensitive: boolean;
  limit: number;
};

export type IndexCommandSummary = {
  repoPath: string;
  indexPath: string;
  totalFiles: number;
  diagnostics: ScanDiagnostic[];
};

const CLI_PREFIX = "[librarian-indexer]";

export async function openIndexer(
  options: CommonCommandOptions,
  output: CliOutput,
): Promise<RepositoryIndexer> {
  const env = loadEnv();

  return await createRepositoryIndexer({
    repoPath: options.repo ?? env.repoPath,
    indexPath: options.indexPath ?? env.indexPath,
    maxDepth: options.maxDepth ?? env.maxDepth,
    extraIgnorePatterns: env.extraIgnorePatterns,
    logger: output,
  });
}

export async function runIndexCommand(
  options: CommonCommandOptions,
  output: CliOutput,
): Promise<IndexCommandSummary> {
  const indexer = await openIndexer(options, output);
  output.log(`${CLI_PREFIX} repo=${indexer.repoPath}`);
  output.log(`${CLI_PREFIX} index=${indexer.indexPath}`);

  const report = await indexer.createIndexWithReport();
  await indexer.saveIndex(report.index);

  output.log(
    `${CLI_PREFIX} [summary] files=${report.index.repository.total_files}, skipped=${report.diagnostics.length}`,
  );

  return {
    repoPath: indexer.repoPath,
    indexPath: indexer.indexPath,
    totalFiles: report.index.repository.total_files,
    diagnostics: report.diagnostics,
  };
}

export function formatStatsLines(repoPath: string, stats: IndexStats): string[] {
  const lines = [
    "Index Statistics:",
    "================",
    "",
    `Repository: ${repoPath}`,
    `Total files: ${stats.total_files}`,
    `Total size: ${stats.total_size.toLocaleString("en-US")} bytes`,
    `Last updated: ${stats.last_updated.toISOString()}`,
    `Index path: ${stats.index_path}`,
    "",
    "Files by type:",
  ];

  for (const row of sortedTypeCounts(stats)) {
    lines.push(`  - ${row.type}: ${row.count}`);
  }
  return lines;
}

export async function runStatsCommand(
  options: CommonCommandOptions & { json: boolean },
  output: CliOutput,
): Promise<IndexStats> {
  const indexer = await openIndexer(options, output);
  const index = await indexer.getOrCreateIndex();
  const stats = computeStats(index, indexer.indexPath);

  if (options.json) {
    output.log(JSON.stringify(stats, null, 2));
  } else {
    for (const line of formatStatsLines(indexer.repoPath, stats)) output.log(line);
  }

  return stats;
}

export function formatFileLine(entry: FileEntry): string {
  return `- ${entry.path} (${entry.type}, ${entry.size} bytes)`;
}

export async function runSearchCommand(
  query: string | undefined,
  options: SearchCommandOptions,
  output: CliOutput,
): Promise<FileEntry[]> {
  if (!options.type && !query) {
    throw new Error("A search query is required unless --type is given.");
  }

  const indexer = await openIndexer(options, output);
  const index = await indexer.getOrCreateIndex();

  let result: QueryResult<FileEntry[]>;
  if (options.type) {
    result = searchByType(index, {
      type: options.type,
      pattern: query ?? null,
      limit: options.limit,
    });
  } else if (options.regex) {
    result = searchByRegex(index, {
      pattern: query ?? "",
      caseSensitive: options.caseSensitive,
      limit: options.limit,
    });
  } else {
    result = {
      ok: true,
      value: searchBySubstring(index, {
        pattern: query ?? "",
        caseSensitive: options.caseSensitive,
        limit: options.limit,
      }),
    };
  }

  if (!result.ok) throw result.error;

  const files = result.value;
  if (files.length === 0) {
    output.log("No files found matching the pattern.");
    return files;
  }

  const label = options.type ? `${options.type} file(s)` : `file(s) matching '${query ?? ""}'`;
  output.log(`Found ${files.length} ${label}:`);
  output.log("");
  for (const entry of files) output.log(formatFileLine(entry));
  return files;
}
