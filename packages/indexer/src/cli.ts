#!/usr/bin/env node
// Repo Librarian 인덱서(indexer) CLI
// - repository → 파일 메타데이터(file metadata) → workspace.yml 저장, 검색/통계 조회

import { Command } from "commander";

import { errorMessage, parseMaxDepth } from "@repo-librarian/core";

import type { CliOutput, CommonCommandOptions } from "./commands.js";
import { runIndexCommand, runSearchCommand, runStatsCommand } from "./commands.js";

type CommonFlags = {
  repo?: string;
  indexPath?: string;
  maxDepth?: string;
};

const output: CliOutput = {
  log: (line) => console.log(line),
  warn: (line) => console.error(line),
};

function toCommonOptions(flags: CommonFlags): CommonCommandOptions {
  return {
    repo: flags.repo,
    indexPath: flags.indexPath,
    maxDepth: parseMaxDepth(flags.maxDepth, "--max-depth"),
  };
}

function parseLimit(raw: string): number {
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 1) {
    throw new Error(`Invalid --limit: "${raw}". Expected a positive integer.`);
  }
  return n;
}

async function runGuarded(fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    console.error(`[librarian-indexer] error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

function withCommonFlags(command: Command): Command {
  return command
    .option("--repo <path>", "repository 루트 경로(기본: .git 기준 자동 탐색)")
    .option("--index-path <path>", "index 파일 경로(기본: <repo>/.claude/workspace/workspace.yml)")
    .option("--max-depth <n>", "디렉터리 탐색 최대 깊이");
}

const program = new Command();

program.name("librarian-indexer").description("Repository 파일 인덱싱 CLI (workspace.yml)");

withCommonFlags(program.command("index").description("repository 전체를 다시 스캔해서 저장")).action(
  async (flags: CommonFlags) => {
    await runGuarded(() => runIndexCommand(toCommonOptions(flags), output));
  },
);

withCommonFlags(program.command("stats").description("index 통계(statistics) 출력"))
  .option("--json", "JSON으로 출력", false)
  .action(async (flags: CommonFlags & { json: boolean }) => {
    await runGuarded(() =>
      runStatsCommand({ ...toCommonOptions(flags), json: flags.json }, output),
    );
  });

withCommonFlags(program.command("search").description("경로(path) 검색"))
  .argument("[query]", "검색어(substring, --regex면 정규식)")
  .option("--regex", "query를 정규식(regex)으로 해석", false)
  .option("--type <name>", "파일 타입(file type)으로 필터")
  .option("--case-sensitive", "대소문자 구분", false)
  .option("--limit <n>", "최대 결과 수", "100")
  .action(
    async (
      query: string | undefined,
      flags: CommonFlags & {
        regex: boolean;
        type?: string;
        caseSensitive: boolean;
        limit: string;
      },
    ) => {
      await runGuarded(() =>
        runSearchCommand(
          query,
          {
            ...toCommonOptions(flags),
            regex: flags.regex,
            type: flags.type,
            caseSensitive: flags.caseSensitive,
            limit: parseLimit(flags.limit),
          },
          output,
        ),
      );
    },
  );

await program.parseAsync(process.argv);
