// Current index snapshot
// - queries read whatever snapshot is published at call time
// - refresh builds a complete new snapshot, saves it, then swaps the reference
// - first read loads the persisted index (or builds one) exactly once

import type { IndexReport, RepositoryIndexer, WorkspaceIndex } from "@repo-librarian/core";

import { AsyncMutex } from "./asyncMutex.js";
import type { ExclusiveLock } from "./asyncMutex.js";

export type IndexSource = Pick<
  RepositoryIndexer,
  "getOrCreateIndex" | "createIndexWithReport" | "saveIndex"
>;

export class IndexHolder {
  private snapshot: WorkspaceIndex | null = null;
  private loading: Promise<WorkspaceIndex> | null = null;
  private readonly lock: ExclusiveLock;

  constructor(
    private readonly source: IndexSource,
    options: { lock?: ExclusiveLock } = {},
  ) {
    this.lock = options.lock ?? new AsyncMutex();
  }

  async current(): Promise<WorkspaceIndex> {
    if (this.snapshot) return this.snapshot;

    if (!this.loading) {
      this.loading = this.source
        .getOrCreateIndex()
        .then((index) => {
          // a refresh may have published while the initial load was in flight
          const published = this.snapshot ?? index;
          this.snapshot = published;
          return published;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return await this.loading;
  }

  async refresh(): Promise<IndexReport> {
    return await this.lock.runExclusive(async () => {
      const report = await this.source.createIndexWithReport();
      await this.source.saveIndex(report.index);
      this.snapshot = report.index;
      return report;
    });
  }
}
