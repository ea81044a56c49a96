export * from "./env.js";
export * from "./errors.js";

export * from "./repo/contentHash.js";
export * from "./repo/fileTypes.js";
export * from "./repo/ignoreRules.js";
export * from "./repo/repoRoot.js";

export * from "./workspace/persistence.js";
export * from "./workspace/types.js";
export * from "./workspace/workspaceIndex.js";

export * from "./indexing/repositoryIndexer.js";
export * from "./indexing/scanRepository.js";
export * from "./indexing/types.js";

export * from "./query/search.js";
export * from "./query/stats.js";
export * from "./query/types.js";
