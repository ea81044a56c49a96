// Persisted WorkspaceIndex (workspace.yml)
// - YAML document: version, last_updated, repository, index.files, file_types
// - timestamps are ISO-8601 UTC strings
// - file_types is informational and regenerated on load

import { promises as fs } from "node:fs";
import path from "node:path";

import { dump, load } from "js-yaml";
import { z } from "zod";

import { PersistenceReadError, PersistenceWriteError, errorMessage } from "../errors.js";
import { parseFileType } from "../repo/fileTypes.js";
import type { FileType } from "../repo/fileTypes.js";
import type { WorkspaceIndex } from "./types.js";
import { buildWorkspaceIndex } from "./workspaceIndex.js";

export const WORKSPACE_INDEX_RELATIVE_PATH = path.join(".claude", "workspace", "workspace.yml");

export function resolveDefaultIndexPath(repoPath: string): string {
  return path.join(repoPath, WORKSPACE_INDEX_RELATIVE_PATH);
}

const timestampSchema = z
  .union([z.string().min(1), z.date()])
  .transform((value) => (value instanceof Date ? value : new Date(value)))
  .refine((value) => !Number.isNaN(value.getTime()), { message: "Invalid timestamp" });

const fileTypeSchema = z.string().transform((value, ctx): FileType => {
  const type = parseFileType(value);
  if (type === null) {
    ctx.addIssue({ code: "custom", message: `Unknown file type "${value}"` });
    return z.NEVER;
  }
  return type;
});

const fileEntrySchema = z.object({
  path: z.string().min(1),
  type: fileTypeSchema,
  size: z.number().int().nonnegative(),
  modified: timestampSchema,
  hash: z.string(),
});

const persistedIndexSchema = z.object({
  version: z.string(),
  last_updated: timestampSchema,
  repository: z.object({
    path: z.string().min(1),
    total_files: z.number().int().nonnegative(),
  }),
  index: z.object({ files: z.array(fileEntrySchema) }),
  file_types: z.record(z.string(), z.array(z.string())).optional(),
});

export function serializeWorkspaceIndex(index: WorkspaceIndex): string {
  const document = {
    version: index.version,
    last_updated: index.last_updated.toISOString(),
    repository: {
      path: index.repository.path,
      total_files: index.repository.total_files,
    },
    index: {
      files: index.files.map((entry) => ({
        path: entry.path,
        type: entry.type,
        size: entry.size,
        modified: entry.modified.toISOString(),
        hash: entry.hash,
      })),
    },
    file_types: index.file_type_extensions,
  };

  return dump(document, { noRefs: true, lineWidth: -1, sortKeys: false });
}

function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

export function deserializeWorkspaceIndex(text: string, indexPath: string): WorkspaceIndex {
  let raw: unknown;
  try {
    raw = load(text);
  } catch (error) {
    throw new PersistenceReadError(indexPath, errorMessage(error), { cause: error });
  }

  const parsed = persistedIndexSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceReadError(indexPath, formatSchemaIssues(parsed.error), {
      cause: parsed.error,
    });
  }

  const data = parsed.data;
  return buildWorkspaceIndex({
    repoPath: data.repository.path,
    files: data.index.files,
    lastUpdated: data.last_updated,
    version: data.version,
  });
}

export async function readWorkspaceIndexFile(indexPath: string): Promise<WorkspaceIndex | null> {
  let text: string;
  try {
    text = await fs.readFile(indexPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw new PersistenceReadError(indexPath, errorMessage(error), { cause: error });
  }

  return deserializeWorkspaceIndex(text, indexPath);
}

async function atomicWriteUtf8File(absPath: string, text: string): Promise<void> {
  const dir = path.dirname(absPath);
  const base = path.basename(absPath);
  const tmpPath = path.join(dir, `.${base}.tmp-${process.pid}-${Date.now()}`);

  await fs.writeFile(tmpPath, text, "utf8");

  try {
    await fs.rename(tmpPath, absPath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}

export async function writeWorkspaceIndexFile(
  indexPath: string,
  index: WorkspaceIndex,
): Promise<void> {
  try {
    await fs.mkdir(path.dirname(indexPath), { recursive: true });
    await atomicWriteUtf8File(indexPath, serializeWorkspaceIndex(index));
  } catch (error) {
    throw new PersistenceWriteError(indexPath, errorMessage(error), { cause: error });
  }
}
