// Repository root detection
// - nearest ancestor (inclusive) containing a .git entry, else the starting directory

import { promises as fs } from "node:fs";
import path from "node:path";

import { VCS_METADATA_DIR } from "./ignoreRules.js";

async function pathExists(absPath: string): Promise<boolean> {
  try {
    await fs.access(absPath);
    return true;
  } catch {
    return false;
  }
}

export async function locateRepositoryRoot(cwd: string = process.cwd()): Promise<string> {
  const start = path.resolve(cwd);
  let current = start;

  while (true) {
    if (await pathExists(path.join(current, VCS_METADATA_DIR))) return current;

    const parent = path.dirname(current);
    if (parent === current) return start;
    current = parent;
  }
}
