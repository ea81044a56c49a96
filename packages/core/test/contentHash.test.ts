import { describe, expect, it } from "vitest";

import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { HASH_CHUNK_BYTES, hashFileContent } from "../src/repo/contentHash.js";

import { withTempDir } from "./tempRepo.js";

describe("hashFileContent()", () => {
  it("returns the lowercase sha256 hex digest", async () => {
    await withTempDir("librarian-hash-", async (dir) => {
      const absPath = path.join(dir, "a.txt");
      await fs.writeFile(absPath, "hello", "utf8");

      expect(await hashFileContent(absPath)).toBe(
        "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
      );
    });
  });

  it("hashes files larger than one chunk", async () => {
    await withTempDir("librarian-hash-", async (dir) => {
      const absPath = path.join(dir, "big.bin");
      const content = Buffer.alloc(HASH_CHUNK_BYTES * 3 + 17, 7);
      await fs.writeFile(absPath, content);

      const expected = createHash("sha256").update(content).digest("hex");
      expect(await hashFileContent(absPath)).toBe(expected);
    });
  });

  it("hashes empty files", async () => {
    await withTempDir("librarian-hash-", async (dir) => {
      const absPath = path.join(dir, "empty");
      await fs.writeFile(absPath, "");

      expect(await hashFileContent(absPath)).toBe(
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
      );
    });
  });

  it("returns an empty string when the file cannot be read", async () => {
    await withTempDir("librarian-hash-", async (dir) => {
      expect(await hashFileContent(path.join(dir, "missing.txt"))).toBe("");
      expect(await hashFileContent(dir)).toBe("");
    });
  });
});
