// Content hash (SHA-256) for indexed files
// - streamed in bounded chunks, unreadable files hash to ""

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export const HASH_CHUNK_BYTES = 64 * 1024;

export async function hashFileContent(absPath: string): Promise<string> {
  const hash = createHash("sha256");

  try {
    const stream = createReadStream(absPath, { highWaterMark: HASH_CHUNK_BYTES });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return hash.digest("hex");
  } catch {
    return "";
  }
}
