import { describe, expect, it } from "vitest";

import { AsyncMutex } from "../src/lib/asyncMutex.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("AsyncMutex", () => {
  it("runs queued work in call order without overlap", async () => {
    const mutex = new AsyncMutex();
    const events: string[] = [];

    const job = (name: string, ms: number) =>
      mutex.runExclusive(async () => {
        events.push(`start:${name}`);
        await delay(ms);
        events.push(`end:${name}`);
        return name;
      });

    const results = await Promise.all([job("a", 10), job("b", 1), job("c", 1)]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
  });

  it("releases the lock when the work throws", async () => {
    const mutex = new AsyncMutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive(async () => "next")).resolves.toBe("next");
  });
});
