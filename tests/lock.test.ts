import { describe, expect, it } from "vitest";

import { ReadWriteLock } from "../src/queue/lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("read/write lock", () => {
  it("runs writers one at a time in arrival order", async () => {
    const lock = new ReadWriteLock();
    const log: string[] = [];
    const gate = deferred();
    const first = lock.withWrite(async () => {
      log.push("w1:start");
      await gate.promise;
      log.push("w1:end");
    });
    const second = lock.withWrite(() => {
      log.push("w2");
    });
    const third = lock.withWrite(() => {
      log.push("w3");
    });
    await Promise.resolve();
    expect(lock.pendingCount).toBe(2);
    gate.resolve();
    await Promise.all([first, second, third]);
    expect(log).toEqual(["w1:start", "w1:end", "w2", "w3"]);
  });

  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    let concurrent = 0;
    let peak = 0;
    const reader = () =>
      lock.withRead(async () => {
        concurrent += 1;
        peak = Math.max(peak, concurrent);
        await gate.promise;
        concurrent -= 1;
      });
    const readers = [reader(), reader(), reader()];
    await Promise.resolve();
    expect(lock.readerCount).toBe(3);
    gate.resolve();
    await Promise.all(readers);
    expect(peak).toBe(3);
  });

  it("keeps readers out while a writer holds the lock", async () => {
    const lock = new ReadWriteLock();
    const log: string[] = [];
    const gate = deferred();
    const writer = lock.withWrite(async () => {
      log.push("write:start");
      await gate.promise;
      log.push("write:end");
    });
    const reader = lock.withRead(() => {
      log.push("read");
    });
    await Promise.resolve();
    expect(lock.isWriteLocked).toBe(true);
    gate.resolve();
    await Promise.all([writer, reader]);
    expect(log).toEqual(["write:start", "write:end", "read"]);
  });

  it("queues a reader behind a waiting writer", async () => {
    const lock = new ReadWriteLock();
    const log: string[] = [];
    const gate = deferred();
    const firstRead = lock.withRead(async () => {
      log.push("r1:start");
      await gate.promise;
      log.push("r1:end");
    });
    const writer = lock.withWrite(() => {
      log.push("w");
    });
    const lateRead = lock.withRead(() => {
      log.push("r2");
    });
    await Promise.resolve();
    expect(lock.pendingCount).toBe(2);
    gate.resolve();
    await Promise.all([firstRead, writer, lateRead]);
    expect(log).toEqual(["r1:start", "r1:end", "w", "r2"]);
  });

  it("releases the lock when a task throws", async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.withWrite(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.withWrite(() => "next")).resolves.toBe("next");
    expect(lock.isWriteLocked).toBe(false);
  });
});
