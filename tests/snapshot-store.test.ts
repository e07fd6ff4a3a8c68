import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { MalformedSnapshot, PersistenceFailure } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { FileSnapshotStore } from "../src/queue/file-backend.js";
import { InMemorySnapshotStore } from "../src/queue/in-memory-backend.js";

const cleanupPaths: string[] = [];

afterEach(async () => {
  while (cleanupPaths.length > 0) {
    const path = cleanupPaths.pop();
    if (path) await rm(path, { recursive: true, force: true });
  }
});

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "printq-store-"));
  cleanupPaths.push(dir);
  return dir;
}

describe("file snapshot store", () => {
  it("loads undefined when no snapshot exists", async () => {
    const dir = await tempDir();
    const store = new FileSnapshotStore({ path: join(dir, "queue.json"), logger: silentLogger });
    expect(store.durable).toBe(true);
    await expect(store.load()).resolves.toBeUndefined();
  });

  it("saves and reloads the same order", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    await new FileSnapshotStore({ path, logger: silentLogger }).save({ entries: ["U1", "U2", "U1"], soloRun: false });
    const reloaded = await new FileSnapshotStore({ path, logger: silentLogger }).load();
    expect(reloaded).toEqual({ entries: ["U1", "U2", "U1"], soloRun: false });
  });

  it("creates missing parent directories", async () => {
    const dir = await tempDir();
    const path = join(dir, "state", "nested", "queue.json");
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    await store.save({ entries: ["U1"], soloRun: true });
    await expect(store.load()).resolves.toEqual({ entries: ["U1"], soloRun: true });
  });

  it("replaces the file and leaves no temp files behind", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    await store.save({ entries: ["U1"], soloRun: true });
    await store.save({ entries: ["U1", "U2"], soloRun: false });
    expect(await readdir(dir)).toEqual(["queue.json"]);
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual({ version: 1, entries: ["U1", "U2"], soloRun: false });
  });

  it("keeps the previous snapshot when a save is aborted before commit", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    await store.save({ entries: ["U1"], soloRun: true });
    const controller = new AbortController();
    controller.abort();
    await expect(store.save({ entries: ["U1", "U2"], soloRun: false }, { signal: controller.signal })).rejects.toBeInstanceOf(
      PersistenceFailure
    );
    await expect(store.load()).resolves.toEqual({ entries: ["U1"], soloRun: true });
    expect(await readdir(dir)).toEqual(["queue.json"]);
  });

  it("ignores temp files left by an interrupted write", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    await store.save({ entries: ["U1", "U2"], soloRun: false });
    await writeFile(join(dir, ".queue.json.123.deadbeef.tmp"), '{"version":1,"entr', "utf8");
    await expect(store.load()).resolves.toEqual({ entries: ["U1", "U2"], soloRun: false });
  });

  it("fails with MalformedSnapshot on corrupt content", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    await writeFile(path, "U1\nU2\n", "utf8");
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    const error = await store.load().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MalformedSnapshot);
    expect((error as MalformedSnapshot).code).toBe("MALFORMED_SNAPSHOT");
    expect((error as MalformedSnapshot).path).toBe(path);
  });

  it("fails with PersistenceFailure when the snapshot cannot be read", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    await mkdir(path);
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    const error = await store.load().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PersistenceFailure);
    expect((error as PersistenceFailure).code).toBe("PERSISTENCE_FAILURE");
  });

  it("fails with PersistenceFailure when the target cannot be replaced", async () => {
    const dir = await tempDir();
    const path = join(dir, "queue.json");
    await mkdir(path);
    const store = new FileSnapshotStore({ path, logger: silentLogger });
    const error = await store.save({ entries: ["U1"], soloRun: true }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PersistenceFailure);
    expect((error as PersistenceFailure).stateUncertain).toBe(false);
    expect((await readdir(dir)).sort()).toEqual(["queue.json"]);
  });
});

describe("in-memory snapshot store", () => {
  it("is not durable and starts without a snapshot", async () => {
    const store = new InMemorySnapshotStore();
    expect(store.durable).toBe(false);
    await expect(store.load()).resolves.toBeUndefined();
  });

  it("returns copies of what was saved", async () => {
    const store = new InMemorySnapshotStore();
    const state = { entries: ["U1"], soloRun: true };
    await store.save(state);
    state.entries.push("U2");
    await expect(store.load()).resolves.toEqual({ entries: ["U1"], soloRun: true });
    expect(store.saveCount).toBe(1);
  });

  it("honours an aborted signal", async () => {
    const store = new InMemorySnapshotStore({ entries: ["U1"], soloRun: true });
    const controller = new AbortController();
    controller.abort();
    await expect(store.save({ entries: [], soloRun: false }, { signal: controller.signal })).rejects.toThrow();
    await expect(store.load()).resolves.toEqual({ entries: ["U1"], soloRun: true });
  });
});
