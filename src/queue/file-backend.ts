import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { MalformedSnapshot, PersistenceFailure, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { SnapshotDecodeError, decodeSnapshot, encodeSnapshot } from "./snapshot-codec.js";
import type { SaveOptions, SnapshotStore } from "./types.js";
import type { WaitlistState } from "./waitlist.js";

/**
 * File-based snapshot store. Each save writes a sibling temp file, fsyncs it,
 * then renames it over the snapshot, so a crash mid-write leaves the previous
 * snapshot intact.
 */
export class FileSnapshotStore implements SnapshotStore {
  readonly durable = true;
  readonly location: string;
  private readonly logger: Logger;

  constructor(options: { path: string; logger?: Logger }) {
    this.location = options.path;
    this.logger = options.logger ?? createLogger("printq:store");
  }

  async load(): Promise<WaitlistState | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.location, "utf8");
    } catch (err) {
      const code = (err as NodeJS.ErrnoException)?.code;
      if (code === "ENOENT") {
        return undefined;
      }
      throw new PersistenceFailure(`cannot read queue snapshot ${this.location}: ${errorMessage(err)}`, {
        cause: err
      });
    }
    try {
      return decodeSnapshot(raw);
    } catch (err) {
      if (err instanceof SnapshotDecodeError) {
        throw new MalformedSnapshot(this.location, err.message, { cause: err });
      }
      throw err;
    }
  }

  async save(state: WaitlistState, options: SaveOptions = {}): Promise<void> {
    const data = encodeSnapshot(state);
    const dir = dirname(this.location);
    const tempPath = join(dir, `.${basename(this.location)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`);
    let renamed = false;
    try {
      options.signal?.throwIfAborted();
      await mkdir(dir, { recursive: true });
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(data, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      options.signal?.throwIfAborted();
      await rename(tempPath, this.location);
      renamed = true;
      await syncDirectory(dir);
    } catch (err) {
      if (!renamed) {
        await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
          this.logger.warn("could not remove temp snapshot:", tempPath, errorMessage(cleanupErr));
        });
      }
      throw new PersistenceFailure(`cannot write queue snapshot ${this.location}: ${errorMessage(err)}`, {
        cause: err,
        stateUncertain: renamed
      });
    }
  }

  async close(): Promise<void> {
    // No-op; every save is already on disk.
  }
}

async function syncDirectory(dir: string): Promise<void> {
  if (process.platform === "win32") {
    return;
  }
  const handle = await open(dir, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}
