/**
 * Durable medium for the waitlist snapshot.
 * The file store gives crash-safe replace-on-write; the in-memory store backs
 * the non-durable mode used when no queue file is configured.
 */

import type { WaitlistState } from "./waitlist.js";

export interface SaveOptions {
  /** Aborting before the commit step leaves the previous snapshot in place. */
  signal?: AbortSignal;
}

export interface SnapshotStore {
  readonly durable: boolean;
  readonly location: string;
  /** Returns undefined when no snapshot has been written yet. */
  load(): Promise<WaitlistState | undefined>;
  save(state: WaitlistState, options?: SaveOptions): Promise<void>;
  close(): Promise<void>;
}
