import type { SaveOptions, SnapshotStore } from "./types.js";
import type { WaitlistState } from "./waitlist.js";

export class InMemorySnapshotStore implements SnapshotStore {
  readonly durable = false;
  readonly location = "memory";
  private state: WaitlistState | undefined;
  private saves = 0;

  constructor(initial?: WaitlistState) {
    this.state = initial ? copyState(initial) : undefined;
  }

  get saveCount(): number {
    return this.saves;
  }

  async load(): Promise<WaitlistState | undefined> {
    return this.state ? copyState(this.state) : undefined;
  }

  async save(state: WaitlistState, options: SaveOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();
    this.state = copyState(state);
    this.saves += 1;
  }

  async close(): Promise<void> {
    // Nothing to release; state is kept for a later load.
  }
}

function copyState(state: WaitlistState): WaitlistState {
  return { entries: [...state.entries], soloRun: state.soloRun };
}
