import { MAX_SOLO_RUN, type Outcome, type ParticipantId, type Promotion } from "../types.js";

export interface WaitlistState {
  entries: ParticipantId[];
  /**
   * True while every entry admitted since the list last became non-empty
   * belongs to the participant who started it. Only a solo run may stack
   * consecutive entries, up to MAX_SOLO_RUN.
   */
  soloRun: boolean;
}

/**
 * Ordered line for a single shared resource. Index 0 is the entry being served.
 * Holds no I/O and no locking; QueueManager owns both.
 */
export class Waitlist {
  private readonly entries: ParticipantId[];
  private soloRun: boolean;

  constructor(state?: WaitlistState) {
    this.entries = state ? [...state.entries] : [];
    this.soloRun = this.entries.length > 0 && (state?.soloRun ?? false);
  }

  get length(): number {
    return this.entries.length;
  }

  add(identity: ParticipantId): Outcome<number> {
    const last = this.entries[this.entries.length - 1];
    if (last === undefined) {
      this.entries.push(identity);
      this.soloRun = true;
      return { ok: true, value: 1 };
    }
    if (last === identity) {
      if (!this.soloRun) {
        return { ok: false, reason: "BACK_TO_BACK" };
      }
      if (this.entries.length >= MAX_SOLO_RUN) {
        return { ok: false, reason: "QUEUE_FULL" };
      }
    } else {
      this.soloRun = false;
    }
    this.entries.push(identity);
    return { ok: true, value: this.entries.length };
  }

  removeFront(identity: ParticipantId): Outcome<Promotion> {
    const current = this.entries[0];
    if (current === undefined) {
      return { ok: false, reason: "QUEUE_EMPTY" };
    }
    if (current !== identity) {
      return { ok: false, reason: "NOT_AT_FRONT" };
    }
    this.entries.shift();
    if (this.entries.length === 0) {
      this.soloRun = false;
    }
    return { ok: true, value: { newFront: this.entries[0] ?? null } };
  }

  removeSelf(identity: ParticipantId): Outcome<void> {
    const idx = this.entries.indexOf(identity, 1);
    if (idx >= 1) {
      this.entries.splice(idx, 1);
      return { ok: true, value: undefined };
    }
    if (this.entries[0] === identity) {
      return { ok: false, reason: "AT_FRONT" };
    }
    return { ok: false, reason: "NOT_FOUND" };
  }

  snapshot(): ParticipantId[] {
    return [...this.entries];
  }

  state(): WaitlistState {
    return { entries: this.snapshot(), soloRun: this.soloRun };
  }

  clone(): Waitlist {
    return new Waitlist(this.state());
  }
}
