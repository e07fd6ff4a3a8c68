import {
  ManagerClosed,
  ManagerUnhealthy,
  PersistenceFailure,
  PersistenceTimeout,
  errorMessage
} from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import {
  isParticipantId,
  type AddResult,
  type CancelResult,
  type FinishResult,
  type ManagerHealth,
  type NotificationSink,
  type Outcome,
  type ParticipantId,
  type QueueEvent
} from "../types.js";
import { ReadWriteLock } from "./lock.js";
import type { SnapshotStore } from "./types.js";
import { Waitlist, type WaitlistState } from "./waitlist.js";

export interface QueueManagerOptions {
  store: SnapshotStore;
  notifications?: NotificationSink;
  /** Upper bound for one snapshot write; an expired write marks the manager unhealthy. */
  writeTimeoutMs?: number;
  /** Failed writes in a row before mutations are refused. */
  maxConsecutiveWriteFailures?: number;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_WRITE_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_WRITE_FAILURES = 3;

interface Applied<R> {
  result: R;
  events: QueueEvent[];
}

/**
 * Single owner of the waitlist. Every mutation runs under the write lock:
 * rule check, in-memory change, durable write, then event emission. A write
 * that fails leaves the previous state in memory.
 */
export class QueueManager {
  private readonly lock = new ReadWriteLock();
  private readonly logger: Logger;
  private readonly writeTimeoutMs: number;
  private readonly maxWriteFailures: number;
  private readonly now: () => Date;
  private consecutiveWriteFailures = 0;
  private lastError: string | undefined;
  private unhealthyReason: string | undefined;
  private closed = false;

  private constructor(
    private readonly options: QueueManagerOptions,
    private waitlist: Waitlist
  ) {
    this.logger = options.logger ?? createLogger("printq");
    this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
    this.maxWriteFailures = Math.max(1, options.maxConsecutiveWriteFailures ?? DEFAULT_MAX_WRITE_FAILURES);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Loads the persisted snapshot (or starts empty when there is none).
   * Rejects with MalformedSnapshot or PersistenceFailure; the caller must not
   * serve commands in that case.
   */
  static async open(options: QueueManagerOptions): Promise<QueueManager> {
    const state = await options.store.load();
    const manager = new QueueManager(options, new Waitlist(state));
    const size = state?.entries.length ?? 0;
    manager.logger.info(
      options.store.durable
        ? `loaded ${size} queue entr${size === 1 ? "y" : "ies"} from ${options.store.location}`
        : "no queue file configured; queue state will not survive a restart"
    );
    return manager;
  }

  async addSelf(identity: ParticipantId): Promise<Outcome<AddResult>> {
    return this.mutate(
      identity,
      (draft) => draft.add(identity),
      (position, order) => ({ result: { position, order }, events: [] })
    );
  }

  async finishTurn(identity: ParticipantId): Promise<Outcome<FinishResult>> {
    return this.mutate(
      identity,
      (draft) => draft.removeFront(identity),
      ({ newFront }, order) => ({
        result: { promoted: newFront, order },
        events:
          newFront === null
            ? []
            : [{ type: "promoted", participantId: newFront, at: this.now().toISOString() }]
      })
    );
  }

  async cancelSelf(identity: ParticipantId): Promise<Outcome<CancelResult>> {
    return this.mutate(
      identity,
      (draft) => draft.removeSelf(identity),
      (_value, order) => ({ result: { order }, events: [] })
    );
  }

  async currentOrder(): Promise<ParticipantId[]> {
    return this.lock.withRead(() => this.waitlist.snapshot());
  }

  health(): ManagerHealth {
    const health: ManagerHealth = {
      healthy: this.unhealthyReason === undefined && !this.closed,
      durable: this.options.store.durable,
      consecutiveWriteFailures: this.consecutiveWriteFailures
    };
    if (this.lastError !== undefined) {
      health.lastError = this.lastError;
    }
    return health;
  }

  /** Waits for the in-flight mutation, then refuses new ones. */
  async close(): Promise<void> {
    await this.lock.withWrite(() => {
      this.closed = true;
    });
    await this.options.store.close();
  }

  private async mutate<T, R>(
    identity: ParticipantId,
    apply: (draft: Waitlist) => Outcome<T>,
    finish: (value: T, order: ParticipantId[]) => Applied<R>
  ): Promise<Outcome<R>> {
    if (!isParticipantId(identity)) {
      throw new TypeError(`invalid participant id: ${JSON.stringify(identity)}`);
    }
    return this.lock.withWrite<Outcome<R>>(async () => {
      this.assertWritable();
      const draft = this.waitlist.clone();
      const outcome = apply(draft);
      if (!outcome.ok) {
        return outcome;
      }
      await this.persist(draft.state());
      this.waitlist = draft;
      const applied = finish(outcome.value, draft.snapshot());
      for (const event of applied.events) {
        this.emit(event);
      }
      return { ok: true, value: applied.result };
    });
  }

  private assertWritable(): void {
    if (this.closed) {
      throw new ManagerClosed();
    }
    if (this.unhealthyReason !== undefined) {
      throw new ManagerUnhealthy(this.unhealthyReason);
    }
  }

  private async persist(state: WaitlistState): Promise<void> {
    const controller = new AbortController();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const saving = this.options.store.save(state, { signal: controller.signal });
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(new PersistenceTimeout(this.writeTimeoutMs));
      }, this.writeTimeoutMs);
    });
    void saving.catch((err: unknown) => {
      if (timedOut) {
        this.logger.warn("snapshot write finished with an error after its deadline:", errorMessage(err));
      }
    });
    try {
      await Promise.race([saving, deadline]);
      this.consecutiveWriteFailures = 0;
    } catch (err) {
      const failure =
        err instanceof PersistenceFailure
          ? err
          : new PersistenceFailure(`snapshot write failed: ${errorMessage(err)}`, { cause: err });
      this.recordWriteFailure(failure);
      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }

  private recordWriteFailure(failure: PersistenceFailure): void {
    this.consecutiveWriteFailures += 1;
    this.lastError = failure.message;
    this.logger.error("queue mutation rolled back:", failure.message);
    if (failure.stateUncertain) {
      this.unhealthyReason = `snapshot on disk may not match memory (${failure.message})`;
    } else if (this.consecutiveWriteFailures >= this.maxWriteFailures) {
      this.unhealthyReason = `${this.consecutiveWriteFailures} consecutive snapshot write failures`;
    }
    if (this.unhealthyReason !== undefined) {
      this.logger.error("queue manager marked unhealthy:", this.unhealthyReason);
    }
  }

  private emit(event: QueueEvent): void {
    const sink = this.options.notifications;
    if (!sink) {
      return;
    }
    try {
      sink.emit(event);
    } catch (err) {
      this.logger.warn(`could not queue ${event.type} notification for ${event.participantId}:`, errorMessage(err));
    }
  }
}
