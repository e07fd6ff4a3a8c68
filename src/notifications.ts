import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { NotificationSink, QueueEvent } from "./types.js";

/** Returns false (or throws) when the event could not be delivered. */
export type DeliverFn = (event: QueueEvent) => Promise<boolean>;

export interface NotificationStats {
  pending: number;
  delivered: number;
  failed: number;
}

/**
 * Buffers queue events and delivers them one at a time in the background.
 * `emit` never waits on delivery, and a failed delivery is logged and dropped.
 */
export class NotificationDispatcher implements NotificationSink {
  private readonly pending: QueueEvent[] = [];
  private readonly logger: Logger;
  private draining: Promise<void> | undefined;
  private delivered = 0;
  private failed = 0;

  constructor(
    private readonly deliver: DeliverFn,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? createLogger("printq:notify");
  }

  emit(event: QueueEvent): void {
    this.pending.push(event);
    this.schedule();
  }

  /** Resolves once every event emitted so far has been attempted. */
  async drain(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  stats(): NotificationStats {
    return {
      pending: this.pending.length,
      delivered: this.delivered,
      failed: this.failed
    };
  }

  private schedule(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.run().finally(() => {
      this.draining = undefined;
      if (this.pending.length > 0) {
        this.schedule();
      }
    });
  }

  private async run(): Promise<void> {
    // Defer so the emitting mutation returns before any delivery work starts.
    await Promise.resolve();
    for (let event = this.pending.shift(); event !== undefined; event = this.pending.shift()) {
      try {
        if (await this.deliver(event)) {
          this.delivered += 1;
        } else {
          this.failed += 1;
          this.logger.warn(`${event.type} notification for ${event.participantId} was not delivered`);
        }
      } catch (err) {
        this.failed += 1;
        this.logger.warn(`${event.type} notification for ${event.participantId} failed:`, errorMessage(err));
      }
    }
  }
}
