export type QueueErrorCode =
  | "PERSISTENCE_FAILURE"
  | "PERSISTENCE_TIMEOUT"
  | "MALFORMED_SNAPSHOT"
  | "MANAGER_UNHEALTHY"
  | "MANAGER_CLOSED"
  | "CONFIG_INVALID";

export class QueueError extends Error {
  constructor(
    readonly code: QueueErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A durable read or write of the snapshot did not complete.
 * `stateUncertain` is set when the file on disk may already hold the new
 * snapshot, so rolling back memory alone could diverge from it.
 */
export class PersistenceFailure extends QueueError {
  readonly stateUncertain: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; stateUncertain?: boolean } = {},
    code: "PERSISTENCE_FAILURE" | "PERSISTENCE_TIMEOUT" = "PERSISTENCE_FAILURE"
  ) {
    super(code, message, "cause" in options ? { cause: options.cause } : undefined);
    this.stateUncertain = options.stateUncertain ?? false;
  }
}

export class PersistenceTimeout extends PersistenceFailure {
  constructor(readonly timeoutMs: number) {
    super(`snapshot write did not finish within ${timeoutMs}ms`, { stateUncertain: true }, "PERSISTENCE_TIMEOUT");
  }
}

export class MalformedSnapshot extends QueueError {
  constructor(
    readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super("MALFORMED_SNAPSHOT", `malformed queue snapshot at ${path}: ${detail}`, options);
  }
}

export class ManagerUnhealthy extends QueueError {
  constructor(reason: string) {
    super("MANAGER_UNHEALTHY", `queue manager refuses mutations: ${reason}`);
  }
}

export class ManagerClosed extends QueueError {
  constructor() {
    super("MANAGER_CLOSED", "queue manager is closed");
  }
}

export class ConfigError extends QueueError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
