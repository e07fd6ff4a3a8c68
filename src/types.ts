/** Opaque participant token, e.g. a Slack user id such as `U0123ABCD`. */
export type ParticipantId = string;

export type RejectionReason =
  | "BACK_TO_BACK"
  | "QUEUE_FULL"
  | "NOT_AT_FRONT"
  | "QUEUE_EMPTY"
  | "AT_FRONT"
  | "NOT_FOUND";

export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: RejectionReason };

export interface Promotion {
  /** Who holds the front after the removal, or null when the line is now empty. */
  newFront: ParticipantId | null;
}

export interface PromotedEvent {
  type: "promoted";
  participantId: ParticipantId;
  at: string;
}

export type QueueEvent = PromotedEvent;

export interface NotificationSink {
  emit(event: QueueEvent): void;
}

export interface AddResult {
  position: number;
  order: ParticipantId[];
}

export interface FinishResult {
  promoted: ParticipantId | null;
  order: ParticipantId[];
}

export interface CancelResult {
  order: ParticipantId[];
}

export interface ManagerHealth {
  healthy: boolean;
  durable: boolean;
  consecutiveWriteFailures: number;
  lastError?: string;
}

export const MAX_SOLO_RUN = 3;

export function isParticipantId(value: unknown): value is ParticipantId {
  return (
    typeof value === "string" &&
    value.length > 0 &&
    value.length <= 128 &&
    value.trim() === value &&
    !/[\r\n]/.test(value)
  );
}

export interface RpcRequest {
  id?: string;
  version: string;
  method: string;
  params?: Record<string, unknown>;
}

export interface RpcResponse {
  id?: string;
  auditId: string;
  ok: boolean;
  result?: unknown;
  error?: {
    code: string;
    message: string;
  };
}
