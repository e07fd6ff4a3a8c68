import type { QueueManager } from "./queue/manager.js";
import { MAX_SOLO_RUN, type ParticipantId, type RejectionReason } from "./types.js";

export type QueueCommand = "add" | "done" | "cancel" | "show" | "unknown";

export type QueueCommands = Pick<QueueManager, "addSelf" | "finishTurn" | "cancelSelf" | "currentOrder">;

export interface CommandReply {
  command: QueueCommand;
  text: string;
  accepted: boolean;
  reason?: RejectionReason;
}

const KNOWN_COMMANDS: ReadonlySet<string> = new Set(["add", "done", "cancel", "show"]);
const MENTION = /<@[A-Z0-9]+(?:\|[^>]*)?>/gi;

export const HELP_TEXT = "Unrecognized command. Your options are: add, cancel, done, and show";

export function mention(id: ParticipantId): string {
  return `<@${id}>`;
}

/** Reads the command out of a message such as `<@UBOT> add`. */
export function parseCommand(text: string): QueueCommand {
  const normalized = text.replace(MENTION, " ").trim().toLowerCase().replace(/\s+/g, " ");
  return isQueueCommand(normalized) ? normalized : "unknown";
}

function isQueueCommand(value: string): value is Exclude<QueueCommand, "unknown"> {
  return KNOWN_COMMANDS.has(value);
}

export function describeRejection(reason: RejectionReason, who: ParticipantId): string {
  switch (reason) {
    case "BACK_TO_BACK":
      return `Sorry ${mention(who)}, you cannot take two spots in a row; wait until someone else joins`;
    case "QUEUE_FULL":
      return `Sorry ${mention(who)}, you already hold ${MAX_SOLO_RUN} spots in a row`;
    case "NOT_AT_FRONT":
      return "You cannot be done; you are not at the front of the line";
    case "QUEUE_EMPTY":
      return "You cannot be done; the queue is empty";
    case "AT_FRONT":
      return `${mention(who)}, you are at the front of the line; say "done" when you are finished`;
    case "NOT_FOUND":
      return "You weren't in the queue to begin with";
  }
}

export function renderOrder(order: readonly ParticipantId[]): string {
  if (order.length === 0) {
    return "The queue is empty";
  }
  const lines = order.map((id, idx) => `${idx + 1}. ${mention(id)}${idx === 0 ? " (printing)" : ""}`);
  return ["Current queue:", ...lines].join("\n");
}

export function renderPromotion(id: ParticipantId): string {
  return `${mention(id)}, you are now at the front of the queue. The printer is yours!`;
}

export async function executeCommand(
  queue: QueueCommands,
  who: ParticipantId,
  command: QueueCommand
): Promise<CommandReply> {
  switch (command) {
    case "add": {
      const outcome = await queue.addSelf(who);
      if (!outcome.ok) {
        return rejected(command, outcome.reason, who);
      }
      return {
        command,
        accepted: true,
        text: `Okay ${mention(who)}, I have added you to the queue at position ${outcome.value.position}`
      };
    }
    case "done": {
      const outcome = await queue.finishTurn(who);
      if (!outcome.ok) {
        return rejected(command, outcome.reason, who);
      }
      const next = outcome.value.promoted;
      const tail = next === null ? " The queue is now empty." : ` ${mention(next)} is up next.`;
      return {
        command,
        accepted: true,
        text: `Okay ${mention(who)}, you have been removed from the front of the queue.${tail}`
      };
    }
    case "cancel": {
      const outcome = await queue.cancelSelf(who);
      if (!outcome.ok) {
        return rejected(command, outcome.reason, who);
      }
      return {
        command,
        accepted: true,
        text: `Okay ${mention(who)}, I have removed you from the queue`
      };
    }
    case "show":
      return { command, accepted: true, text: renderOrder(await queue.currentOrder()) };
    case "unknown":
      return { command, accepted: false, text: HELP_TEXT };
  }
}

function rejected(command: QueueCommand, reason: RejectionReason, who: ParticipantId): CommandReply {
  return { command, accepted: false, reason, text: describeRejection(reason, who) };
}
