import { createHash } from "node:crypto";

import { errorMessage } from "./errors.js";

export interface OutboundMessage {
  /** `slack:<channel or user id>` for Slack; anything else falls through to the local adapter. */
  channelId: string;
  text: string;
  threadId?: string;
}

export interface ChannelSendResult {
  delivered: boolean;
  channelId: string;
  messageId?: string;
  provider: string;
  text: string;
  detail?: string;
}

export interface ChannelAdapter {
  readonly name: string;
  supports(channelId: string): boolean;
  send(message: OutboundMessage): Promise<ChannelSendResult>;
}

export interface SlackAdapterConfig {
  botToken?: string;
  apiBaseUrl?: string;
  enabled: boolean;
  /** Deadline for one chat.postMessage call, response body included. */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

interface SlackPostMessageResponse {
  ok?: boolean;
  error?: string;
  ts?: string;
}

const SLACK_PREFIX = "slack:";
const DEFAULT_SLACK_API = "https://slack.com/api";
const DEFAULT_SLACK_TIMEOUT_MS = 10_000;

export function slackChannel(id: string): string {
  return `${SLACK_PREFIX}${id}`;
}

/**
 * Posts through Slack's chat.postMessage. A user id as channel lands in the
 * bot's direct-message conversation with that user.
 */
export class SlackChannelAdapter implements ChannelAdapter {
  readonly name = "slack";

  constructor(private readonly config: SlackAdapterConfig) {}

  supports(channelId: string): boolean {
    return channelId.startsWith(SLACK_PREFIX);
  }

  async send(message: OutboundMessage): Promise<ChannelSendResult> {
    if (!this.config.enabled) {
      return undelivered(this.name, message, "slack adapter disabled");
    }
    if (!this.config.botToken) {
      return undelivered(this.name, message, "slack adapter missing bot token");
    }
    const fetchImpl = this.config.fetchImpl ?? fetch;
    const body: Record<string, string> = {
      channel: message.channelId.slice(SLACK_PREFIX.length),
      text: message.text
    };
    if (message.threadId !== undefined) {
      body.thread_ts = message.threadId;
    }
    let payload: SlackPostMessageResponse;
    try {
      const response = await fetchImpl(`${this.config.apiBaseUrl ?? DEFAULT_SLACK_API}/chat.postMessage`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.config.botToken}`,
          "content-type": "application/json; charset=utf-8"
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_SLACK_TIMEOUT_MS)
      });
      if (!response.ok) {
        return undelivered(this.name, message, `slack responded with HTTP ${response.status}`);
      }
      payload = parsePostMessageResponse(await response.json());
    } catch (err) {
      return undelivered(this.name, message, `slack request failed: ${errorMessage(err)}`);
    }
    if (payload.ok !== true) {
      return undelivered(this.name, message, `slack error: ${payload.error ?? "unknown"}`);
    }
    const result: ChannelSendResult = {
      delivered: true,
      channelId: message.channelId,
      provider: this.name,
      text: message.text
    };
    if (payload.ts !== undefined) {
      result.messageId = payload.ts;
    }
    return result;
  }
}

export class LocalEchoChannelAdapter implements ChannelAdapter {
  readonly name = "local";
  readonly sent: OutboundMessage[] = [];

  supports(_channelId: string): boolean {
    return true;
  }

  async send(message: OutboundMessage): Promise<ChannelSendResult> {
    this.sent.push({ ...message });
    const stableId = createHash("sha256")
      .update(`${message.channelId}:${message.threadId ?? ""}:${message.text}`)
      .digest("hex")
      .slice(0, 16);
    return {
      delivered: true,
      channelId: message.channelId,
      provider: this.name,
      text: message.text,
      messageId: `local_${stableId}`
    };
  }
}

export class ChannelHub {
  private readonly adapters: ChannelAdapter[] = [];

  register(adapter: ChannelAdapter): void {
    this.adapters.push(adapter);
  }

  listAdapters(): string[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  async send(message: OutboundMessage): Promise<ChannelSendResult> {
    const adapter = this.adapters.find((candidate) => candidate.supports(message.channelId));
    if (!adapter) {
      return undelivered("none", message, "no adapter available for channel");
    }
    return adapter.send(message);
  }
}

function parsePostMessageResponse(payload: unknown): SlackPostMessageResponse {
  if (typeof payload !== "object" || payload === null) {
    return {};
  }
  const out: SlackPostMessageResponse = {};
  if ("ok" in payload && typeof payload.ok === "boolean") out.ok = payload.ok;
  if ("error" in payload && typeof payload.error === "string") out.error = payload.error;
  if ("ts" in payload && typeof payload.ts === "string") out.ts = payload.ts;
  return out;
}

function undelivered(provider: string, message: OutboundMessage, detail: string): ChannelSendResult {
  return {
    delivered: false,
    channelId: message.channelId,
    provider,
    text: message.text,
    detail
  };
}
