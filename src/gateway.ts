import { Ajv } from "ajv";
import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";

import { slackChannel, type ChannelHub } from "./channels.js";
import { describeRejection, executeCommand, parseCommand } from "./commands.js";
import type { PrintQueueConfig } from "./config.js";
import { PersistenceFailure, QueueError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { NotificationDispatcher } from "./notifications.js";
import type { QueueManager } from "./queue/manager.js";
import { createAuditId, verifySlackSignature, type AuthService, type MethodRateLimiter } from "./security.js";
import { isParticipantId, type Outcome, type ParticipantId, type RpcRequest, type RpcResponse } from "./types.js";

class RpcGatewayError extends Error {
  constructor(
    readonly statusCode: number,
    readonly rpcCode: string,
    readonly clientMessage: string
  ) {
    super(clientMessage);
  }
}

class BodyParseError extends Error {
  readonly statusCode = 400;
}

export interface GatewayDependencies {
  config: PrintQueueConfig;
  manager: QueueManager;
  auth: AuthService;
  rateLimiter: MethodRateLimiter;
  channelHub?: ChannelHub;
  notifications?: NotificationDispatcher;
  logger?: Logger;
}

interface SlackEvent {
  type: string;
  user?: string;
  text?: string;
  channel?: string;
  ts?: string;
  thread_ts?: string;
  bot_id?: string;
}

interface SlackEnvelope {
  type: string;
  challenge?: string;
  event?: SlackEvent;
}

const SLACK_ENVELOPE_SCHEMA = {
  type: "object",
  properties: {
    type: { type: "string" },
    challenge: { type: "string" },
    event: {
      type: "object",
      properties: {
        type: { type: "string" },
        user: { type: "string" },
        text: { type: "string" },
        channel: { type: "string" },
        ts: { type: "string" },
        thread_ts: { type: "string" },
        bot_id: { type: "string" }
      },
      required: ["type"]
    }
  },
  required: ["type"]
} as const;

const validateSlackEnvelope = new Ajv({ strict: false, allErrors: true }).compile<SlackEnvelope>(SLACK_ENVELOPE_SCHEMA);

const MUTATING_METHODS = {
  "queue.add": "add",
  "queue.done": "done",
  "queue.cancel": "cancel"
} as const;

type MutatingMethod = keyof typeof MUTATING_METHODS;

const FAILURE_REPLY = "Sorry, the queue is unavailable right now and your request was not saved. Please try again later.";
const UNCERTAIN_REPLY =
  "Sorry, the queue is unavailable right now and your request may or may not have been saved. Check with \"show\" once it is back.";

export function buildGateway(deps: GatewayDependencies): FastifyInstance {
  const logger = deps.logger ?? createLogger("printq:gateway");
  const app = Fastify({
    logger: false,
    bodyLimit: deps.config.gateway.bodyLimitBytes
  });
  const rawBodies = new WeakMap<FastifyRequest, string>();
  const inflight = new Set<Promise<void>>();

  app.addContentTypeParser("application/json", { parseAs: "string" }, (request, body, done) => {
    const text = typeof body === "string" ? body : body.toString("utf8");
    rawBodies.set(request, text);
    if (text.trim().length === 0) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch (err) {
      done(new BodyParseError(`invalid JSON body: ${errorMessage(err)}`), undefined);
    }
  });

  app.addHook("onClose", async () => {
    await Promise.all([...inflight]);
  });

  app.get("/health", async (_request, reply) => {
    const health = deps.manager.health();
    return reply.code(health.healthy ? 200 : 503).send({
      ok: health.healthy,
      time: new Date().toISOString()
    });
  });

  app.get("/status", async () => {
    const order = await deps.manager.currentOrder();
    return {
      gateway: "ok",
      queueLength: order.length,
      manager: deps.manager.health(),
      notifications: deps.notifications?.stats() ?? null
    };
  });

  app.post("/slack/events", async (request, reply) => {
    const secret = deps.config.slack.signingSecret;
    if (secret) {
      const verified = verifySlackSignature({
        signingSecret: secret,
        timestamp: headerValue(request, "x-slack-request-timestamp"),
        signature: headerValue(request, "x-slack-signature"),
        rawBody: rawBodies.get(request) ?? ""
      });
      if (!verified) {
        return reply.code(401).send({ ok: false, error: "invalid slack signature" });
      }
    }
    const body: unknown = request.body;
    if (!validateSlackEnvelope(body)) {
      return reply.code(400).send({ ok: false, error: "invalid slack payload" });
    }
    if (body.type === "url_verification") {
      if (body.challenge === undefined) {
        return reply.code(400).send({ ok: false, error: "missing challenge" });
      }
      return reply.type("text/plain").send(body.challenge);
    }
    // Slack redelivers when the first ack was slow; the original delivery is already being handled.
    if (headerValue(request, "x-slack-retry-num") !== undefined) {
      return { ok: true, ignored: "retry" };
    }
    const event = body.event;
    if (
      body.type !== "event_callback" ||
      event?.type !== "app_mention" ||
      event.bot_id !== undefined ||
      !event.user ||
      !event.channel
    ) {
      return { ok: true, ignored: "unsupported event" };
    }
    const task = handleMention({
      user: event.user,
      channel: event.channel,
      text: event.text ?? "",
      threadTs: event.thread_ts
    });
    inflight.add(task);
    void task.finally(() => inflight.delete(task));
    return { ok: true };
  });

  app.post("/rpc", async (request, reply) => {
    const body = (request.body ?? {}) as Partial<RpcRequest>;
    const auditId = createAuditId("req");
    if (typeof body.method !== "string" || typeof body.version !== "string") {
      return reply.code(400).send(errorResponse(body.id, auditId, "PROTO_VERSION_UNSUPPORTED", "Invalid RPC envelope"));
    }
    if (body.version !== deps.config.gateway.protocolVersion) {
      return reply.code(400).send(errorResponse(body.id, auditId, "PROTO_VERSION_UNSUPPORTED", "Unsupported protocol version"));
    }

    const auth = deps.auth.authorize({ headers: mapHeaders(request.headers) });
    if (!auth.ok) {
      return reply.code(401).send(errorResponse(body.id, auditId, auth.reason, "Unauthorized"));
    }

    try {
      let result: unknown;
      if (isMutatingMethod(body.method)) {
        const participantId = parseParticipantId(body.params?.participantId);
        if (!deps.rateLimiter.allow(body.method, participantId)) {
          throw new RpcGatewayError(429, "RATE_LIMITED", "Rate limited");
        }
        result = await runMutation(deps.manager, body.method, participantId);
      } else if (body.method === "queue.show") {
        if (!deps.rateLimiter.allow(body.method, request.ip || "unknown")) {
          throw new RpcGatewayError(429, "RATE_LIMITED", "Rate limited");
        }
        result = { order: await deps.manager.currentOrder() };
      } else {
        throw new RpcGatewayError(400, "BAD_REQUEST", `unknown method: ${body.method}`);
      }
      const response: RpcResponse = {
        auditId,
        ok: true,
        result
      };
      if (body.id !== undefined) {
        response.id = body.id;
      }
      return response;
    } catch (error: unknown) {
      const mapped = mapRpcError(error);
      if (mapped.statusCode >= 500) {
        logger.error(`${body.method} failed (${auditId}):`, errorMessage(error));
      }
      return reply.code(mapped.statusCode).send(errorResponse(body.id, auditId, mapped.rpcCode, mapped.clientMessage));
    }
  });

  async function handleMention(mention: {
    user: string;
    channel: string;
    text: string;
    threadTs: string | undefined;
  }): Promise<void> {
    let text: string;
    try {
      const replyText = await executeCommand(deps.manager, mention.user, parseCommand(mention.text));
      text = replyText.text;
    } catch (err) {
      logger.error(`command from ${mention.user} failed:`, errorMessage(err));
      text = isUncertainWrite(err) ? UNCERTAIN_REPLY : FAILURE_REPLY;
    }
    if (!deps.channelHub) {
      return;
    }
    try {
      const sent = await deps.channelHub.send({
        channelId: slackChannel(mention.channel),
        text,
        ...(mention.threadTs !== undefined ? { threadId: mention.threadTs } : {})
      });
      if (!sent.delivered) {
        logger.warn(`reply to ${mention.channel} not delivered: ${sent.detail ?? "unknown reason"}`);
      }
    } catch (err) {
      logger.warn(`reply to ${mention.channel} failed:`, errorMessage(err));
    }
  }

  return app;
}

function isUncertainWrite(error: unknown): boolean {
  return error instanceof PersistenceFailure && error.stateUncertain;
}

function isMutatingMethod(method: string): method is MutatingMethod {
  return Object.prototype.hasOwnProperty.call(MUTATING_METHODS, method);
}

async function runMutation(
  manager: QueueManager,
  method: MutatingMethod,
  participantId: ParticipantId
): Promise<Record<string, unknown>> {
  const kind = MUTATING_METHODS[method];
  const outcome: Outcome<object> =
    kind === "add"
      ? await manager.addSelf(participantId)
      : kind === "done"
        ? await manager.finishTurn(participantId)
        : await manager.cancelSelf(participantId);
  if (!outcome.ok) {
    return {
      accepted: false,
      reason: outcome.reason,
      message: describeRejection(outcome.reason, participantId)
    };
  }
  return { accepted: true, ...outcome.value };
}

function parseParticipantId(value: unknown): ParticipantId {
  if (!isParticipantId(value)) {
    throw new RpcGatewayError(400, "BAD_REQUEST", "params.participantId must be a non-empty single-line string");
  }
  return value;
}

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function errorResponse(id: string | undefined, auditId: string, code: string, message: string): RpcResponse {
  const response: RpcResponse = {
    auditId,
    ok: false,
    error: {
      code,
      message
    }
  };
  if (id !== undefined) {
    response.id = id;
  }
  return response;
}

function mapHeaders(headers: Record<string, unknown>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(",");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else {
      out[key.toLowerCase()] = undefined;
    }
  }
  return out;
}

function mapRpcError(error: unknown): {
  statusCode: number;
  rpcCode: string;
  clientMessage: string;
} {
  if (error instanceof RpcGatewayError) {
    return {
      statusCode: error.statusCode,
      rpcCode: error.rpcCode,
      clientMessage: error.clientMessage
    };
  }
  if (error instanceof QueueError) {
    return {
      statusCode: 503,
      rpcCode: error.code,
      clientMessage: isUncertainWrite(error)
        ? "Queue unavailable; the request may or may not have been applied"
        : "Queue unavailable; the request was not applied"
    };
  }
  return {
    statusCode: 500,
    rpcCode: "INTERNAL",
    clientMessage: "Internal server error"
  };
}
