import type { FastifyInstance } from "fastify";

import { ChannelHub, SlackChannelAdapter, slackChannel, type SlackAdapterConfig } from "./channels.js";
import { renderPromotion } from "./commands.js";
import type { PrintQueueConfig } from "./config.js";
import { buildGateway } from "./gateway.js";
import { createLogger, type Logger } from "./logger.js";
import { NotificationDispatcher } from "./notifications.js";
import { FileSnapshotStore } from "./queue/file-backend.js";
import { InMemorySnapshotStore } from "./queue/in-memory-backend.js";
import { QueueManager } from "./queue/manager.js";
import type { SnapshotStore } from "./queue/types.js";
import { AuthService, MethodRateLimiter } from "./security.js";

export interface PrintQueueApp {
  manager: QueueManager;
  notifications: NotificationDispatcher;
  channelHub: ChannelHub;
  gateway: FastifyInstance;
  close(): Promise<void>;
}

export interface CreateAppOptions {
  store?: SnapshotStore;
  channelHub?: ChannelHub;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

export function createSnapshotStore(config: PrintQueueConfig, logger?: Logger): SnapshotStore {
  const queueFile = config.persistence.queueFile;
  if (queueFile === undefined) {
    return new InMemorySnapshotStore();
  }
  return new FileSnapshotStore({ path: queueFile, ...(logger ? { logger } : {}) });
}

export function createChannelHub(config: PrintQueueConfig, fetchImpl?: typeof fetch): ChannelHub {
  const hub = new ChannelHub();
  const slackConfig: SlackAdapterConfig = {
    enabled: config.slack.enabled,
    apiBaseUrl: config.slack.apiBaseUrl,
    timeoutMs: config.slack.requestTimeoutMs
  };
  if (config.slack.botToken !== undefined) {
    slackConfig.botToken = config.slack.botToken;
  }
  if (fetchImpl) {
    slackConfig.fetchImpl = fetchImpl;
  }
  hub.register(new SlackChannelAdapter(slackConfig));
  return hub;
}

/**
 * Wires store, manager, notifications and gateway together. Rejects with
 * MalformedSnapshot or PersistenceFailure when the snapshot cannot be loaded.
 */
export async function createApp(config: PrintQueueConfig, options: CreateAppOptions = {}): Promise<PrintQueueApp> {
  const logger = options.logger ?? createLogger("printq");
  const channelHub = options.channelHub ?? createChannelHub(config, options.fetchImpl);
  const notifications = new NotificationDispatcher(
    async (event) => {
      const sent = await channelHub.send({
        channelId: slackChannel(event.participantId),
        text: renderPromotion(event.participantId)
      });
      return sent.delivered;
    },
    { logger }
  );
  const manager = await QueueManager.open({
    store: options.store ?? createSnapshotStore(config, logger),
    notifications,
    writeTimeoutMs: config.persistence.writeTimeoutMs,
    maxConsecutiveWriteFailures: config.persistence.maxConsecutiveWriteFailures,
    logger
  });
  const gateway = buildGateway({
    config,
    manager,
    channelHub,
    notifications,
    logger,
    auth: new AuthService(
      config.gateway.auth.token !== undefined
        ? { mode: config.gateway.auth.mode, token: config.gateway.auth.token }
        : { mode: config.gateway.auth.mode }
    ),
    rateLimiter: new MethodRateLimiter(config.rateLimit.perMinute, 60_000, config.rateLimit.methods)
  });

  let closing: Promise<void> | undefined;
  const close = async (): Promise<void> => {
    closing ??= (async () => {
      await gateway.close();
      await manager.close();
      await notifications.drain();
    })();
    await closing;
  };

  return { manager, notifications, channelHub, gateway, close };
}
