#!/usr/bin/env node
/**
 * Print queue service.
 * Usage: printq [--queue-file=<path>] [--config=<path>] [--port=<n>]
 * Without a queue file the queue lives in memory only.
 */

import { createApp } from "./app.js";
import { isDevMode, loadConfigFromDisk, parseArgv, validateStartupConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger("printq");

async function main(): Promise<void> {
  const flags = parseArgv(process.argv.slice(2));
  const config = loadConfigFromDisk({ flags });
  validateStartupConfig(config, { allowInsecureDefaults: isDevMode() });

  const app = await createApp(config, { logger });
  const host = config.gateway.bind === "loopback" ? "127.0.0.1" : "0.0.0.0";
  await app.gateway.listen({ host, port: config.gateway.port });
  logger.info(`listening on ${host}:${config.gateway.port}`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      logger.error("shutdown failed:", errorMessage(err));
      process.exit(1);
    }
  };
  process.once("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

main().catch((error: unknown) => {
  logger.error("startup failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
