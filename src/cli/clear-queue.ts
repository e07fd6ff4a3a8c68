#!/usr/bin/env node
/**
 * Operator tool: replaces the queue snapshot with an empty one.
 * Usage: printq-clear [--queue-file=<path>] [--config=<path>]
 * Stop the service first; a running instance keeps its in-memory queue and
 * would write it back on the next command.
 */

import { loadConfigFromDisk, parseArgv } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { FileSnapshotStore } from "../queue/file-backend.js";

const logger = createLogger("printq-clear");

async function clearQueueFile(path: string): Promise<void> {
  const store = new FileSnapshotStore({ path, logger });
  await store.save({ entries: [], soloRun: false });
  await store.close();
}

async function main(): Promise<number> {
  const flags = parseArgv(process.argv.slice(2));
  const config = loadConfigFromDisk({ flags });
  const queueFile = config.persistence.queueFile;
  if (queueFile === undefined) {
    logger.error("Usage: printq-clear --queue-file=<path> (or set persistence.queueFile / PRINTQ_QUEUE_FILE)");
    return 2;
  }
  await clearQueueFile(queueFile);
  logger.info(`cleared ${queueFile}`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    logger.error("clear failed:", errorMessage(err));
    process.exit(1);
  });
