#!/usr/bin/env node
import { config, validateConfig } from "./config.js";
import { PERSISTED_COLUMNS } from "./constants.js";
import { logger } from "./logger.js";
import { CsvSink } from "./db/csv-sink.js";
import { RetryExhaustedError, errorMessage } from "./errors.js";
import { TokenPipeline } from "./indexer/pipeline.js";
import { restartProcess } from "./indexer/restart.js";
import { ReconnectSupervisor } from "./indexer/supervisor.js";
import { LogsSubscriptionSession, redactUrl } from "./indexer/websocket.js";
import type { PersistedRecord } from "./parser/types.js";

async function main(): Promise<void> {
  try {
    validateConfig();
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Configuration validation failed");
    process.exit(1);
  }

  logger.info(
    {
      programId: config.programId,
      commitment: config.commitment,
      wsUrl: redactUrl(config.wsUrl),
      csvFilePath: config.csvFilePath,
      maxRetries: config.maxRetries,
    },
    "Starting pump mint harvester"
  );

  const sink = new CsvSink<PersistedRecord>(config.csvFilePath, PERSISTED_COLUMNS);
  try {
    await sink.ensureWritable();
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Destination file is not writable");
    process.exit(1);
  }

  const pipeline = new TokenPipeline({ sink });

  const supervisor = new ReconnectSupervisor({
    createSession: ({ onSubscribed }) =>
      new LogsSubscriptionSession({
        onNotification: (notification) => pipeline.handleNotification(notification),
        onSubscribed,
      }),
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal, ...pipeline.getStats() }, "Shutdown signal received");
    supervisor.stop();
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  try {
    await supervisor.run();
  } catch (error) {
    if (error instanceof RetryExhaustedError) {
      logger.error({ attempts: error.attempts, ...pipeline.getStats() }, "Reconnect attempts exhausted");
      await restartProcess("retry ceiling reached");
      return;
    }
    throw error;
  }

  logger.info({ ...pipeline.getStats() }, "Shutdown complete");
  process.exit(0);
}

main().catch(async (error) => {
  logger.fatal({ error: errorMessage(error) }, "Unhandled error");
  await restartProcess("unhandled error");
});
