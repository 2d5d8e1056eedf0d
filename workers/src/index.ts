/**
 * Worker Entry Point
 *
 * HTTP server for health checks and job submission.
 * Starts the extraction worker.
 */

import "dotenv/config";
import { loadConfig } from "./config.js";
import { createApp } from "./server.js";
import { SubmittalPipeline } from "./pipeline.js";
import {
  BullExtractJobQueue,
  closeQueue,
  createExtractQueue,
  createQueueConnection,
} from "./queues.js";
import { createExtractWorker } from "./workers/extract-submittal.js";
import { createConsoleLogger } from "./logger.js";

const logger = createConsoleLogger("Server");
const config = loadConfig();
const WORKER_VERSION = process.env.WORKER_VERSION || "local-dev";

const connection = createQueueConnection(config.redisUrl);
const queue = createExtractQueue(connection);
const pipeline = SubmittalPipeline.fromConfig(config);
const worker = createExtractWorker(
  pipeline,
  connection,
  config.workerConcurrency,
);

const app = createApp({
  queue: new BullExtractJobQueue(queue),
  version: WORKER_VERSION,
});

// ============================================================================
// Server Startup
// ============================================================================

const server = app.listen(config.port, () => {
  logger.info(`Worker listening on port ${config.port}`);
  logger.info(`Version: ${WORKER_VERSION}`);
  logger.info(`Redis: ${config.redisUrl}`);
  logger.info(`llm.provider: ${config.llm.provider}`);
  logger.info(`llm.textModel: ${config.llm.textModel}`);
  logger.info(`llm.visionModel: ${config.llm.visionModel}`);
  logger.info(`llm.cache.enabled: ${config.llm.cache.enabled}`);
  logger.info(`cache.enabled: ${config.cache.enabled}`);
  logger.info(`cache.dir: ${config.cache.dir}`);
  logger.info(
    `Extraction worker started (concurrency ${config.workerConcurrency})`,
  );
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  // Stop accepting new connections
  server.close();

  await worker.close();
  await closeQueue(queue, connection);

  logger.info("Shutdown complete");
  process.exit(0);
}

function handleSignal(signal: string): void {
  shutdown(signal).catch((error) => {
    logger.error("Shutdown failed:", error);
    process.exit(1);
  });
}

process.on("SIGTERM", () => handleSignal("SIGTERM"));
process.on("SIGINT", () => handleSignal("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.error("Uncaught exception:", error);
  handleSignal("uncaughtException");
});

process.on("unhandledRejection", (reason, promise) => {
  logger.error("Unhandled rejection at:", promise, "reason:", reason);
});
