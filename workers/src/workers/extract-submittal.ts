/**
 * Extract Submittal Worker
 *
 * Runs the two-stage pipeline for one queued document.
 *
 * Input:
 * - filePath of the submittal PDF
 *
 * Output:
 * - ExtractionResult (a failure is returned, not thrown)
 */

import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import type { SubmittalPipeline } from "../pipeline.js";
import type { ExtractJobData, ExtractionResult } from "../types.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { EXTRACT_QUEUE_NAME } from "../queues.js";

type ExtractRunner = Pick<SubmittalPipeline, "run">;

/**
 * Extract job processor
 */
export async function processExtractJob(
  job: Pick<Job<ExtractJobData>, "id" | "data">,
  pipeline: ExtractRunner,
  logger: Logger = createConsoleLogger("ExtractSubmittal"),
): Promise<ExtractionResult> {
  const { filePath, requestedAt } = job.data;
  logger.info(`Job ${job.id}: extracting ${filePath} (queued ${requestedAt})`);

  const result = await pipeline.run(filePath);

  if (result.success) {
    logger.info(
      `Job ${job.id}: ${result.products.length} of ${result.candidates.length} candidates selected`,
    );
  } else {
    logger.warn(`Job ${job.id}: extraction failed: ${result.error}`);
  }

  return result;
}

export function createExtractWorker(
  pipeline: ExtractRunner,
  connection: ConnectionOptions,
  concurrency = 1,
  logger: Logger = createConsoleLogger("ExtractSubmittal"),
): Worker<ExtractJobData, ExtractionResult> {
  const worker = new Worker<ExtractJobData, ExtractionResult>(
    EXTRACT_QUEUE_NAME,
    async (job) => processExtractJob(job, pipeline, logger),
    {
      connection,
      concurrency,
    },
  );

  worker.on("completed", (job) => {
    logger.info(`Job ${job.id} completed`);
  });

  worker.on("failed", (job, error) => {
    logger.error(`Job ${job?.id} failed:`, error.message);
  });

  return worker;
}
